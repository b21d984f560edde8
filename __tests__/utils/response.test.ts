import { Response } from 'express';
import { sendSuccess, sendError } from '../../src/utils/response';
import { NameSearchResponse, ReadinessResponse } from '../../src/types';

const mockResponse = (): Response => {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  return res as Response;
};

describe('Response Utils', () => {
  describe('sendSuccess', () => {
    it('should wrap a search result in the envelope', () => {
      const res = mockResponse();
      const result: NameSearchResponse = {
        match: 'Dr. Ayesha Khan',
        index: 0,
        stage: 'single-name',
        score: 1,
        explanation: 'Single name matched a name part, directly or through a variant',
      };

      sendSuccess(res, result, 'Match found');

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({
        success: true,
        data: result,
        message: 'Match found',
        timestamp: expect.any(String),
      });
    });

    it('should keep a null match as data rather than an error', () => {
      const res = mockResponse();
      const result: NameSearchResponse = {
        match: null,
        index: null,
        stage: null,
        score: 0,
        explanation: 'No candidate cleared the acceptance threshold',
      };

      sendSuccess(res, result, 'No match found');

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          success: true,
          data: expect.objectContaining({ match: null, index: null }),
        })
      );
    });

    it('should send an ISO timestamp', () => {
      const res = mockResponse();

      sendSuccess(res, { total: 273 });

      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
        })
      );
    });
  });

  describe('sendError', () => {
    it('should default to 500 without data', () => {
      const res = mockResponse();

      sendError(res, 'Something went wrong');

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        error: 'Something went wrong',
        message: undefined,
        data: undefined,
        timestamp: expect.any(String),
      });
    });

    it('should carry readiness checks alongside a 503', () => {
      const res = mockResponse();
      const readiness: ReadinessResponse = {
        ready: false,
        checks: { server: true, nameTables: false },
        reason: 'Unable to read name tables from /tmp/missing.json',
      };

      sendError(res, 'Service is not ready', 503, readiness.reason, readiness);

      expect(res.status).toHaveBeenCalledWith(503);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        error: 'Service is not ready',
        message: 'Unable to read name tables from /tmp/missing.json',
        data: readiness,
        timestamp: expect.any(String),
      });
    });
  });
});
