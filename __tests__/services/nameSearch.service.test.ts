import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  NameSearchService,
  createNameSearchService,
} from '../../src/services/nameSearch.service';
import { EMPTY_NAME_TABLES } from '../../src/matching';
import { AppError, logger } from '../../src/utils';

describe('NameSearchService', () => {
  let service: NameSearchService;

  beforeEach(() => {
    service = new NameSearchService({ tables: EMPTY_NAME_TABLES, source: 'defaults' });
  });

  describe('search', () => {
    it('should return the match with its stage and explanation', () => {
      const result = service.search(['Michael Johnson', 'Jane Doe'], 'Mikael Jonson');

      expect(result).toEqual({
        match: 'Michael Johnson',
        index: 0,
        stage: 'close-edit-distance',
        score: 1,
        explanation: 'Both name parts within two edits',
      });
    });

    it('should return an empty result when nothing matches', () => {
      const result = service.search(['Jane Doe', 'Michael Johnson'], 'XYZ-unrelated-string');

      expect(result).toEqual({
        match: null,
        index: null,
        stage: null,
        score: 0,
        explanation: 'No candidate cleared the acceptance threshold',
      });
    });

    it('should treat an empty query as no match', () => {
      expect(service.search(['Jane Doe'], '').match).toBeNull();
    });
  });

  describe('replaceTables', () => {
    it('should make the new tables active', () => {
      const stats = service.replaceTables({ fullNames: { 'Mikael Jonson': 'Michael Johnson' } });

      expect(stats.total).toBe(1);
      expect(stats.fullNames).toBe(1);
      expect(service.search(['Michael Johnson', 'Jane Doe'], 'Mikael Jonson').stage).toBe('full-name-map');
    });

    it('should keep the active tables when the input is invalid', () => {
      service.replaceTables({ givenNames: { anna: ['ana'] } });

      expect(() => service.replaceTables({ givenNames: { anna: 'ana' } })).toThrow(AppError);
      expect(service.getTableStats().givenNames).toBe(1);
    });

    it('should report invalid input as a 400 with the failing field', () => {
      let caught: unknown;
      try {
        service.replaceTables({ givenNames: { anna: 'ana' } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toMatchObject({
        statusCode: 400,
        details: [{ field: 'givenNames.anna', message: 'Expected array, received string' }],
      });
    });
  });

  describe('resetTables', () => {
    it('should restore the startup tables', () => {
      service.replaceTables({ surnames: { smith: ['smyth'] } });

      const stats = service.resetTables();

      expect(stats.total).toBe(0);
      expect(service.getTables()).toBe(EMPTY_NAME_TABLES);
    });
  });

  describe('isReady', () => {
    it('should be ready without a load error', () => {
      expect(service.isReady()).toBe(true);
    });

    it('should not be ready after a load error', () => {
      const fallback = new NameSearchService({
        tables: EMPTY_NAME_TABLES,
        source: 'defaults',
        loadError: 'file not found',
      });

      expect(fallback.isReady()).toBe(false);
    });
  });
});

describe('createNameSearchService', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'name-search-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should use the shipped tables without a path', () => {
    const service = createNameSearchService();

    expect(service.getSource()).toBe('defaults');
    expect(service.isReady()).toBe(true);
    expect(service.getTableStats().total).toBe(273);
  });

  it('should load tables from a file', () => {
    const file = path.join(dir, 'tables.json');
    fs.writeFileSync(file, JSON.stringify({ givenNames: { jon: ['john'] } }));

    const service = createNameSearchService(file);

    expect(service.getSource()).toBe('file');
    expect(service.isReady()).toBe(true);
    expect(service.getTableStats().total).toBe(1);
  });

  it('should fall back to the shipped tables when the file cannot be loaded', () => {
    const error = jest.spyOn(logger, 'error').mockImplementation(() => logger);

    const service = createNameSearchService(path.join(dir, 'missing.json'));

    expect(service.getSource()).toBe('defaults');
    expect(service.isReady()).toBe(false);
    expect(service.getTableStats().total).toBe(273);
    expect(error).toHaveBeenCalledTimes(1);
    error.mockRestore();
  });

  it('should record why a file with invalid content was rejected', () => {
    const file = path.join(dir, 'invalid.json');
    fs.writeFileSync(file, JSON.stringify({ surnames: [] }));
    const error = jest.spyOn(logger, 'error').mockImplementation(() => logger);

    const service = createNameSearchService(file);

    expect(service.isReady()).toBe(false);
    expect(service.getLoadError()).toBe(
      'Invalid name tables: [{"field":"surnames","message":"Expected object, received array"}]'
    );
    error.mockRestore();
  });

  it('should record why a missing file could not be read', () => {
    const file = path.join(dir, 'missing.json');
    const error = jest.spyOn(logger, 'error').mockImplementation(() => logger);

    const service = createNameSearchService(file);

    expect(service.getLoadError()).toMatch(/^Unable to read name tables from .*missing\.json: ENOENT/);
    error.mockRestore();
  });
});
