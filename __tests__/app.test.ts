import request from 'supertest';
import { createApp } from '../src/app';
import { Application } from 'express';

describe('App', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /', () => {
    it('should return API information', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body).toHaveProperty('message', 'Name Resolver API');
      expect(response.body).toHaveProperty('version');
      expect(response.body).toHaveProperty('search', '/api/v1/names/search');
      expect(response.body).toHaveProperty('tables', '/api/v1/names/tables');
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('404 Handler', () => {
    it('should return 404 for unknown routes', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Route not found: GET /unknown-route');
    });

    it('should return 404 for unknown API routes', async () => {
      const response = await request(app).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Route not found: GET /api/v1/unknown');
    });
  });

  describe('Security Headers', () => {
    it('should include security headers', async () => {
      const response = await request(app).get('/');

      // Helmet adds these headers
      expect(response.headers).toHaveProperty('x-content-type-options');
      expect(response.headers).toHaveProperty('x-frame-options');
    });
  });

  describe('CORS', () => {
    it('should handle CORS preflight requests', async () => {
      const response = await request(app)
        .options('/')
        .set('Origin', 'http://localhost:8080')
        .set('Access-Control-Request-Method', 'GET');

      expect(response.status).toBe(204);
    });
  });

  describe('Body parsing', () => {
    it('should reject a body over the size limit with 413', async () => {
      const response = await request(app)
        .post('/api/v1/names/search')
        .send({ candidates: ['x'.repeat(1100 * 1024)], query: 'x' });

      expect(response.status).toBe(413);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Request body too large');
    });

    it('should not parse form bodies', async () => {
      const response = await request(app)
        .post('/api/v1/names/search')
        .type('form')
        .send('query=Jane&candidates=Jane%20Doe');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
    });
  });

  describe('Rate limiting', () => {
    it('should count requests to the name endpoints', async () => {
      const response = await request(app).get('/api/v1/names/tables');

      expect(response.status).toBe(200);
      expect(response.headers).toHaveProperty('ratelimit-limit', '100');
    });

    it('should leave health probes out', async () => {
      const response = await request(app).get('/api/v1/health/live');

      expect(response.status).toBe(200);
      expect(response.headers).not.toHaveProperty('ratelimit-limit');
    });
  });
});
