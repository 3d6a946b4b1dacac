import request from 'supertest';
import { createApp } from '../src/app';
import { Application } from 'express';

describe('App', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /', () => {
    it('should describe the API', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        message: 'Dispute Resolution API',
        endpoints: {
          health: '/api/v1/health',
          providers: '/api/v1/providers',
          disputes: '/api/v1/users/:userId/disputes',
        },
      });
      expect(response.body).toHaveProperty('version');
    });
  });

  describe('Request IDs', () => {
    it('should assign an id to each request', async () => {
      const response = await request(app).get('/');

      expect(response.headers['x-request-id']).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
    });

    it('should keep a valid id sent by the caller', async () => {
      const response = await request(app).get('/').set('X-Request-Id', 'agent-turn-0042');

      expect(response.headers['x-request-id']).toBe('agent-turn-0042');
    });

    it('should replace an id with unexpected characters', async () => {
      const response = await request(app).get('/').set('X-Request-Id', 'bad id with spaces');

      expect(response.headers['x-request-id']).not.toBe('bad id with spaces');
    });
  });

  describe('404 Handler', () => {
    it('should name the unknown route', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        error: 'Route not found: GET /unknown-route',
        timestamp: expect.any(String),
      });
    });

    it('should return 404 for unknown API routes', async () => {
      const response = await request(app).delete('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Route not found: DELETE /api/v1/unknown');
    });
  });

  describe('Error Handler', () => {
    it('should reject malformed JSON bodies with 400', async () => {
      const response = await request(app)
        .post('/api/v1/users/user_001/sessions/s1/resolve')
        .set('Content-Type', 'application/json')
        .send('{"amount": ');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('error', 'Malformed JSON body');
    });
  });

  describe('Security Headers', () => {
    it('should include security headers', async () => {
      const response = await request(app).get('/');

      // Helmet adds these headers
      expect(response.headers).toHaveProperty('x-content-type-options', 'nosniff');
      expect(response.headers).toHaveProperty('x-frame-options');
    });
  });

  describe('CORS', () => {
    it('should answer preflight requests and expose the request id', async () => {
      const response = await request(app)
        .options('/api/v1/users/user_001/disputes')
        .set('Origin', 'http://localhost:8080')
        .set('Access-Control-Request-Method', 'POST');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-methods']).toBe('GET,POST,DELETE,OPTIONS');
    });
  });
});
