import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { resilienceGateway, PROVIDERS } from '../src/resilience';

describe('Health Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /api/v1/health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/api/v1/health');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/application\/json/);
      expect(response.body).toMatchObject({
        success: true,
        message: 'Service is healthy',
        data: { status: 'healthy', environment: 'test' },
      });
      expect(typeof response.body.data.uptime).toBe('number');
    });
  });

  describe('GET /api/v1/health/live', () => {
    it('should return liveness status', async () => {
      const response = await request(app).get('/api/v1/health/live');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ alive: true });
    });
  });

  describe('GET /api/v1/health/ready', () => {
    it('should be ready with every check passing', async () => {
      const response = await request(app).get('/api/v1/health/ready');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        ready: true,
        checks: { server: true, database: true, providers: true },
        failing: [],
        cache: 'disabled',
      });
    });

    // Runs last: it leaves the reasoning circuit open for the rest of this file
    it('should answer 503 once a provider circuit opens', async () => {
      const failing = () => Promise.reject(Object.assign(new Error('upstream down'), { code: 'ECONNRESET' }));

      await resilienceGateway.execute(PROVIDERS.REASONING, failing).catch(() => undefined);
      await resilienceGateway.execute(PROVIDERS.REASONING, failing).catch(() => undefined);

      const ready = await request(app).get('/api/v1/health/ready');

      expect(ready.status).toBe(503);
      expect(ready.body.error).toBe('Service is not ready: providers');

      const providers = await request(app).get('/api/v1/providers');

      expect(providers.body.data.healthy).toBe(false);
      expect(providers.body.data.openCircuits).toEqual(['reasoning']);
      expect(providers.body.message).toBe('2 providers registered, open: reasoning');
    });
  });
});
