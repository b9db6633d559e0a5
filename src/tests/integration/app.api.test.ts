import request from 'supertest';
import app from '@/app';
import { resetMetrics } from '@/api/middlewares/metricsMiddleware';

jest.mock('@/config/dependencies', () =>
  jest
    .requireActual<typeof import('@/tests/utils/inMemoryDependencies')>('@/tests/utils/inMemoryDependencies')
    .createInMemoryDependencies()
);

describe('Service endpoints', () => {
  describe('GET /health', () => {
    it('should be healthy', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toEqual({ status: 'OK' });
    });
  });

  describe('GET /', () => {
    it('should return the service name and version', async () => {
      const response = await request(app).get('/').expect(200);

      expect(response.body).toEqual({ name: 'Account REST API Service', version: '1.0' });
    });
  });

  describe('GET /nonexistent', () => {
    it('should return 404 for undefined routes', async () => {
      const response = await request(app).get('/nonexistent').expect(404);

      expect(response.body).toEqual({
        success: false,
        error: { message: 'Route GET /nonexistent not found' },
      });
    });
  });

  describe('GET /metrics', () => {
    beforeEach(() => {
      resetMetrics();
    });

    it('should expose Prometheus text', async () => {
      const response = await request(app).get('/metrics').expect(200);

      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.headers['content-type']).toContain('version=0.0.4');
      expect(response.text).toContain('# TYPE http_requests_total counter');
      expect(response.text).toContain('# TYPE process_uptime_seconds gauge');
    });

    it('should count requests per normalized path and status', async () => {
      await request(app).get('/accounts').expect(200);
      await request(app).get('/accounts/12345').expect(404);

      const response = await request(app).get('/metrics').expect(200);
      const lines = response.text.split('\n');

      expect(lines).toContain('http_requests_total{method="GET",path="/accounts",status="200"} 1');
      expect(lines).toContain('http_requests_total{method="GET",path="/accounts/:id",status="404"} 1');
      expect(lines).toContain('http_request_duration_seconds_count{method="GET",path="/accounts"} 1');
    });

    it('should group requests that match no route under one series', async () => {
      for (let i = 0; i < 5; i++) {
        await request(app).get(`/missing-${i}x`).expect(404);
      }
      await request(app).get('/accounts/abc').expect(404);

      const response = await request(app).get('/metrics').expect(200);
      const lines = response.text.split('\n');

      expect(lines).toContain('http_requests_total{method="GET",path="unmatched",status="404"} 6');
      expect(lines).toContain('http_request_duration_seconds_count{method="GET",path="unmatched"} 6');
      expect(response.text).not.toContain('missing-');
      expect(response.text).not.toContain('/accounts/abc');
    });

    it('should not count health checks', async () => {
      await request(app).get('/health').expect(200);

      const response = await request(app).get('/metrics').expect(200);

      expect(response.text).not.toContain('path="/health"');
    });
  });
});
