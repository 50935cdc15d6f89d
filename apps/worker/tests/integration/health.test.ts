import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createTestApp, destroyTestApp } from '../helpers/app.js';

describe('GET /health', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createTestApp({ env: { FLOWQA_RUNNER_URL: 'http://runtime.test' } });
  });

  afterAll(async () => {
    await destroyTestApp(app);
  });

  it('reports ok with the queue disabled', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json<{
      success: boolean;
      data: { status: string; timestamp: string; version: string; services: Record<string, string> };
    }>();
    expect(body.success).toBe(true);
    expect(body.data.status).toBe('ok');
    expect(body.data.version).toBe('0.1.0');
    expect(body.data.services).toEqual({ redis: 'disabled', runner: 'configured', chunkService: 'unconfigured' });
  });

  it('returns the error envelope for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /nope not found' },
    });
  });
});
