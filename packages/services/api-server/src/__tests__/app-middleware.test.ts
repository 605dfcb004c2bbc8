import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createApp } from '../app';
import { buildApiServerContext } from '../bootstrap';
import { InMemoryBlobRepository } from '../infrastructure/repositories/InMemoryBlobRepository';
import { recoveryMiddleware } from '../presentation/middleware/recoveryMiddleware';
import { TEST_SESSION_SECRET, testContext } from './helpers/testContext';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('API server middleware chain', () => {
  it('answers CORS preflight for any origin with credentials', async () => {
    const app = createApp(testContext());

    const response = await request(app)
      .options('/api/blobs/hello.txt')
      .set('Origin', 'http://web.example.test')
      .set('Access-Control-Request-Method', 'GET')
      .set('Access-Control-Request-Headers', 'Authorization');

    expect(response.status).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('http://web.example.test');
    expect(response.headers['access-control-allow-credentials']).toBe('true');
    expect(response.headers['access-control-allow-methods']).toBe('GET,POST,PUT,DELETE,OPTIONS');
    expect(response.headers['access-control-allow-headers']).toBe('Accept,Authorization,Content-Type,X-CSRF-Token');
    expect(response.headers['access-control-max-age']).toBe('300');
  });

  it('exposes the Link header on actual requests', async () => {
    const app = createApp(testContext());

    const response = await request(app).get('/api/check').set('Origin', 'http://web.example.test');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({});
    expect(response.headers['access-control-expose-headers']).toBe('Link');
  });

  it('generates a request id when none is supplied', async () => {
    const response = await request(createApp(testContext())).get('/api/check');

    expect(response.headers['x-request-id']).toMatch(UUID_PATTERN);
  });

  it('echoes the caller request id', async () => {
    const response = await request(createApp(testContext())).get('/api/check').set('X-Request-Id', 'abc-123');

    expect(response.headers['x-request-id']).toBe('abc-123');
  });

  it('answers unknown API routes with a 404 envelope', async () => {
    const response = await request(createApp(testContext())).get('/api/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ err: 'ROUTE_NOT_FOUND', message: 'no route for GET /api/nope' });
  });

  it('answers paths outside /api with a 404 envelope', async () => {
    const response = await request(createApp(testContext())).get('/elsewhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ err: 'ROUTE_NOT_FOUND', message: 'no route for GET /elsewhere' });
  });

  it('exposes request metrics at /api/metrics', async () => {
    const app = createApp(testContext());
    await request(app).get('/api/check').expect(200);

    await vi.waitFor(async () => {
      const response = await request(app).get('/api/metrics');
      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.text).toContain('# TYPE bloxstack_api_server_http_requests_total counter');
    });
  });

  it('exposes process and runtime metrics with the default context', async () => {
    const app = createApp(
      buildApiServerContext({ blobStore: new InMemoryBlobRepository(), sessionSecret: TEST_SESSION_SECRET })
    );

    const response = await request(app).get('/api/metrics');

    expect(response.status).toBe(200);
    expect(response.text).toContain('# TYPE process_cpu_user_seconds_total counter');
    expect(response.text).toContain('# TYPE nodejs_heap_size_total_bytes gauge');
  });
});

describe('recoveryMiddleware', () => {
  it('turns a thrown error into a 500 envelope and keeps serving', async () => {
    const app = express();
    app.get('/boom', () => {
      throw new Error('kaboom');
    });
    app.get('/fine', (_req, res) => {
      res.json({ fine: true });
    });
    app.use(recoveryMiddleware());

    const failed = await request(app).get('/boom');
    const next = await request(app).get('/fine');

    expect(failed.status).toBe(500);
    expect(failed.body).toEqual({ err: 'INTERNAL_ERROR', message: 'internal server error' });
    expect(next.status).toBe(200);
    expect(next.body).toEqual({ fine: true });
  });
});
