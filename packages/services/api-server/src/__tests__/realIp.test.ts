import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { realIpMiddleware } from '../presentation/middleware/realIpMiddleware';

function echoIpApp(): express.Application {
  const app = express();
  app.use(realIpMiddleware);
  app.get('/', (req, res) => {
    res.json({ ip: req.clientIp });
  });
  return app;
}

describe('realIpMiddleware', () => {
  it('prefers True-Client-IP', async () => {
    const response = await request(echoIpApp())
      .get('/')
      .set('True-Client-IP', '198.51.100.1')
      .set('X-Real-IP', '198.51.100.2')
      .set('X-Forwarded-For', '198.51.100.3');

    expect(response.body).toEqual({ ip: '198.51.100.1' });
  });

  it('falls back to X-Real-IP', async () => {
    const response = await request(echoIpApp())
      .get('/')
      .set('X-Real-IP', '198.51.100.2')
      .set('X-Forwarded-For', '198.51.100.3');

    expect(response.body).toEqual({ ip: '198.51.100.2' });
  });

  it('takes the first X-Forwarded-For entry', async () => {
    const response = await request(echoIpApp()).get('/').set('X-Forwarded-For', '203.0.113.7, 10.0.0.1');

    expect(response.body).toEqual({ ip: '203.0.113.7' });
  });

  it('uses the socket address without proxy headers', async () => {
    const response = await request(echoIpApp()).get('/');

    expect(response.body.ip).toMatch(/127\.0\.0\.1$/);
  });
});
