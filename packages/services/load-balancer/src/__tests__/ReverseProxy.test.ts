import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import http from 'http';
import type { AddressInfo, Socket } from 'net';
import request from 'supertest';
import { buildRoutingRules } from '../config/routing-rules';
import { createLoadBalancerApp, runLoadBalancer } from '../services/ReverseProxy';
import {
  createStaticRoot,
  echoUpstream,
  removeStaticRoot,
  startServer,
  unusedPort,
  type TestServer,
} from './helpers/servers';

const INDEX_HTML = '<!doctype html><title>bloxstack</title>';
const APP_JS = 'console.log("app");';

interface EchoedRequest {
  method: string;
  url: string;
  headers: Record<string, string | undefined>;
}

let staticRoot: string;

beforeAll(() => {
  staticRoot = createStaticRoot({ 'index.html': INDEX_HTML, 'assets/app.js': APP_JS });
});

afterAll(() => {
  removeStaticRoot(staticRoot);
});

describe('API proxying', () => {
  let upstream: TestServer;

  beforeAll(async () => {
    upstream = await startServer(echoUpstream());
  });

  afterAll(async () => {
    await upstream.close();
  });

  function app() {
    const rules = buildRoutingRules({
      listenAddress: '127.0.0.1:0',
      upstreamAddress: `127.0.0.1:${upstream.port}`,
      staticRoot,
    });
    return createLoadBalancerApp(rules).app;
  }

  it('forwards the path and query verbatim and keeps the Host header', async () => {
    const response = await request(app()).get('/api/blobs/a%20b.txt?download=1').set('Host', 'bloxstack.test');

    expect(response.status).toBe(200);
    const echoed: EchoedRequest = response.body;
    expect(echoed.method).toBe('GET');
    expect(echoed.url).toBe('/api/blobs/a%20b.txt?download=1');
    expect(echoed.headers.host).toBe('bloxstack.test');
  });

  it('adds X-Forwarded-For and X-Real-IP for the client', async () => {
    const response = await request(app()).get('/api/check');

    const echoed: EchoedRequest = response.body;
    expect(echoed.headers['x-real-ip']).toMatch(/127\.0\.0\.1$/);
    expect(echoed.headers['x-forwarded-for']).toBe(echoed.headers['x-real-ip']);
  });

  it('proxies /api itself and every method', async () => {
    const response = await request(app()).post('/api');

    const echoed: EchoedRequest = response.body;
    expect(echoed.method).toBe('POST');
    expect(echoed.url).toBe('/api');
  });

  it('answers 502 with an envelope when the upstream is down', async () => {
    const rules = buildRoutingRules({
      listenAddress: '127.0.0.1:0',
      upstreamAddress: `127.0.0.1:${await unusedPort()}`,
      staticRoot,
    });

    const response = await request(createLoadBalancerApp(rules).app).get('/api/check');

    expect(response.status).toBe(502);
    expect(response.body).toEqual({ err: 'UPSTREAM_UNAVAILABLE', message: 'upstream unavailable' });
  });
});

describe('static delivery', () => {
  function app(root: string) {
    const rules = buildRoutingRules({ listenAddress: '127.0.0.1:0', upstreamAddress: '127.0.0.1:1', staticRoot: root });
    return createLoadBalancerApp(rules).app;
  }

  it('serves files from the static root', async () => {
    const response = await request(app(staticRoot)).get('/assets/app.js');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/javascript/);
    expect(response.text).toBe(APP_JS);
  });

  it('serves index.html at the root', async () => {
    const response = await request(app(staticRoot)).get('/');

    expect(response.status).toBe(200);
    expect(response.text).toBe(INDEX_HTML);
  });

  it('falls back to index.html for unknown client-side routes', async () => {
    const deep = await request(app(staticRoot)).get('/settings/profile');
    const lookalike = await request(app(staticRoot)).get('/apix');

    expect(deep.status).toBe(200);
    expect(deep.text).toBe(INDEX_HTML);
    expect(lookalike.status).toBe(200);
    expect(lookalike.text).toBe(INDEX_HTML);
  });

  it('does not rewrite non-GET requests', async () => {
    const response = await request(app(staticRoot)).post('/settings');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ err: 'ROUTE_NOT_FOUND', message: 'no route for POST /settings' });
  });

  it('answers 404 when the static root has no index.html', async () => {
    const emptyRoot = createStaticRoot({});
    try {
      const response = await request(app(emptyRoot)).get('/settings');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ err: 'ROUTE_NOT_FOUND', message: 'no route for GET /settings' });
    } finally {
      removeStaticRoot(emptyRoot);
    }
  });
});

function openUpgrade(port: number, path: string): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const req = http.request({
      host: '127.0.0.1',
      port,
      path,
      headers: { Connection: 'Upgrade', Upgrade: 'websocket' },
    });
    req.once('upgrade', (_res, socket) => resolve(socket));
    req.once('response', res => reject(new Error(`unexpected status ${res.statusCode}`)));
    req.once('error', reject);
    req.end();
  });
}

describe('runLoadBalancer', () => {
  let upstream: TestServer;
  let controller: AbortController;
  let running: Promise<void>;
  let port: number;
  const clientSockets: Socket[] = [];

  beforeAll(async () => {
    upstream = await startServer(echoUpstream());
  });

  afterAll(async () => {
    await upstream.close();
  });

  async function start(): Promise<void> {
    controller = new AbortController();
    const rules = buildRoutingRules({
      listenAddress: '127.0.0.1:0',
      upstreamAddress: `127.0.0.1:${upstream.port}`,
      staticRoot,
    });
    const bound = new Promise<AddressInfo>(resolve => {
      running = runLoadBalancer(rules, { signal: controller.signal, graceMs: 100, onListening: resolve });
    });
    port = (await bound).port;
  }

  afterEach(async () => {
    for (const socket of clientSockets.splice(0)) socket.destroy();
    controller.abort();
    await running;
  });

  it('tunnels WebSocket upgrades on API paths', async () => {
    await start();
    const socket = await openUpgrade(port, '/api/events');
    clientSockets.push(socket);

    const echoed = new Promise<string>(resolve => socket.once('data', (chunk: Buffer) => resolve(chunk.toString())));
    socket.write('ping');

    expect(await echoed).toBe('ping');
  });

  it('refuses upgrades outside the API prefix', async () => {
    await start();

    await expect(openUpgrade(port, '/live')).rejects.toThrow('socket hang up');
  });

  it('serves plain requests and stops when aborted', async () => {
    await start();

    const response = await fetch(`http://127.0.0.1:${port}/`);
    expect(await response.text()).toBe(INDEX_HTML);

    controller.abort();
    await expect(running).resolves.toBeUndefined();
  });
});
