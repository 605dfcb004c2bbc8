import { describe, it, expect } from 'vitest';
import http from 'http';
import type { AddressInfo } from 'net';
import * as winston from 'winston';
import { DomainError } from '../error-handling/errors';
import { isListenAddress, parseListenAddress, serveUntilAborted, toDialAddress } from '../lifecycle/http-server';

const logger = winston.createLogger({ silent: true });

function helloServer(): http.Server {
  return http.createServer((_req, res) => {
    res.end('hello');
  });
}

function startServing(server: http.Server, controller: AbortController) {
  let resolveBound: (address: AddressInfo) => void = () => undefined;
  const bound = new Promise<AddressInfo>(resolve => {
    resolveBound = resolve;
  });
  const serving = serveUntilAborted(server, '127.0.0.1:0', {
    signal: controller.signal,
    logger,
    graceMs: 200,
    onListening: address => resolveBound(address),
  });
  return { bound, serving };
}

describe('parseListenAddress', () => {
  it('parses a bare port', () => {
    expect(parseListenAddress(':8081')).toEqual({ port: 8081 });
  });

  it('parses host and port', () => {
    expect(parseListenAddress('127.0.0.1:0')).toEqual({ host: '127.0.0.1', port: 0 });
  });

  it('strips IPv6 brackets', () => {
    expect(parseListenAddress('[::1]:9000')).toEqual({ host: '::1', port: 9000 });
  });

  it('rejects addresses without a valid port', () => {
    expect(() => parseListenAddress('localhost')).toThrow(DomainError);
    expect(() => parseListenAddress(':99999')).toThrow('invalid port in ":99999"');
    expect(() => parseListenAddress('host:')).toThrow('invalid port in "host:"');
  });
});

describe('isListenAddress', () => {
  it('accepts what parseListenAddress accepts', () => {
    expect(isListenAddress(':8080')).toBe(true);
    expect(isListenAddress('[::1]:8080')).toBe(true);
    expect(isListenAddress('localhost')).toBe(false);
    expect(isListenAddress(':http')).toBe(false);
  });
});

describe('toDialAddress', () => {
  it('maps wildcard binds to localhost', () => {
    expect(toDialAddress(':8081')).toBe('localhost:8081');
    expect(toDialAddress('0.0.0.0:8081')).toBe('localhost:8081');
    expect(toDialAddress('[::]:8081')).toBe('localhost:8081');
  });

  it('keeps explicit hosts', () => {
    expect(toDialAddress('api.internal:9000')).toBe('api.internal:9000');
    expect(toDialAddress('[::1]:9000')).toBe('[::1]:9000');
  });
});

describe('serveUntilAborted', () => {
  it('serves until the signal aborts, then resolves', async () => {
    const controller = new AbortController();
    const server = helloServer();
    const { bound, serving } = startServing(server, controller);

    const { port } = await bound;
    const response = await fetch(`http://127.0.0.1:${port}/`);
    expect(await response.text()).toBe('hello');

    controller.abort();
    await expect(serving).resolves.toBeUndefined();
    expect(server.listening).toBe(false);
  });

  it('rejects when the address is already in use', async () => {
    const controller = new AbortController();
    const first = startServing(helloServer(), controller);
    const { port } = await first.bound;

    const conflict = serveUntilAborted(helloServer(), `127.0.0.1:${port}`, {
      signal: new AbortController().signal,
      logger,
    });

    await expect(conflict).rejects.toMatchObject({ code: 'EADDRINUSE' });

    controller.abort();
    await first.serving;
  });

  it('returns without binding when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const server = helloServer();

    await serveUntilAborted(server, '127.0.0.1:0', { signal: controller.signal, logger });

    expect(server.listening).toBe(false);
  });

  it('destroys connections still open after the grace period', async () => {
    const controller = new AbortController();
    const server = http.createServer(() => {
      // never answers
    });
    const { bound, serving } = startServing(server, controller);
    const { port } = await bound;

    const hanging = new Promise<string>(resolve => {
      const req = http.get({ host: '127.0.0.1', port, path: '/' });
      req.on('error', error => resolve(error.message));
    });
    await new Promise(resolve => server.once('request', resolve));

    controller.abort();

    await expect(serving).resolves.toBeUndefined();
    await expect(hanging).resolves.toBe('socket hang up');
  });
});
