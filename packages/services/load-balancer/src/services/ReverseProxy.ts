/**
 * Load balancer runtime: applies a RoutingRuleSet with Express.
 *
 * API paths (including WebSocket upgrades) go to the upstream through
 * http-proxy-middleware; everything else is served from the static root,
 * falling back to the SPA entry point.
 */

import http from 'http';
import net from 'net';
import path from 'path';
import type { Duplex } from 'stream';
import type { AddressInfo } from 'net';
import express, { type Request, type Response, type NextFunction } from 'express';
import {
  createProxyMiddleware,
  debugProxyErrorsPlugin,
  proxyEventsPlugin,
  type RequestHandler as ProxyHandler,
} from 'http-proxy-middleware';
import { getLogger, ErrorEnvelope, errorMessage, sendEnvelope, serveUntilAborted } from '@bloxstack/platform-core';
import { isApiPath, type RoutingRuleSet } from '../config/routing-rules';
import { renderCaddyfile } from './ProxyConfigGenerator';
import { routeNotFoundError, upstreamUnavailableError } from '../errors/errors';

const logger = getLogger('load-balancer');

function pathnameOf(url: string | undefined): string {
  return new URL(url ?? '/', 'http://load-balancer.invalid').pathname;
}

function writeUpstreamFailure(error: Error, res: http.ServerResponse | net.Socket): void {
  if (!(res instanceof http.ServerResponse)) {
    res.destroy();
    return;
  }
  if (res.headersSent) {
    res.destroy(error);
    return;
  }
  res.writeHead(502, { 'Content-Type': 'application/json; charset=utf-8' });
  res.end(JSON.stringify(ErrorEnvelope.wrap(upstreamUnavailableError(error)).toJSON()));
}

export class ReverseProxy {
  readonly app: express.Application;
  private readonly apiProxy: ProxyHandler;

  constructor(private readonly rules: RoutingRuleSet) {
    this.apiProxy = this.createApiProxy();
    this.app = this.createApp();
  }

  private createApiProxy(): ProxyHandler {
    const { api } = this.rules;
    const forwardRealIp = (proxyReq: http.ClientRequest, req: http.IncomingMessage): void => {
      const remoteAddress = req.socket.remoteAddress;
      if (api.transparent && remoteAddress) {
        proxyReq.setHeader('X-Real-IP', remoteAddress);
      }
    };

    return createProxyMiddleware({
      target: `http://${api.upstream}`,
      pathFilter: (pathname: string) => isApiPath(pathname, api.pathPrefix),
      changeOrigin: !api.transparent,
      xfwd: api.transparent,
      // Upgrades are subscribed explicitly in attach().
      ws: false,
      proxyTimeout: api.idleTimeoutMs,
      timeout: api.idleTimeoutMs,
      // The stock error-response plugin writes a plain-text body; failures
      // are answered with an envelope by on.error instead.
      ejectPlugins: true,
      plugins: [debugProxyErrorsPlugin, proxyEventsPlugin],
      on: {
        proxyReq: forwardRealIp,
        proxyReqWs: forwardRealIp,
        open: (proxySocket: net.Socket) => {
          proxySocket.setTimeout(api.idleTimeoutMs, () => proxySocket.destroy());
        },
        error: (error: Error, req: http.IncomingMessage, res: http.ServerResponse | net.Socket) => {
          logger.warn('Upstream request failed', {
            upstream: api.upstream,
            method: req.method,
            path: req.url,
            error: error.message,
          });
          writeUpstreamFailure(error, res);
        },
      },
    });
  }

  private createApp(): express.Application {
    const app = express();
    app.disable('x-powered-by');

    app.use(this.apiProxy);

    const serveStatic = express.static(path.resolve(this.rules.static.root), { index: ['index.html'] });
    app.use(serveStatic);

    // SPA fallback: unmatched GET/HEAD paths are served as the fallback path.
    app.use((req: Request, res: Response, next: NextFunction) => {
      if ((req.method !== 'GET' && req.method !== 'HEAD') || isApiPath(req.path, this.rules.api.pathPrefix)) {
        next();
        return;
      }
      req.url = this.rules.static.spaFallback;
      serveStatic(req, res, next);
    });

    app.use((req: Request, res: Response) => {
      sendEnvelope(res, 404, routeNotFoundError(req.method, req.originalUrl));
    });

    return app;
  }

  /**
   * Upgrades on API paths are proxied; any other upgrade is refused.
   */
  handleUpgrade = (req: http.IncomingMessage, socket: Duplex, head: Buffer): void => {
    const { api } = this.rules;
    if (!api.websocket || !isApiPath(pathnameOf(req.url), api.pathPrefix) || !(socket instanceof net.Socket)) {
      socket.destroy();
      return;
    }

    socket.setTimeout(api.idleTimeoutMs, () => socket.destroy());
    Promise.resolve(this.apiProxy.upgrade(req, socket, head)).catch((error: unknown) => {
      logger.warn('WebSocket upgrade failed', { path: req.url, error: errorMessage(error) });
      socket.destroy();
    });
  };

  attach(server: http.Server): void {
    server.on('upgrade', this.handleUpgrade);
  }
}

export function createLoadBalancerApp(rules: RoutingRuleSet): ReverseProxy {
  return new ReverseProxy(rules);
}

export interface RunLoadBalancerOptions {
  signal: AbortSignal;
  graceMs?: number;
  onListening?: (address: AddressInfo) => void;
}

/**
 * Renders the configuration (failing fast on template errors), binds the
 * listen address and serves until the signal aborts or the server fails.
 */
export async function runLoadBalancer(rules: RoutingRuleSet, options: RunLoadBalancerOptions): Promise<void> {
  logger.info('start load balancer', {
    listenAddress: rules.listenAddress,
    upstream: rules.api.upstream,
    staticRoot: rules.static.root,
  });
  logger.debug('Load balancer configuration', { caddyfile: renderCaddyfile(rules) });

  const proxy = createLoadBalancerApp(rules);
  const server = http.createServer(proxy.app);
  proxy.attach(server);

  await serveUntilAborted(server, rules.listenAddress, {
    signal: options.signal,
    logger,
    graceMs: options.graceMs,
    onListening: options.onListening,
  });
  logger.info('load balancer stopped', { listenAddress: rules.listenAddress });
}
