import client from 'prom-client';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { STANDARD_METRICS, type MetricsConfig } from './types.js';

type Labels = Record<string, string>;

/**
 * Per-service Prometheus registry. Metrics are created on first use; the
 * label names of a metric are fixed by its first observation.
 */
export class PrometheusMetrics {
  private readonly registry: client.Registry;
  private readonly prefix: string;
  private counters = new Map<string, client.Counter>();
  private histograms = new Map<string, client.Histogram>();
  private gauges = new Map<string, client.Gauge>();
  private knownLabelNames = new Map<string, string[]>();

  constructor(private readonly config: MetricsConfig) {
    this.prefix = `${config.prefix ?? 'bloxstack'}_${config.serviceName.replace(/-/g, '_')}`;
    this.registry = new client.Registry();
    this.registry.setDefaultLabels({ service: config.serviceName });

    if (config.collectDefaultMetrics ?? true) {
      client.collectDefaultMetrics({ register: this.registry });
    }
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  fullName(name: string): string {
    return `${this.prefix}_${name}`;
  }

  private resolveLabelNames(name: string, labels?: Labels): string[] {
    const fullName = this.fullName(name);
    const existing = this.knownLabelNames.get(fullName);
    if (existing) return existing;

    const labelNames = labels ? Object.keys(labels).sort() : [];
    this.knownLabelNames.set(fullName, labelNames);
    return labelNames;
  }

  private normalizeLabelValues(labelNames: string[], labels?: Labels): Labels {
    const normalized: Labels = {};
    for (const key of labelNames) {
      normalized[key] = labels?.[key] ?? '';
    }
    return normalized;
  }

  private getOrCreateCounter(name: string, labelNames: string[]): client.Counter {
    const fullName = this.fullName(name);
    let counter = this.counters.get(fullName);
    if (!counter) {
      counter = new client.Counter({
        name: fullName,
        help: `${name} counter`,
        labelNames,
        registers: [this.registry],
      });
      this.counters.set(fullName, counter);
    }
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): client.Histogram {
    const fullName = this.fullName(name);
    let histogram = this.histograms.get(fullName);
    if (!histogram) {
      histogram = new client.Histogram({
        name: fullName,
        help: `${name} histogram`,
        labelNames,
        buckets: client.exponentialBuckets(0.005, 2, 12),
        registers: [this.registry],
      });
      this.histograms.set(fullName, histogram);
    }
    return histogram;
  }

  private getOrCreateGauge(name: string, labelNames: string[]): client.Gauge {
    const fullName = this.fullName(name);
    let gauge = this.gauges.get(fullName);
    if (!gauge) {
      gauge = new client.Gauge({
        name: fullName,
        help: `${name} gauge`,
        labelNames,
        registers: [this.registry],
      });
      this.gauges.set(fullName, gauge);
    }
    return gauge;
  }

  incrementCounter(name: string, labels?: Labels, value: number = 1): void {
    const labelNames = this.resolveLabelNames(name, labels);
    this.getOrCreateCounter(name, labelNames).inc(this.normalizeLabelValues(labelNames, labels), value);
  }

  recordHistogram(name: string, value: number, labels?: Labels): void {
    if (!Number.isFinite(value)) return;
    const labelNames = this.resolveLabelNames(name, labels);
    this.getOrCreateHistogram(name, labelNames).observe(this.normalizeLabelValues(labelNames, labels), value);
  }

  incrementGauge(name: string, value: number = 1, labels?: Labels): void {
    const labelNames = this.resolveLabelNames(name, labels);
    this.getOrCreateGauge(name, labelNames).inc(this.normalizeLabelValues(labelNames, labels), value);
  }

  decrementGauge(name: string, value: number = 1, labels?: Labels): void {
    const labelNames = this.resolveLabelNames(name, labels);
    this.getOrCreateGauge(name, labelNames).dec(this.normalizeLabelValues(labelNames, labels), value);
  }

  async getCounterValue(name: string, labels?: Labels): Promise<number> {
    const counter = this.counters.get(this.fullName(name));
    if (!counter) return 0;
    const { values } = await counter.get();
    return values
      .filter(sample => Object.entries(labels ?? {}).every(([key, value]) => sample.labels[key] === value))
      .reduce((total, sample) => total + sample.value, 0);
  }

  exportPrometheusFormat(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  createMetricsMiddleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const startTime = process.hrtime.bigint();
      this.incrementGauge(STANDARD_METRICS.HTTP_ACTIVE_CONNECTIONS);

      let finished = false;
      const record = (): void => {
        if (finished) return;
        finished = true;
        const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
        const route = routeLabel(req);
        const status = res.statusCode.toString();

        this.incrementCounter(STANDARD_METRICS.HTTP_REQUESTS_TOTAL, { method: req.method, route, status });
        this.recordHistogram(STANDARD_METRICS.HTTP_REQUEST_DURATION, duration, { method: req.method, route });
        if (res.statusCode >= 400) {
          this.incrementCounter(STANDARD_METRICS.HTTP_ERRORS_TOTAL, { method: req.method, route, status });
        }
        this.decrementGauge(STANDARD_METRICS.HTTP_ACTIVE_CONNECTIONS);
      };

      res.once('finish', record);
      res.once('close', record);
      next();
    };
  }

  createMetricsEndpoint(): RequestHandler {
    return (_req: Request, res: Response, next: NextFunction): void => {
      this.exportPrometheusFormat().then(body => {
        res.set('Content-Type', this.contentType);
        res.send(body);
      }, next);
    };
  }

  getRegistry(): client.Registry {
    return this.registry;
  }

  destroy(): void {
    this.registry.clear();
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
    this.knownLabelNames.clear();
  }
}

/**
 * Route templates keep label cardinality bounded; unmatched requests share one
 * label.
 */
function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null) {
    const path: unknown = Reflect.get(route, 'path');
    if (typeof path === 'string') return `${req.baseUrl}${path}`;
  }
  return 'unmatched';
}

export function createMetrics(serviceName: string, options: Omit<MetricsConfig, 'serviceName'> = {}): PrometheusMetrics {
  return new PrometheusMetrics({ serviceName, ...options });
}
