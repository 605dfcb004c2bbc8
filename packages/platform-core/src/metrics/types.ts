export interface MetricsConfig {
  serviceName: string;
  /** Prefix for every metric name; defaults to `bloxstack`. */
  prefix?: string;
  /** Process and Node.js runtime collectors; on unless set to false. */
  collectDefaultMetrics?: boolean;
}

export const STANDARD_METRICS = {
  HTTP_REQUESTS_TOTAL: 'http_requests_total',
  HTTP_REQUEST_DURATION: 'http_request_duration_seconds',
  HTTP_ERRORS_TOTAL: 'http_errors_total',
  HTTP_ACTIVE_CONNECTIONS: 'http_active_connections',
} as const;
