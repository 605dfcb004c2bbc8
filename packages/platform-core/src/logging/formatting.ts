/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';
import type { LogContext } from './types.js';

// Secret patterns to redact (key-based matching)
const SECRET_PATTERNS = [
  /authorization/i,
  /cookie/i,
  /api[-_]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /bearer/i,
  /database[-_]?url/i,
];

export function isSecretKey(key: string): boolean {
  return SECRET_PATTERNS.some(pattern => pattern.test(key));
}

/**
 * Redacts values stored under secret-bearing keys
 */
export function maskSecrets(obj: unknown, maxDepth = 3): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSecretKey(key)) {
      masked[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch (_error) {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, requestId, module: moduleCtx, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalRequestId = requestId || context?.requestId;

      const request = finalRequestId ? ` [${String(finalRequestId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${request}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.requestId = info.requestId || context.requestId;
        info.userId = info.userId || context.userId;
      }
      return safeStringify(info, 50000);
    })
  );
}
