/**
 * Range-aware delivery of an in-memory body, with conditional request
 * handling keyed on Last-Modified.
 */

import { extname } from 'path';
import contentDisposition from 'content-disposition';
import type { Request, Response } from 'express';

export interface DeliverableContent {
  fileName: string;
  content: Buffer;
  /** Already filtered: undefined means derive from the file name. */
  contentType?: string;
  lastModified: Date;
}

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;
const NON_PRINTABLE_ASCII = /[^\x20-\x7e]/g;

/**
 * `attachment;filename=<name>` for printable ASCII names; anything else gets
 * an ASCII fallback plus `filename*` (RFC 5987).
 */
export function attachmentDisposition(fileName: string): string {
  if (PRINTABLE_ASCII.test(fileName)) {
    return `attachment;filename=${fileName}`;
  }
  return contentDisposition(fileName, { type: 'attachment', fallback: fileName.replace(NON_PRINTABLE_ASCII, '?') });
}

// HTTP dates carry whole seconds.
function toHttpSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function parseHttpDate(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : Math.floor(parsed / 1000);
}

function isPreconditionFailed(req: Request, lastModified: Date): boolean {
  const unmodifiedSince = parseHttpDate(req.get('If-Unmodified-Since'));
  return unmodifiedSince !== undefined && toHttpSeconds(lastModified) > unmodifiedSince;
}

/**
 * If-Range holding an entity tag never matches: no ETags are issued.
 */
function rangeStillValid(req: Request, lastModified: Date): boolean {
  const ifRange = req.get('If-Range');
  if (!ifRange) return true;
  const since = parseHttpDate(ifRange);
  return since !== undefined && since === toHttpSeconds(lastModified);
}

export function serveContent(req: Request, res: Response, source: DeliverableContent): void {
  const { content, lastModified } = source;
  const size = content.length;

  res.setHeader('Accept-Ranges', 'bytes');
  res.setHeader('Last-Modified', lastModified.toUTCString());
  res.setHeader('Content-Disposition', attachmentDisposition(source.fileName));
  if (source.contentType) {
    res.setHeader('Content-Type', source.contentType);
  } else {
    res.type(extname(source.fileName) || FALLBACK_CONTENT_TYPE);
  }

  if (isPreconditionFailed(req, lastModified)) {
    res.status(412).end();
    return;
  }

  if (req.fresh) {
    res.status(304).end();
    return;
  }

  const ranges = req.get('Range') && rangeStillValid(req, lastModified) ? req.range(size, { combine: true }) : undefined;

  if (ranges === -1) {
    res.setHeader('Content-Range', `bytes */${size}`);
    res.status(416).end();
    return;
  }

  // Malformed headers, other units and multi-range requests get the whole body.
  if (ranges !== undefined && ranges !== -2 && ranges.type === 'bytes' && ranges.length === 1) {
    const [{ start, end }] = ranges;
    const slice = content.subarray(start, end + 1);
    res.status(206);
    res.setHeader('Content-Range', `bytes ${start}-${end}/${size}`);
    res.setHeader('Content-Length', slice.length);
    res.end(slice);
    return;
  }

  res.status(200);
  res.setHeader('Content-Length', size);
  res.end(content);
}
