import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getLogger, sendEnvelope, errorMessage } from '@bloxstack/platform-core';
import { effectiveMimeType, type BlobStore } from '../../domains/blob';
import { serveContent } from '../utils/content-delivery';

const logger = getLogger('api-server:blobs');

export class BlobController {
  constructor(private readonly store: BlobStore) {}

  /**
   * GET /blobs/:blob_id. Any lookup failure answers 400 with the envelope.
   */
  getBlob(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const fileName = req.params.blob_id;
      this.store.findByFileName(fileName).then(
        blob => {
          serveContent(req, res, {
            fileName: blob.fileName,
            content: blob.content,
            contentType: effectiveMimeType(blob),
            lastModified: blob.updatedAt ?? new Date(),
          });
        },
        (error: unknown) => {
          logger.warn('Blob lookup failed', { requestId: req.requestId, fileName, error: errorMessage(error) });
          sendEnvelope(res, 400, error);
        }
      ).catch(next);
    };
  }
}
