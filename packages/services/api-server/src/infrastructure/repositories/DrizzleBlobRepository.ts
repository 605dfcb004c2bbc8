/**
 * Drizzle Blob Repository
 * Postgres-backed blob store, keyed by the unique file name
 */

import { eq, sql } from 'drizzle-orm';
import { createLogger, errorMessage, toError } from '@bloxstack/platform-core';
import type { Blob, BlobStore, SaveOutcome } from '../../domains/blob';
import { BlobNotFoundError, BlobStoreError } from '../../errors/errors';
import { blobs, type BlobRow } from '../../schema/blob-schema';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';

const logger = createLogger('drizzle-blob-repository');

export class DrizzleBlobRepository implements BlobStore {
  constructor(private readonly db: DatabaseConnection) {}

  async findByFileName(fileName: string): Promise<Blob> {
    let rows: BlobRow[];
    try {
      rows = await this.db.select().from(blobs).where(eq(blobs.fileName, fileName)).limit(1);
    } catch (error) {
      logger.error('Failed to find blob by file name', { fileName, error: errorMessage(error) });
      throw new BlobStoreError('lookup', toError(error));
    }

    const [row] = rows;
    if (!row) {
      throw new BlobNotFoundError(fileName);
    }
    return this.mapRowToBlob(row);
  }

  async save(blob: Blob): Promise<SaveOutcome> {
    const updatedAt = blob.updatedAt ?? new Date();
    try {
      const [result] = await this.db
        .insert(blobs)
        .values({
          fileName: blob.fileName,
          mimeType: blob.mimeType,
          file: blob.content,
          updatedAt,
        })
        .onConflictDoUpdate({
          target: blobs.fileName,
          set: {
            mimeType: blob.mimeType,
            file: blob.content,
            updatedAt,
          },
        })
        // xmax is zero only for rows this statement inserted
        .returning({ inserted: sql<boolean>`(xmax = 0)` });

      return result?.inserted ? 'created' : 'updated';
    } catch (error) {
      logger.error('Failed to save blob', { fileName: blob.fileName, error: errorMessage(error) });
      throw new BlobStoreError('save', toError(error));
    }
  }

  private mapRowToBlob(row: BlobRow): Blob {
    return {
      fileName: row.fileName,
      content: row.file,
      mimeType: row.mimeType,
      updatedAt: row.updatedAt,
    };
  }
}
