/**
 * In-Memory Blob Repository
 * Used when no database is configured, and by tests
 */

import type { Blob, BlobStore, SaveOutcome } from '../../domains/blob';
import { BlobNotFoundError } from '../../errors/errors';

export class InMemoryBlobRepository implements BlobStore {
  private blobs: Map<string, Blob> = new Map();

  constructor(initial: Blob[] = []) {
    for (const blob of initial) {
      this.blobs.set(blob.fileName, copyBlob(blob, blob.updatedAt ?? new Date()));
    }
  }

  async findByFileName(fileName: string): Promise<Blob> {
    const blob = this.blobs.get(fileName);
    if (!blob) {
      throw new BlobNotFoundError(fileName);
    }
    return copyBlob(blob, blob.updatedAt);
  }

  async save(blob: Blob): Promise<SaveOutcome> {
    const outcome: SaveOutcome = this.blobs.has(blob.fileName) ? 'updated' : 'created';
    this.blobs.set(blob.fileName, copyBlob(blob, blob.updatedAt ?? new Date()));
    return outcome;
  }

  get size(): number {
    return this.blobs.size;
  }
}

function copyBlob(blob: Blob, updatedAt: Date | undefined): Blob {
  return {
    fileName: blob.fileName,
    content: Buffer.from(blob.content),
    mimeType: blob.mimeType,
    updatedAt,
  };
}
