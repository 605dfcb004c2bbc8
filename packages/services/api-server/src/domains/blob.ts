/**
 * Blob domain model: a named binary object keyed by its unique file name.
 */

export interface Blob {
  fileName: string;
  content: Buffer;
  /** `null` and `"unknown"` both mean the store does not know the type. */
  mimeType: string | null;
  updatedAt?: Date;
}

export type SaveOutcome = 'created' | 'updated';

export interface BlobStore {
  /** Rejects with BlobNotFoundError when no blob has this file name. */
  findByFileName(fileName: string): Promise<Blob>;
  save(blob: Blob): Promise<SaveOutcome>;
}

export const UNKNOWN_MIME_TYPE = 'unknown';

export function effectiveMimeType(blob: Pick<Blob, 'mimeType'>): string | undefined {
  const { mimeType } = blob;
  if (mimeType === null || mimeType.length === 0 || mimeType === UNKNOWN_MIME_TYPE) {
    return undefined;
  }
  return mimeType;
}
