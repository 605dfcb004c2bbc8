import { createLogger, errorMessage } from '@bloxstack/platform-core';
import type { Blob, BlobStore } from '../../domains/blob';
import { BlobNotFoundError } from '../../errors/errors';
import { renderAvatarSvg } from './avatars';
import type { SeedResult } from './types';

const logger = createLogger('blob-seeder');

export const DEFAULT_AVATAR_NAMES = ['ada', 'grace', 'linus', 'margaret', 'ken'];

export function buildSampleBlobs(avatarNames: readonly string[] = DEFAULT_AVATAR_NAMES): Blob[] {
  const readme = [
    '# Sample blobs',
    '',
    'Seeded by `--db-seed`. Fetch any of these through `GET /api/blobs/<file name>`.',
    '',
    ...avatarNames.map(name => `- avatar-${name}.svg`),
    '',
  ].join('\n');

  return [
    { fileName: 'README.md', content: Buffer.from(readme, 'utf8'), mimeType: 'text/markdown' },
    ...avatarNames.map(name => ({
      fileName: `avatar-${name}.svg`,
      content: Buffer.from(renderAvatarSvg(name), 'utf8'),
      mimeType: 'image/svg+xml',
    })),
  ];
}

async function findExisting(store: BlobStore, fileName: string): Promise<Blob | undefined> {
  try {
    return await store.findByFileName(fileName);
  } catch (error) {
    if (error instanceof BlobNotFoundError) return undefined;
    throw error;
  }
}

/**
 * Writes the sample blobs; blobs whose bytes and type are already stored are
 * skipped.
 */
export async function seedBlobs(store: BlobStore, avatarNames?: readonly string[]): Promise<SeedResult> {
  const result: SeedResult = { created: 0, updated: 0, skipped: 0, details: [] };

  for (const blob of buildSampleBlobs(avatarNames)) {
    try {
      const existing = await findExisting(store, blob.fileName);
      if (existing && existing.mimeType === blob.mimeType && existing.content.equals(blob.content)) {
        result.skipped++;
        result.details?.push(`skipped ${blob.fileName}`);
        continue;
      }

      const outcome = await store.save(blob);
      result[outcome]++;
      result.details?.push(`${outcome} ${blob.fileName}`);
    } catch (error) {
      logger.error('Failed to seed blob', { fileName: blob.fileName, error: errorMessage(error) });
      throw error;
    }
  }

  logger.info('Blob seeding complete', {
    created: result.created,
    updated: result.updated,
    skipped: result.skipped,
  });
  return result;
}
