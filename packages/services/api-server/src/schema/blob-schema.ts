/**
 * Blob Database Schema
 */

import { customType, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

const bytea = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return 'bytea';
  },
});

export const blobs = pgTable('blobs', {
  id: uuid('id').primaryKey().defaultRandom(),
  fileName: text('file_name').notNull().unique(),
  mimeType: text('mime_type'),
  file: bytea('file').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export type BlobRow = typeof blobs.$inferSelect;
export type NewBlobRow = typeof blobs.$inferInsert;
