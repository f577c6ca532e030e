import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const identityCache = sqliteTable(
  'identity_cache',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tokenHash: text('token_hash').notNull().unique(),
    identity: text('identity').notNull(), // JSON IdentityRecord
    storedAt: text('stored_at').notNull(),
    expiresAt: text('expires_at').notNull(),
  },
  (table) => ({
    // Note: tokenHash already has implicit index from UNIQUE constraint
    expiresAtIdx: index('idx_ic_expires_at').on(table.expiresAt),
  })
);

export type InsertIdentityCacheRow = typeof identityCache.$inferInsert;
export type SelectIdentityCacheRow = typeof identityCache.$inferSelect;
