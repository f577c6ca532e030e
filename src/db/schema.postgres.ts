import { pgTable, text, serial, index } from 'drizzle-orm/pg-core';

export const identityCache = pgTable(
  'identity_cache',
  {
    id: serial('id').primaryKey(),
    tokenHash: text('token_hash').notNull().unique(),
    identity: text('identity').notNull(), // JSON IdentityRecord
    storedAt: text('stored_at').notNull(),
    expiresAt: text('expires_at').notNull(),
  },
  (table) => ({
    expiresAtIdx: index('idx_ic_expires_at').on(table.expiresAt),
  })
);

export type InsertIdentityCacheRow = typeof identityCache.$inferInsert;
export type SelectIdentityCacheRow = typeof identityCache.$inferSelect;
