/**
 * Contracts Schema
 * Versioned, signable contracts generated from a proposal.
 *
 * Business Context:
 * A proposal may accumulate many contract versions; only one of them is the
 * current (active) version. Older versions are kept as history and are only
 * removed by an explicit delete.
 */

import { pgTable, serial, text, integer, timestamp, varchar, boolean, index, uniqueIndex, foreignKey } from 'drizzle-orm/pg-core';
import { relations, sql } from 'drizzle-orm';
import { proposals } from './schema';

/**
 * Contracts Table
 */
export const contracts = pgTable('contracts', {
  // Primary Key
  id: serial('id').primaryKey(),

  // Relationships
  proposalId: integer('proposal_id').notNull(),

  // Versioning
  isActive: boolean('is_active').default(true).notNull(),
  version: integer('version').default(1).notNull(),

  // Client signing
  clientName: varchar('client_name', { length: 255 }).notNull(),
  clientSignature: varchar('client_signature', { length: 500 }), // Stored blob path
  clientInitials: varchar('client_initials', { length: 10 }).default('').notNull(),
  clientSignedAt: timestamp('client_signed_at', { precision: 3, withTimezone: true }),

  // Contractor signing
  contractorName: varchar('contractor_name', { length: 255 }).notNull(),
  contractorSignature: varchar('contractor_signature', { length: 500 }), // Stored blob path
  contractorInitials: varchar('contractor_initials', { length: 10 }).default('').notNull(),
  contractorSignedAt: timestamp('contractor_signed_at', { precision: 3, withTimezone: true }),

  // Contract Details
  termsAndConditions: text('terms_and_conditions').notNull(),

  // Audit Trail
  createdAt: timestamp('created_at', { precision: 3, withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('contracts_proposal_id_idx').on(table.proposalId),
  uniqueIndex('contracts_proposal_version_key').on(table.proposalId, table.version),
  // At most one current version per proposal
  uniqueIndex('contracts_one_active_per_proposal').on(table.proposalId).where(sql`${table.isActive}`),
  foreignKey({
    columns: [table.proposalId],
    foreignColumns: [proposals.id],
    name: 'contracts_proposal_id_fkey'
  }).onUpdate('cascade').onDelete('cascade'),
]);

export const contractsRelations = relations(contracts, ({ one }) => ({
  proposal: one(proposals, {
    fields: [contracts.proposalId],
    references: [proposals.id],
  }),
}));

export type ContractRow = typeof contracts.$inferSelect;
