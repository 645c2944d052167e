import { pgTable, uuid, varchar, text, timestamp, jsonb, integer, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `workflow_archive` table.
 *
 * One row per retired workflow run. An entity that is worked on again
 * after retiring gets a new row; `archive_id` is server-generated.
 * `history` and `context` are stored as the status snapshot has them.
 */
export const workflowArchive = pgTable('workflow_archive', {
  archive_id: uuid('archive_id').primaryKey(),
  entity_id: varchar('entity_id', { length: 255 }).notNull(),
  correlation_id: uuid('correlation_id').notNull(),
  final_state: varchar('final_state', { length: 32 }).notNull(),
  outcome: varchar('outcome', { length: 16 }).notNull(),
  failure_reason: text('failure_reason'),
  retry_count: integer('retry_count').notNull(),
  error_count: integer('error_count').notNull(),
  history: jsonb('history').notNull().default([]),
  context: jsonb('context').notNull().default({}),
  started_at: timestamp('started_at', { withTimezone: true }).notNull(),
  completed_at: timestamp('completed_at', { withTimezone: true }).notNull(),
  archived_at: timestamp('archived_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_workflow_archive_entity_id').on(table.entity_id),
  index('idx_workflow_archive_outcome').on(table.outcome),
  index('idx_workflow_archive_completed_at').on(table.completed_at),
]);
