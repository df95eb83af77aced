import { pgTable, serial, varchar, integer, text, timestamp, index } from 'drizzle-orm/pg-core';

export const minorReports = pgTable('minor_reports', {
  id: serial('id').primaryKey(),
  userId: varchar('user_id', { length: 32 }).notNull(),
  reporterId: varchar('reporter_id', { length: 32 }).notNull(),
  suspectedAge: integer('suspected_age').notNull(),
  evidence: text('evidence').notNull(),
  reportMessageId: varchar('report_message_id', { length: 32 }).notNull(),
  status: varchar('status', { length: 32 }).notNull().default('pending'),
  reviewerId: varchar('reviewer_id', { length: 32 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  // bans.id, without a foreign key.
  associatedBanId: integer('associated_ban_id'),
}, (table) => [
  index('minor_reports_user_status_idx').on(table.userId, table.status),
  index('minor_reports_message_idx').on(table.reportMessageId),
]);

export const minorReviewReviewers = pgTable('minor_review_reviewers', {
  id: serial('id').primaryKey(),
  userId: varchar('user_id', { length: 32 }).unique().notNull(),
  addedBy: varchar('added_by', { length: 32 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
