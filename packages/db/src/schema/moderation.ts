import { pgTable, serial, varchar, text, bigint, boolean, timestamp, date } from 'drizzle-orm/pg-core';

export const bans = pgTable('bans', {
  id: serial('id').primaryKey(),
  userId: varchar('user_id', { length: 32 }).notNull(),
  reason: text('reason').notNull(),
  moderatorId: varchar('moderator_id', { length: 32 }),
  // Epoch seconds; ban ends for young members fall past 2038.
  unbanTime: bigint('unban_time', { mode: 'number' }).notNull(),
  approved: boolean('approved').notNull().default(false),
  unbanned: boolean('unbanned').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const mutes = pgTable('mutes', {
  id: serial('id').primaryKey(),
  userId: varchar('user_id', { length: 32 }).notNull(),
  reason: text('reason').notNull(),
  moderatorId: varchar('moderator_id', { length: 32 }),
  unmuteTime: bigint('unmute_time', { mode: 'number' }).notNull(),
});

export const userNotes = pgTable('user_notes', {
  id: serial('id').primaryKey(),
  userId: varchar('user_id', { length: 32 }).notNull(),
  note: text('note').notNull(),
  moderatorId: varchar('moderator_id', { length: 32 }).notNull(),
  date: date('date', { mode: 'string' }).notNull(),
});
