import { pgTable, serial, varchar, integer, timestamp } from 'drizzle-orm/pg-core';

/** Links a Discord account to the external platform account it verified with. */
export const accountLinks = pgTable('account_links', {
  id: serial('id').primaryKey(),
  discordUserId: varchar('discord_user_id', { length: 32 }).unique().notNull(),
  accountIdentifier: varchar('account_identifier', { length: 64 }).notNull(),
  profileUserId: integer('profile_user_id'),
  linkedAt: timestamp('linked_at', { withTimezone: true }).notNull().defaultNow(),
});
