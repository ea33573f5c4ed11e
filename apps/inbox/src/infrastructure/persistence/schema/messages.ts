/**
 * Messages Database Schema
 *
 * Every message row points at its owning user.
 */

import { pgTable, integer, text, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const messages = pgTable(
	'messages',
	{
		id: integer('id').primaryKey(),
		body: text('body').notNull(),
		userId: integer('user_id')
			.notNull()
			.references(() => users.id),
	},
	(table) => [index('messages_user_id_idx').on(table.userId)],
);

// Type inference
export type MessageRecord = typeof messages.$inferSelect;
export type NewMessageRecord = typeof messages.$inferInsert;
