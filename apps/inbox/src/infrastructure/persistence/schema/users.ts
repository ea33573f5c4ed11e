/**
 * Users Database Schema
 */

import { pgTable, integer, varchar } from 'drizzle-orm/pg-core';

export const users = pgTable('users', {
	id: integer('id').primaryKey(),
	name: varchar('name', { length: 64 }).notNull(),
});

// Type inference
export type UserRecord = typeof users.$inferSelect;
export type NewUserRecord = typeof users.$inferInsert;
