/**
 * Demonstration data. Rows that already exist are left untouched.
 */

import { runStatement, type Db } from '@inkpost/persistence';
import { messages, users, type NewMessageRecord, type NewUserRecord } from './infrastructure/persistence/index.js';

export const seedUsers: readonly NewUserRecord[] = [
	{ id: 1, name: 'bob' },
	{ id: 2, name: 'sam' },
	{ id: 3, name: 'von' },
];

export const seedMessages: readonly NewMessageRecord[] = [
	{ id: 1, body: 'body 1', userId: 1 },
	{ id: 2, body: 'body 2', userId: 1 },
	{ id: 3, body: 'body 3', userId: 1 },
	{ id: 4, body: 'body 4', userId: 2 },
];

export async function seedInbox(db: Db): Promise<void> {
	await runStatement('insert', 'users', () => db.insert(users).values([...seedUsers]).onConflictDoNothing());
	await runStatement('insert', 'messages', () =>
		db.insert(messages).values([...seedMessages]).onConflictDoNothing(),
	);
}
