/**
 * Create the inbox tables when they are missing.
 *
 * Statements run one at a time: the extended query protocol used by the
 * drivers accepts a single statement per call.
 */

import { sql } from 'drizzle-orm';
import { runStatement, type Db } from '@inkpost/persistence';

const statements = [
	sql`create table if not exists users (
		id integer primary key,
		name varchar(64) not null
	)`,
	sql`create table if not exists messages (
		id integer primary key,
		body text not null,
		user_id integer not null references users (id)
	)`,
	sql`create index if not exists messages_user_id_idx on messages (user_id)`,
];

export async function ensureSchema(db: Db): Promise<void> {
	for (const statement of statements) {
		await runStatement('schema', 'inbox', () => db.execute(statement));
	}
}
