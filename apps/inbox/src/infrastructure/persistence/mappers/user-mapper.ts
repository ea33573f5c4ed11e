/**
 * User Mapper
 *
 * Moves User state between memory and the users table. Loading a user
 * also loads the messages it owns, ordered by id.
 */

import { asc, eq, inArray, sql } from 'drizzle-orm';
import { resolveDb, runStatement, type Db, type Mapper, type TransactionContext } from '@inkpost/persistence';
import { User } from '../../../domain/index.js';
import { users, type NewUserRecord, type UserRecord } from '../schema/index.js';
import type { MessageMapper } from './message-mapper.js';

export interface UserMapper extends Mapper<User> {
	add(user: User, tx?: TransactionContext): Promise<void>;
	delete(user: User, tx?: TransactionContext): Promise<void>;
	withId(userId: number, tx?: TransactionContext): Promise<User | undefined>;
	withName(name: string, tx?: TransactionContext): Promise<User | undefined>;
}

/**
 * Create a User mapper. Owned messages are loaded through the message mapper.
 */
export function createUserMapper(defaultDb: Db, messageMapper: MessageMapper): UserMapper {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	async function hydrate(record: UserRecord | undefined, tx?: TransactionContext): Promise<User | undefined> {
		if (!record) return undefined;

		const owned = await messageMapper.ofUser(record.id, tx);
		return new User(record.id, record.name, owned);
	}

	return {
		async add(user: User, tx?: TransactionContext): Promise<void> {
			await this.addAll([user], tx);
		},

		async addAll(batch: readonly User[], tx?: TransactionContext): Promise<void> {
			if (batch.length === 0) return;

			const records: NewUserRecord[] = batch.map((user) => ({ id: user.userId, name: user.name }));
			await runStatement('insert', 'users', () => db(tx).insert(users).values(records));
		},

		async updateAll(batch: readonly User[], tx?: TransactionContext): Promise<void> {
			if (batch.length === 0) return;

			const latest = new Map(batch.map((user) => [user.userId, user.name]));
			const rows = sql.join(
				[...latest].map(([userId, name]) => sql`(${userId}::integer, ${name}::varchar)`),
				sql`, `,
			);

			await runStatement('update', 'users', () =>
				db(tx).execute(sql`
					update ${users}
					set ${sql.identifier(users.name.name)} = batch.name
					from (values ${rows}) as batch (id, name)
					where ${users.id} = batch.id
				`),
			);
		},

		async delete(user: User, tx?: TransactionContext): Promise<void> {
			await this.deleteAll([user], tx);
		},

		async deleteAll(batch: readonly User[], tx?: TransactionContext): Promise<void> {
			if (batch.length === 0) return;

			const ids = batch.map((user) => user.userId);
			await runStatement('delete', 'users', () => db(tx).delete(users).where(inArray(users.id, ids)));
		},

		async withId(userId: number, tx?: TransactionContext): Promise<User | undefined> {
			const [record] = await runStatement('select', 'users', () =>
				db(tx).select().from(users).where(eq(users.id, userId)).limit(1),
			);
			return hydrate(record, tx);
		},

		async withName(name: string, tx?: TransactionContext): Promise<User | undefined> {
			const [record] = await runStatement('select', 'users', () =>
				db(tx).select().from(users).where(eq(users.name, name)).orderBy(asc(users.id)).limit(1),
			);
			return hydrate(record, tx);
		},
	};
}
