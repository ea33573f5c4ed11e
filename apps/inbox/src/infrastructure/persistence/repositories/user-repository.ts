/**
 * User Repository
 *
 * Loads User aggregates as change-tracking proxies bound to one unit of
 * work. Every load builds fresh entities; there is no identity map.
 */

import { asc, eq } from 'drizzle-orm';
import type { UnitOfWork } from '@inkpost/domain-core';
import { NotFoundError, resolveDb, runStatement, type Db, type TransactionContext } from '@inkpost/persistence';
import { Message, User } from '../../../domain/index.js';
import type { InboxEntities } from '../entity-kinds.js';
import { UserProxy } from '../proxies/index.js';
import { messages, users } from '../schema/index.js';

export interface UserRepository {
	/**
	 * Load a user and its messages in one joined query.
	 *
	 * @throws NotFoundError when the user is unknown or owns no messages
	 */
	withId(userId: number, tx?: TransactionContext): Promise<UserProxy>;

	/**
	 * Track a new user and its messages for insertion.
	 */
	add(user: User): UserProxy;

	/**
	 * Track a user and its messages for deletion.
	 */
	remove(user: UserProxy): void;
}

export interface UserRepositoryDeps {
	readonly db: Db;
	readonly unitOfWork: UnitOfWork<InboxEntities>;
}

export function createUserRepository(deps: UserRepositoryDeps): UserRepository {
	const { unitOfWork } = deps;

	return {
		async withId(userId: number, tx?: TransactionContext): Promise<UserProxy> {
			const rows = await runStatement('select', 'users', () =>
				resolveDb(deps.db, tx)
					.select({
						userId: users.id,
						name: users.name,
						messageId: messages.id,
						body: messages.body,
					})
					.from(users)
					.innerJoin(messages, eq(messages.userId, users.id))
					.where(eq(users.id, userId))
					.orderBy(asc(messages.id)),
			);

			const [first] = rows;
			if (!first) {
				throw new NotFoundError('User', userId);
			}

			const owned = rows.map((row) => new Message(row.messageId, row.body, row.userId));
			return new UserProxy(new User(first.userId, first.name, owned), unitOfWork);
		},

		add(user: User): UserProxy {
			unitOfWork.registerNew('user', user);
			for (const message of user.messages) {
				unitOfWork.registerNew('message', message);
			}
			return new UserProxy(user, unitOfWork);
		},

		remove(user: UserProxy): void {
			user.remove();
		},
	};
}
