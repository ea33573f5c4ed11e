import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { NotFoundError } from '@inkpost/persistence';
import { createInbox, type Inbox } from '../composition.js';
import { Message, User } from '../domain/index.js';
import { createTestDatabase, silentLogger, type TestDatabase } from './test-database.js';

describe('UserRepository', () => {
	let database: TestDatabase;
	let inbox: Inbox;

	beforeAll(async () => {
		database = await createTestDatabase();
	});

	beforeEach(async () => {
		await database.reset();
		inbox = createInbox(database.db, { logger: silentLogger });
	});

	afterAll(async () => {
		await database.close();
	});

	it('should load a user with message proxies in id order', async () => {
		const user = await inbox.userRepository.withId(1);

		expect(user.userId).toBe(1);
		expect(user.name).toBe('bob');
		expect(user.messages.map((message) => message.messageId)).toEqual([1, 2, 3]);
		expect(user.messages.map((message) => message.body)).toEqual(['body 1', 'body 2', 'body 3']);
		expect(inbox.unitOfWork.hasChanges()).toBe(false);
	});

	it('should build fresh objects on every load', async () => {
		const first = await inbox.userRepository.withId(1);
		const second = await inbox.userRepository.withId(1);

		first.rename('changed in memory');

		expect(second).not.toBe(first);
		expect(second.name).toBe('bob');
	});

	it('should throw NotFoundError for a user without messages', async () => {
		await expect(inbox.userRepository.withId(3)).rejects.toMatchObject({
			code: 'NOT_FOUND',
			entity: 'User',
			id: 3,
		});
	});

	it('should throw NotFoundError for an unknown user', async () => {
		const failure = inbox.userRepository.withId(42);

		await expect(failure).rejects.toBeInstanceOf(NotFoundError);
		await expect(failure).rejects.toThrow('User not found: 42');
	});

	it('should insert an added user and its messages on commit', async () => {
		const user = inbox.userRepository.add(new User(5, 'kim', [new Message(20, 'hello', 5)]));
		user.rename('kimberly');

		expect(inbox.unitOfWork.pending()).toEqual({ new: 2, dirty: 0, removed: 0 });

		const summary = await inbox.unitOfWork.commit();

		expect(summary).toEqual({ inserted: 2, updated: 0, deleted: 0 });
		const stored = await inbox.mappers.user.withId(5);
		expect(stored?.name).toBe('kimberly');
		expect(stored?.messages.map((message) => message.body)).toEqual(['hello']);
	});

	it('should delete a removed user and its messages on commit', async () => {
		const user = await inbox.userRepository.withId(2);

		inbox.userRepository.remove(user);
		const summary = await inbox.unitOfWork.commit();

		expect(summary).toEqual({ inserted: 0, updated: 0, deleted: 2 });
		expect(await inbox.mappers.user.withId(2)).toBeUndefined();
		expect(await inbox.mappers.message.withId(4)).toBeUndefined();
	});
});
