import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
	createMapperRegistry,
	createTransactionManager,
	createUnitOfWork,
	ExecutionError,
} from '@inkpost/persistence';
import { createInbox, type Inbox } from '../composition.js';
import { User } from '../domain/index.js';
import {
	createMessageMapper,
	createUserMapper,
	createUserRepository,
	inboxFlushOrder,
	inboxIdentity,
	type InboxEntities,
} from '../infrastructure/persistence/index.js';
import { createTestDatabase, silentLogger, type TestDatabase } from './test-database.js';

describe('Inbox unit of work', () => {
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

	it('should register a message edited through its user and persist it', async () => {
		const user = await inbox.userRepository.withId(1);

		user.editMessage(2, 'edited through the user');

		expect(inbox.unitOfWork.pending()).toEqual({ new: 0, dirty: 1, removed: 0 });
		await inbox.unitOfWork.commit();
		expect((await inbox.mappers.message.withId(2))?.body).toBe('edited through the user');
		expect((await inbox.mappers.user.withId(1))?.name).toBe('bob');
	});

	it('should register nothing for an unknown message id', async () => {
		const user = await inbox.userRepository.withId(1);

		user.editMessage(4, 'not owned');

		expect(inbox.unitOfWork.hasChanges()).toBe(false);
	});

	it('should coalesce repeated edits of one message into one update', async () => {
		const user = await inbox.userRepository.withId(1);

		user.editMessage(1, 'first');
		user.messages[0]?.edit('second');

		expect(inbox.unitOfWork.pending()).toEqual({ new: 0, dirty: 1, removed: 0 });
		expect(await inbox.unitOfWork.commit()).toEqual({ inserted: 0, updated: 1, deleted: 0 });
		expect((await inbox.mappers.message.withId(1))?.body).toBe('second');
	});

	it('should insert a posted message without updating its user', async () => {
		const user = await inbox.userRepository.withId(2);

		const posted = user.postMessage(10, 'fresh');

		expect(posted.userId).toBe(2);
		expect(user.messages.map((message) => message.messageId)).toEqual([4, 10]);
		expect(await inbox.unitOfWork.commit()).toEqual({ inserted: 1, updated: 0, deleted: 0 });
		expect((await inbox.mappers.message.ofUser(2)).map((message) => message.body)).toEqual(['body 4', 'fresh']);
	});

	it('should register nothing when posting a duplicate message id', async () => {
		const user = await inbox.userRepository.withId(1);

		expect(() => user.postMessage(1, 'again')).toThrow('User 1 already owns message 1');
		expect(inbox.unitOfWork.hasChanges()).toBe(false);
	});

	it('should insert a new user before its messages', async () => {
		const user = await inbox.userRepository.withId(2);
		const newUser = inbox.userRepository.add(new User(9, 'zed'));
		newUser.postMessage(30, 'first post');
		user.rename('samuel');

		expect(await inbox.unitOfWork.commit()).toEqual({ inserted: 2, updated: 1, deleted: 0 });
		expect((await inbox.mappers.user.withId(9))?.messages.map((message) => message.body)).toEqual(['first post']);
		expect((await inbox.mappers.user.withId(2))?.name).toBe('samuel');
	});

	it('should roll back earlier writes when the store rejects a later statement', async () => {
		const sam = await inbox.userRepository.withId(2);

		sam.editMessage(4, 'rolled back');
		// User 1 still owns messages 1-3, so deleting the row violates the foreign key
		inbox.unitOfWork.registerRemoved('user', new User(1, 'bob'));

		const failure = inbox.unitOfWork.commit();

		await expect(failure).rejects.toBeInstanceOf(ExecutionError);
		await expect(failure).rejects.toMatchObject({ operation: 'delete', table: 'users' });
		expect((await inbox.mappers.message.withId(4))?.body).toBe('body 4');
		expect(await inbox.mappers.user.withId(1)).toBeDefined();
		expect(inbox.unitOfWork.pending()).toEqual({ new: 0, dirty: 1, removed: 1 });
	});

	it('should roll back flushed kinds when a later mapper fails', async () => {
		const messageMapper = createMessageMapper(database.db);
		const mapperRegistry = createMapperRegistry<InboxEntities>();
		mapperRegistry.register('user', createUserMapper(database.db, messageMapper));
		mapperRegistry.register('message', {
			addAll: (entities, tx) => messageMapper.addAll(entities, tx),
			deleteAll: (entities, tx) => messageMapper.deleteAll(entities, tx),
			updateAll: () => Promise.reject(new ExecutionError('update', 'messages', new Error('disk full'))),
		});
		const unitOfWork = createUnitOfWork({
			transactionManager: createTransactionManager(database.db),
			mapperRegistry,
			identify: inboxIdentity,
			flushOrder: inboxFlushOrder,
			logger: silentLogger,
		});
		const user = await createUserRepository({ db: database.db, unitOfWork }).withId(1);

		user.rename('never stored');
		user.editMessage(1, 'never stored');

		await expect(unitOfWork.commit()).rejects.toThrow('Failed to update messages: disk full');
		expect((await inbox.mappers.user.withId(1))?.name).toBe('bob');
		expect((await messageMapper.withId(1))?.body).toBe('body 1');

		unitOfWork.clear();
		expect(unitOfWork.hasChanges()).toBe(false);
	});

	it('should delete children before their parent', async () => {
		const user = await inbox.userRepository.withId(1);

		user.remove();

		expect(inbox.unitOfWork.pending()).toEqual({ new: 0, dirty: 0, removed: 4 });
		expect(await inbox.unitOfWork.commit()).toEqual({ inserted: 0, updated: 0, deleted: 4 });
		expect(await inbox.mappers.user.withId(1)).toBeUndefined();
		expect(await inbox.mappers.message.ofUser(1)).toEqual([]);
	});
});
