/**
 * Inbox composition root.
 *
 * Wires mappers, the unit of work, the repository and the use case around
 * one database handle. Call `createInbox` once per logical transaction: the
 * unit of work it builds must not be shared.
 */

import type { UseCase } from '@inkpost/application';
import type { UnitOfWork } from '@inkpost/domain-core';
import { getLogger, type Logger } from '@inkpost/logging';
import {
	createMapperRegistry,
	createTransactionManager,
	createUnitOfWork,
	type Db,
	type MapperRegistry,
} from '@inkpost/persistence';

import { createEditUserUseCase, type EditUserCommand, type UserEdited } from './application/edit-user/index.js';
import {
	createMessageMapper,
	createUserMapper,
	createUserRepository,
	inboxFlushOrder,
	inboxIdentity,
	type InboxEntities,
	type MessageMapper,
	type UserMapper,
	type UserRepository,
} from './infrastructure/persistence/index.js';

export interface Inbox {
	readonly mappers: {
		readonly user: UserMapper;
		readonly message: MessageMapper;
	};
	readonly mapperRegistry: MapperRegistry<InboxEntities>;
	readonly unitOfWork: UnitOfWork<InboxEntities>;
	readonly userRepository: UserRepository;
	readonly editUser: UseCase<EditUserCommand, UserEdited>;
}

export interface InboxOptions {
	readonly logger?: Logger;
}

export function createInbox(db: Db, options: InboxOptions = {}): Inbox {
	const logger = options.logger ?? getLogger();

	const messageMapper = createMessageMapper(db);
	const userMapper = createUserMapper(db, messageMapper);

	const mapperRegistry = createMapperRegistry<InboxEntities>();
	mapperRegistry.register('user', userMapper);
	mapperRegistry.register('message', messageMapper);

	const unitOfWork = createUnitOfWork({
		transactionManager: createTransactionManager(db),
		mapperRegistry,
		identify: inboxIdentity,
		flushOrder: inboxFlushOrder,
		logger,
	});

	const userRepository = createUserRepository({ db, unitOfWork });

	return {
		mappers: { user: userMapper, message: messageMapper },
		mapperRegistry,
		unitOfWork,
		userRepository,
		editUser: createEditUserUseCase({ userRepository, unitOfWork, logger }),
	};
}

export * from './domain/index.js';
export * from './application/edit-user/index.js';
export * from './infrastructure/persistence/index.js';
export { seedInbox } from './seed.js';
