/**
 * @inkpost/persistence
 *
 * Database persistence layer using DrizzleORM over PostgreSQL.
 *
 * Key components:
 * - Database connection and configuration
 * - Transaction management
 * - Mapper contract and mapper registry
 * - Drizzle unit of work for batched, atomic commits
 * - Change-tracking proxy base
 * - Persistence errors
 *
 * @example
 * ```typescript
 * import {
 *     createDatabase,
 *     createTransactionManager,
 *     createMapperRegistry,
 *     createUnitOfWork,
 * } from '@inkpost/persistence';
 *
 * const database = createDatabase({ url: env.DATABASE_URL });
 *
 * const mapperRegistry = createMapperRegistry<InboxEntities>();
 * mapperRegistry.register('user', createUserMapper(database.db));
 * mapperRegistry.register('message', createMessageMapper(database.db));
 *
 * const unitOfWork = createUnitOfWork({
 *     transactionManager: createTransactionManager(database.db),
 *     mapperRegistry,
 *     identify: inboxIdentity,
 * });
 * ```
 */

// Database connection
export { createDatabase, type Database, type DatabaseConfig } from './connection.js';

// Transaction management
export {
	createTransactionManager,
	resolveDb,
	type Db,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';

// Errors
export {
	PersistenceError,
	MapperNotFoundError,
	NotFoundError,
	ExecutionError,
	runStatement,
	type PersistenceErrorCode,
	type StatementOperation,
} from './errors.js';

// Mapper registry
export { createMapperRegistry, type Mapper, type MapperRegistry } from './mapper-registry.js';

// Unit of Work
export { createUnitOfWork, type DrizzleUnitOfWorkConfig } from './unit-of-work.js';

// Change tracking
export { EntityProxy } from './entity-proxy.js';
