/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Works with any drizzle PostgreSQL database (postgres.js in production,
 * PGlite in tests).
 */

import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';

/**
 * Drizzle PostgreSQL database, or a transaction scoped to one.
 */
export type Db = PgDatabase<PgQueryResultHKT>;

/**
 * Transaction context passed to mapper and repository operations.
 * Contains the database instance scoped to the current transaction.
 */
export interface TransactionContext {
	/** DrizzleORM database instance scoped to this transaction */
	readonly db: Db;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager {
	/**
	 * Execute a function within a database transaction.
	 * If the function throws, the transaction is rolled back.
	 * If the function returns, the transaction is committed.
	 *
	 * @throws Re-throws any error from the function after rolling back
	 */
	inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T>;

	/**
	 * Get the database instance (for non-transactional queries).
	 */
	readonly db: Db;
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 */
export function createTransactionManager(db: Db): TransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
	};
}

/**
 * Resolve the database instance from a transaction context or fall back to default.
 */
export function resolveDb(defaultDb: Db, tx?: TransactionContext): Db {
	return tx?.db ?? defaultDb;
}
