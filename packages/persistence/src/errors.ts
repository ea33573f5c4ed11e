/**
 * Persistence Errors
 *
 * Failures raised by the registry, repositories and mappers. They are
 * thrown, never wrapped in a Result: use cases translate the ones they
 * expect (NotFoundError) and let the others propagate.
 */

import type { EntityId } from '@inkpost/domain-core';

/**
 * Stable error codes for persistence failures.
 */
export type PersistenceErrorCode = 'MAPPER_NOT_FOUND' | 'NOT_FOUND' | 'EXECUTION_FAILED';

/**
 * Statement kinds issued by mappers and repositories.
 */
export type StatementOperation = 'select' | 'insert' | 'update' | 'delete' | 'schema';

/**
 * Base class for persistence failures.
 */
export abstract class PersistenceError extends Error {
	abstract readonly code: PersistenceErrorCode;
}

/**
 * No mapper is registered for an entity kind. A configuration error:
 * retrying cannot succeed.
 */
export class MapperNotFoundError extends PersistenceError {
	override readonly code = 'MAPPER_NOT_FOUND';

	constructor(
		public readonly kind: string,
		public readonly registeredKinds: readonly string[],
	) {
		super(
			`No mapper registered for entity kind: ${kind}. ` +
				`Registered kinds: ${registeredKinds.length > 0 ? registeredKinds.join(', ') : '(none)'}`,
		);
		this.name = 'MapperNotFoundError';
	}
}

/**
 * A load matched no rows.
 */
export class NotFoundError extends PersistenceError {
	override readonly code = 'NOT_FOUND';

	constructor(
		public readonly entity: string,
		public readonly id: EntityId | string,
	) {
		super(`${entity} not found: ${id}`);
		this.name = 'NotFoundError';
	}
}

/**
 * The store rejected a statement. The driver error is kept as `cause`.
 */
export class ExecutionError extends PersistenceError {
	override readonly code = 'EXECUTION_FAILED';

	constructor(
		public readonly operation: StatementOperation,
		public readonly table: string,
		cause: unknown,
	) {
		super(`Failed to ${operation} ${table}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
		this.name = 'ExecutionError';
	}
}

/**
 * Run a statement, wrapping driver failures in an ExecutionError.
 *
 * @example
 * ```typescript
 * await runStatement('update', 'users', () => db.execute(statement));
 * ```
 */
export async function runStatement<T>(
	operation: StatementOperation,
	table: string,
	statement: () => Promise<T>,
): Promise<T> {
	try {
		return await statement();
	} catch (error) {
		if (error instanceof PersistenceError) {
			throw error;
		}
		throw new ExecutionError(operation, table, error);
	}
}
