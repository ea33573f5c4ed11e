/**
 * Result Type for Use Case Execution
 *
 * A discriminated union with two variants:
 * - Success<T> - contains the successful result value
 * - Failure<T> - contains the error details
 *
 * Use cases return failures for expected problems (validation, missing
 * entities) and success once the unit of work has committed:
 * ```typescript
 * if (command.name === '') {
 *     return Result.failure(UseCaseError.validation('NAME_REQUIRED', 'Name is required'));
 * }
 *
 * const summary = await unitOfWork.commit();
 * return Result.success({ userId: command.userId, summary });
 * ```
 */

import type { UseCaseError } from './errors.js';

/**
 * Successful result containing the value.
 */
export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

/**
 * Failed result containing the error.
 */
export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
}

/**
 * Result type - either Success or Failure.
 */
export type Result<T> = Success<T> | Failure<T>;

/**
 * Type guard to check if a result is a success.
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

/**
 * Type guard to check if a result is a failure.
 */
export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

/**
 * Result factory functions.
 */
export const Result = {
	/**
	 * Create a successful result.
	 */
	success<T>(value: T): Success<T> {
		return { _tag: 'success', value };
	},

	/**
	 * Create a failed result.
	 */
	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,

	/**
	 * Get the value from a success result, or throw an error.
	 *
	 * @throws Error if the result is a failure
	 */
	unwrap<T>(result: Result<T>): T {
		if (isSuccess(result)) {
			return result.value;
		}
		throw new Error(`Cannot unwrap failure result: ${result.error.code} - ${result.error.message}`);
	},

};
