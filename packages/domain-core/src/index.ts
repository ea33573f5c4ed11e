/**
 * @inkpost/domain-core
 *
 * Core domain infrastructure shared by every Inkpost workspace:
 * - Result type for use case outcomes
 * - Use case error types
 * - Unit of Work contract and entity-kind typing helpers
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError, type UnitOfWork } from '@inkpost/domain-core';
 *
 * if (!isValid(input)) {
 *     return Result.failure(UseCaseError.validation('INVALID', 'Invalid input'));
 * }
 *
 * const summary = await unitOfWork.commit();
 * return Result.success(summary);
 * ```
 */

// Error types
export {
	UseCaseError,
	type UseCaseErrorBase,
	type ValidationError,
	type NotFoundError,
} from './errors.js';

// Result type
export { Result, isSuccess, isFailure, type Success, type Failure } from './result.js';

// Unit of Work
export {
	type UnitOfWork,
	type EntityId,
	type KindOf,
	type IdentityTable,
	type CommitSummary,
	type PendingCounts,
} from './unit-of-work.js';
