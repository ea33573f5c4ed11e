/**
 * Use Case Error Types
 *
 * Sealed error hierarchy for expected use case failures. Infrastructure
 * failures (missing mappers, rejected statements) are thrown instead and
 * never appear here.
 */

/**
 * Base interface for all use case errors.
 */
export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Input validation failed (missing required fields, values too long, etc.)
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

/**
 * Entity not found.
 */
export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * Union type for all use case errors.
 */
export type UseCaseError = ValidationError | NotFoundError;

/**
 * Factory functions for creating errors.
 */
export const UseCaseError = {
	/**
	 * Create a validation error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.validation('NAME_TOO_LONG', 'Name must be 64 characters or less', { length: 80 })
	 * ```
	 */
	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	/**
	 * Create a not found error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userId: 7 })
	 * ```
	 */
	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},
};
