/**
 * Validation Utilities
 *
 * Helper functions for common validation patterns in use cases.
 * All validation functions return Result types for consistent error handling.
 *
 * @example
 * ```typescript
 * const nameResult = validateRequired(command.name, 'name', 'NAME_REQUIRED');
 * if (Result.isFailure(nameResult)) return nameResult;
 *
 * const lengthResult = validateMaxLength(command.name, 64, 'name', 'NAME_TOO_LONG');
 * if (Result.isFailure(lengthResult)) return lengthResult;
 * ```
 */

import { Result, UseCaseError } from '@inkpost/domain-core';

/**
 * Validate that a value is not null, undefined, or a blank string.
 *
 * @param value - The value to validate
 * @param fieldName - The field name for error details
 * @param errorCode - The error code if validation fails
 * @param errorMessage - Optional custom error message
 * @returns Success with the value, or Failure with validation error
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<NonNullable<T>> {
	if (value === null || value === undefined) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	if (typeof value === 'string' && value.trim() === '') {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a string does not exceed a maximum length, counted in
 * characters (code points) as `varchar(n)` counts them.
 */
export function validateMaxLength(
	value: string,
	maxLength: number,
	fieldName: string,
	errorCode: string,
): Result<string> {
	const length = [...value].length;
	if (length > maxLength) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be ${maxLength} characters or less`, {
				field: fieldName,
				length,
				maxLength,
			}),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a number is a positive integer (identity columns).
 */
export function validatePositiveInteger(value: number, fieldName: string, errorCode: string): Result<number> {
	if (!Number.isInteger(value) || value <= 0) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be a positive integer`, {
				field: fieldName,
				value,
			}),
		);
	}

	return Result.success(value);
}
