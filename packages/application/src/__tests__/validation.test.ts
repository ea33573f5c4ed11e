import { describe, it, expect } from 'vitest';
import { Result } from '@inkpost/domain-core';
import { validateRequired, validateMaxLength, validatePositiveInteger } from '../validation.js';

describe('Validation', () => {
	describe('validateRequired', () => {
		it('should pass through present values', () => {
			const result = validateRequired('bob', 'name', 'NAME_REQUIRED');

			expect(Result.unwrap(result)).toBe('bob');
		});

		it('should reject null and undefined', () => {
			for (const value of [null, undefined]) {
				const result = validateRequired<string>(value, 'name', 'NAME_REQUIRED');

				expect(Result.isFailure(result)).toBe(true);
				if (Result.isFailure(result)) {
					expect(result.error.code).toBe('NAME_REQUIRED');
					expect(result.error.message).toBe('name is required');
					expect(result.error.details).toEqual({ field: 'name' });
				}
			}
		});

		it('should reject blank strings', () => {
			const result = validateRequired('   ', 'body', 'BODY_REQUIRED', 'Message body cannot be blank');

			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.message).toBe('Message body cannot be blank');
			}
		});
	});

	describe('validateMaxLength', () => {
		it('should accept strings at the limit', () => {
			expect(Result.isSuccess(validateMaxLength('abcd', 4, 'name', 'NAME_TOO_LONG'))).toBe(true);
		});

		it('should reject longer strings with length details', () => {
			const result = validateMaxLength('abcde', 4, 'name', 'NAME_TOO_LONG');

			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.message).toBe('name must be 4 characters or less');
				expect(result.error.details).toEqual({ field: 'name', length: 5, maxLength: 4 });
			}
		});

		it('should count astral characters once', () => {
			const name = 'ab\u{1F600}\u{1F600}';

			expect(name.length).toBe(6);
			expect(Result.isSuccess(validateMaxLength(name, 4, 'name', 'NAME_TOO_LONG'))).toBe(true);

			const result = validateMaxLength(`${name}c`, 4, 'name', 'NAME_TOO_LONG');
			expect(Result.isFailure(result) && result.error.details).toEqual({ field: 'name', length: 5, maxLength: 4 });
		});
	});

	describe('validatePositiveInteger', () => {
		it('should accept positive integers', () => {
			expect(Result.unwrap(validatePositiveInteger(3, 'userId', 'INVALID_USER_ID'))).toBe(3);
		});

		it('should reject zero, negatives and fractions', () => {
			for (const value of [0, -1, 1.5]) {
				expect(Result.isFailure(validatePositiveInteger(value, 'userId', 'INVALID_USER_ID'))).toBe(true);
			}
		});
	});
});
