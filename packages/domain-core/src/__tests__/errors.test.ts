import { describe, it, expect } from 'vitest';
import { UseCaseError } from '../errors.js';

describe('UseCaseError', () => {
	describe('validation', () => {
		it('should create a validation error', () => {
			const error = UseCaseError.validation('NAME_TOO_LONG', 'Name must be 64 characters or less', { length: 80 });

			expect(error.type).toBe('validation');
			expect(error.code).toBe('NAME_TOO_LONG');
			expect(error.message).toBe('Name must be 64 characters or less');
			expect(error.details).toEqual({ length: 80 });
		});

		it('should default to empty details', () => {
			const error = UseCaseError.validation('REQUIRED', 'Field is required');
			expect(error.details).toEqual({});
		});
	});

	describe('notFound', () => {
		it('should create a not found error', () => {
			const error = UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userId: 7 });

			expect(error.type).toBe('not_found');
			expect(error.code).toBe('USER_NOT_FOUND');
			expect(error.message).toBe('User not found');
			expect(error.details).toEqual({ userId: 7 });
		});
	});
});
