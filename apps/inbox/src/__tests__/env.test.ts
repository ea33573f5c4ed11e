import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {
	it('should apply defaults', () => {
		expect(loadEnv({})).toEqual({
			NODE_ENV: 'development',
			LOG_LEVEL: 'info',
			LOG_PRETTY: true,
			DATABASE_URL: 'postgres://localhost:5432/inkpost',
			DATABASE_MAX_CONNECTIONS: 10,
			DATABASE_DEBUG: false,
		});
	});

	it('should parse provided values', () => {
		const env = loadEnv({
			NODE_ENV: 'production',
			LOG_LEVEL: 'warn',
			DATABASE_URL: 'postgres://db.test:5432/inbox',
			DATABASE_MAX_CONNECTIONS: '4',
			DATABASE_DEBUG: 'true',
		});

		expect(env.LOG_PRETTY).toBe(false);
		expect(env.LOG_LEVEL).toBe('warn');
		expect(env.DATABASE_URL).toBe('postgres://db.test:5432/inbox');
		expect(env.DATABASE_MAX_CONNECTIONS).toBe(4);
		expect(env.DATABASE_DEBUG).toBe(true);
	});

	it('should let LOG_PRETTY override the environment default', () => {
		expect(loadEnv({ NODE_ENV: 'development', LOG_PRETTY: 'false' }).LOG_PRETTY).toBe(false);
	});

	it('should reject a non-positive pool size', () => {
		expect(() => loadEnv({ DATABASE_MAX_CONNECTIONS: '0' })).toThrow(/DATABASE_MAX_CONNECTIONS/);
	});

	it('should reject a database URL that is not postgres', () => {
		expect(() => loadEnv({ DATABASE_URL: 'https://db.test/inbox' })).toThrow(
			'Environment validation failed:\n  DATABASE_URL: Expected a postgres:// connection URL',
		);
	});
});
