import { CommonEnvSchemas, parseEnv, z } from '@inkpost/config';

/**
 * Inbox environment configuration
 */
export const envSchema = z.object({
	NODE_ENV: CommonEnvSchemas.nodeEnv,

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.optional(),

	// Database
	DATABASE_URL: CommonEnvSchemas.postgresUrl.default('postgres://localhost:5432/inkpost'),
	DATABASE_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.prefault('10'),
	DATABASE_DEBUG: CommonEnvSchemas.boolean,
});

export type InboxEnv = z.infer<typeof envSchema>;

/**
 * Parse the inbox environment. Pretty logs default to on in development.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): InboxEnv {
	const parsedEnv = parseEnv(envSchema, source);
	return {
		...parsedEnv,
		LOG_PRETTY: parsedEnv.LOG_PRETTY ?? parsedEnv.NODE_ENV === 'development',
	};
}
