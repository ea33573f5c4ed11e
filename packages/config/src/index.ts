/**
 * @inkpost/config
 *
 * Environment parsing on zod. Values from a local .env file are loaded into
 * process.env before any schema runs.
 */

import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables against a schema.
 *
 * @throws Error listing every invalid variable, one per line
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Schemas shared by the services' env files.
 *
 * In zod v4 `.default()` on a transformed schema takes the OUTPUT type;
 * `.prefault()` takes the raw string and runs it through the transform.
 */
export const CommonEnvSchemas = {
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** 'true' or '1' */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** postgres:// or postgresql:// connection URL */
	postgresUrl: z.url({ protocol: /^postgres(ql)?$/, error: 'Expected a postgres:// connection URL' }),

	nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
};
