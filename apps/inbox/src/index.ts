/**
 * Inbox demonstration driver.
 *
 * Connects, ensures the schema, seeds, edits user 1 through the edit-user
 * use case and reads the rows back without going through the unit of work.
 */

import { eq, inArray } from 'drizzle-orm';
import { Result } from '@inkpost/domain-core';
import { createLogger, setDefaultLogger, type Logger } from '@inkpost/logging';
import { createDatabase, type Db } from '@inkpost/persistence';

import { createInbox } from './composition.js';
import { loadEnv } from './env.js';
import { ensureSchema, messages, users } from './infrastructure/persistence/index.js';
import { seedInbox } from './seed.js';

const env = loadEnv();

const logger = createLogger({
	level: env.LOG_LEVEL,
	serviceName: 'inbox',
	pretty: env.LOG_PRETTY,
});
setDefaultLogger(logger);

async function readBack(db: Db, log: Logger): Promise<void> {
	const bodies = await db
		.select({ id: messages.id, body: messages.body })
		.from(messages)
		.where(inArray(messages.id, [1, 2]))
		.orderBy(messages.id);
	for (const message of bodies) {
		log.info({ messageId: message.id, body: message.body }, 'Stored message');
	}

	const [user] = await db.select({ name: users.name }).from(users).where(eq(users.id, 1));
	log.info({ userId: 1, name: user?.name }, 'Stored user');
}

async function main(): Promise<void> {
	const database = createDatabase({
		url: env.DATABASE_URL,
		maxConnections: env.DATABASE_MAX_CONNECTIONS,
		debug: env.DATABASE_DEBUG,
		logger,
	});

	try {
		await ensureSchema(database.db);
		await seedInbox(database.db);

		const inbox = createInbox(database.db, { logger });
		const result = await inbox.editUser.execute({
			operation: 'edit-user',
			userId: 1,
			name: 'new username',
			messages: [
				{ messageId: 1, body: 'new message body 1' },
				{ messageId: 2, body: 'new message body 2' },
			],
		});

		if (Result.isFailure(result)) {
			logger.error({ error: result.error }, 'Edit user failed');
			process.exitCode = 1;
			return;
		}

		await readBack(database.db, logger);
	} finally {
		await database.close();
	}
}

try {
	await main();
} catch (error) {
	logger.fatal({ err: error }, 'Inbox driver failed');
	process.exitCode = 1;
}
