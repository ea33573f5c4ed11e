/**
 * Message Mapper
 *
 * Moves Message state between memory and the messages table. Every batch
 * operation issues exactly one statement.
 */

import { asc, eq, inArray, sql } from 'drizzle-orm';
import { resolveDb, runStatement, type Db, type Mapper, type TransactionContext } from '@inkpost/persistence';
import { Message } from '../../../domain/index.js';
import { messages, type MessageRecord, type NewMessageRecord } from '../schema/index.js';

export interface MessageMapper extends Mapper<Message> {
	add(message: Message, tx?: TransactionContext): Promise<void>;
	delete(message: Message, tx?: TransactionContext): Promise<void>;
	withId(messageId: number, tx?: TransactionContext): Promise<Message | undefined>;
	ofUser(userId: number, tx?: TransactionContext): Promise<Message[]>;
}

/**
 * Create a Message mapper.
 */
export function createMessageMapper(defaultDb: Db): MessageMapper {
	const db = (tx?: TransactionContext): Db => resolveDb(defaultDb, tx);

	return {
		async add(message: Message, tx?: TransactionContext): Promise<void> {
			await this.addAll([message], tx);
		},

		async addAll(batch: readonly Message[], tx?: TransactionContext): Promise<void> {
			if (batch.length === 0) return;

			const records: NewMessageRecord[] = batch.map(messageToRecord);
			await runStatement('insert', 'messages', () => db(tx).insert(messages).values(records));
		},

		async updateAll(batch: readonly Message[], tx?: TransactionContext): Promise<void> {
			if (batch.length === 0) return;

			// One parameter row per message; a repeated id keeps its last body
			const latest = new Map(batch.map((message) => [message.messageId, message.body]));
			const rows = sql.join(
				[...latest].map(([messageId, body]) => sql`(${messageId}::integer, ${body}::text)`),
				sql`, `,
			);

			await runStatement('update', 'messages', () =>
				db(tx).execute(sql`
					update ${messages}
					set ${sql.identifier(messages.body.name)} = batch.body
					from (values ${rows}) as batch (id, body)
					where ${messages.id} = batch.id
				`),
			);
		},

		async delete(message: Message, tx?: TransactionContext): Promise<void> {
			await this.deleteAll([message], tx);
		},

		async deleteAll(batch: readonly Message[], tx?: TransactionContext): Promise<void> {
			if (batch.length === 0) return;

			const ids = batch.map((message) => message.messageId);
			await runStatement('delete', 'messages', () => db(tx).delete(messages).where(inArray(messages.id, ids)));
		},

		async withId(messageId: number, tx?: TransactionContext): Promise<Message | undefined> {
			const [record] = await runStatement('select', 'messages', () =>
				db(tx).select().from(messages).where(eq(messages.id, messageId)).limit(1),
			);

			if (!record) return undefined;

			return recordToMessage(record);
		},

		async ofUser(userId: number, tx?: TransactionContext): Promise<Message[]> {
			const records = await runStatement('select', 'messages', () =>
				db(tx).select().from(messages).where(eq(messages.userId, userId)).orderBy(asc(messages.id)),
			);
			return records.map(recordToMessage);
		},
	};
}

function messageToRecord(message: Message): NewMessageRecord {
	return {
		id: message.messageId,
		body: message.body,
		userId: message.userId,
	};
}

function recordToMessage(record: MessageRecord): Message {
	return new Message(record.id, record.body, record.userId);
}
