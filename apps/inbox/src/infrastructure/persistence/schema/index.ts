/**
 * Inbox database schema.
 */

export { users, type UserRecord, type NewUserRecord } from './users.js';
export { messages, type MessageRecord, type NewMessageRecord } from './messages.js';
export { ensureSchema } from './ensure-schema.js';
