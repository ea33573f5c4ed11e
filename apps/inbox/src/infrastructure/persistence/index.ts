/**
 * Inbox persistence: schema, mappers, proxies and repositories.
 */

export * from './schema/index.js';
export { inboxIdentity, inboxFlushOrder, type InboxEntities, type InboxKind } from './entity-kinds.js';
export { createMessageMapper, createUserMapper, type MessageMapper, type UserMapper } from './mappers/index.js';
export { MessageProxy, UserProxy } from './proxies/index.js';
export { createUserRepository, type UserRepository, type UserRepositoryDeps } from './repositories/index.js';
