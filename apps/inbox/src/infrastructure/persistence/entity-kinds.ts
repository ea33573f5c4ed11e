/**
 * Entity kinds tracked by the inbox unit of work.
 */

import type { IdentityTable, KindOf } from '@inkpost/domain-core';
import type { Message, User } from '../../domain/index.js';

export interface InboxEntities {
	user: User;
	message: Message;
}

export type InboxKind = KindOf<InboxEntities>;

export const inboxIdentity: IdentityTable<InboxEntities> = {
	user: (user) => user.userId,
	message: (message) => message.messageId,
};

/** Users before the messages that reference them. */
export const inboxFlushOrder: readonly InboxKind[] = ['user', 'message'];
