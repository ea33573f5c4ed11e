/**
 * Change-tracking wrapper around a Message.
 */

import type { UnitOfWork } from '@inkpost/domain-core';
import { EntityProxy } from '@inkpost/persistence';
import type { Message } from '../../../domain/index.js';
import type { InboxEntities } from '../entity-kinds.js';

export class MessageProxy extends EntityProxy<InboxEntities, 'message'> {
	constructor(message: Message, unitOfWork: UnitOfWork<InboxEntities>) {
		super('message', message, unitOfWork);
	}

	get messageId(): number {
		return this.read((message) => message.messageId);
	}

	get body(): string {
		return this.read((message) => message.body);
	}

	get userId(): number {
		return this.read((message) => message.userId);
	}

	edit(body: string): void {
		this.mutate((message) => message.edit(body));
	}

	remove(): void {
		this.markRemoved();
	}
}
