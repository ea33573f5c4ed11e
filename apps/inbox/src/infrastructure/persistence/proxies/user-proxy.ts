/**
 * Change-tracking wrapper around a User aggregate.
 *
 * Owned messages are exposed as MessageProxy instances, so editing a
 * message through the user registers the message, not the user.
 */

import type { UnitOfWork } from '@inkpost/domain-core';
import { EntityProxy } from '@inkpost/persistence';
import { Message, type User } from '../../../domain/index.js';
import type { InboxEntities } from '../entity-kinds.js';
import { MessageProxy } from './message-proxy.js';

export class UserProxy extends EntityProxy<InboxEntities, 'user'> {
	private readonly messageProxies: MessageProxy[];

	constructor(user: User, unitOfWork: UnitOfWork<InboxEntities>) {
		super('user', user, unitOfWork);
		this.messageProxies = user.messages.map((message) => new MessageProxy(message, unitOfWork));
	}

	get userId(): number {
		return this.read((user) => user.userId);
	}

	get name(): string {
		return this.read((user) => user.name);
	}

	get messages(): readonly MessageProxy[] {
		return this.messageProxies;
	}

	findMessage(messageId: number): MessageProxy | undefined {
		return this.messageProxies.find((message) => message.messageId === messageId);
	}

	rename(name: string): void {
		this.mutate((user) => user.rename(name));
	}

	/**
	 * Edit an owned message. Unknown ids are ignored and register nothing.
	 */
	editMessage(messageId: number, body: string): void {
		this.findMessage(messageId)?.edit(body);
	}

	/**
	 * Post a new message owned by this user.
	 *
	 * @throws Error if the user already owns a message with this id
	 */
	postMessage(messageId: number, body: string): MessageProxy {
		const message = new Message(messageId, body, this.userId);
		this.attach('message', message, (user) => user.postMessage(message));

		const proxy = new MessageProxy(message, this.unitOfWork);
		this.messageProxies.push(proxy);
		return proxy;
	}

	/**
	 * Remove the user together with every message it owns.
	 */
	remove(): void {
		for (const message of this.messageProxies) {
			message.remove();
		}
		this.markRemoved();
	}
}
