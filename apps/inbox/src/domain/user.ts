/**
 * User Aggregate
 *
 * A user and the messages it owns. Messages belong to exactly one user for
 * as long as the aggregate is in memory.
 */

import type { Message } from './message.js';

/** Matches the users.name column. */
export const USER_NAME_MAX_LENGTH = 64;

export class User {
	private readonly _messages: Message[];

	constructor(
		private readonly _userId: number,
		private _name: string,
		messages: readonly Message[] = [],
	) {
		this._messages = [...messages];
	}

	get userId(): number {
		return this._userId;
	}

	get name(): string {
		return this._name;
	}

	get messages(): readonly Message[] {
		return this._messages;
	}

	rename(name: string): void {
		this._name = name;
	}

	findMessage(messageId: number): Message | undefined {
		return this._messages.find((message) => message.messageId === messageId);
	}

	/**
	 * Edit an owned message. Unknown ids are ignored.
	 */
	editMessage(messageId: number, body: string): void {
		for (const message of this._messages) {
			if (message.messageId === messageId) {
				message.edit(body);
			}
		}
	}

	/**
	 * Take ownership of a new message.
	 *
	 * @throws Error if the message belongs to another user or its id is already owned
	 */
	postMessage(message: Message): void {
		if (message.userId !== this._userId) {
			throw new Error(`Message ${message.messageId} belongs to user ${message.userId}, not ${this._userId}`);
		}
		if (this.findMessage(message.messageId)) {
			throw new Error(`User ${this._userId} already owns message ${message.messageId}`);
		}
		this._messages.push(message);
	}
}
