/**
 * Message Entity
 *
 * A message posted by a user. Identity and owner never change; the body
 * can be edited.
 */

export class Message {
	constructor(
		private readonly _messageId: number,
		private _body: string,
		private readonly _userId: number,
	) {}

	get messageId(): number {
		return this._messageId;
	}

	get body(): string {
		return this._body;
	}

	/** Owning user. */
	get userId(): number {
		return this._userId;
	}

	edit(body: string): void {
		this._body = body;
	}
}
