/**
 * Edit User Command
 */

import type { Command } from '@inkpost/application';

/**
 * New body for one owned message.
 */
export interface MessageEdit {
	readonly messageId: number;
	readonly body: string;
}

/**
 * Command for renaming a user and editing messages it owns.
 */
export interface EditUserCommand extends Command {
	readonly userId: number;
	readonly name?: string | undefined;
	readonly messages?: readonly MessageEdit[] | undefined;
}
