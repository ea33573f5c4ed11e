/**
 * Edit User Use Case
 *
 * Loads a user, applies a rename and message edits through its proxies and
 * commits the unit of work once.
 */

import type { UseCase } from '@inkpost/application';
import { validateMaxLength, validatePositiveInteger, validateRequired } from '@inkpost/application';
import { Result, UseCaseError, type CommitSummary, type UnitOfWork } from '@inkpost/domain-core';
import { createChildLogger, getLogger, type Logger } from '@inkpost/logging';
import { NotFoundError } from '@inkpost/persistence';

import { USER_NAME_MAX_LENGTH } from '../../domain/index.js';
import type { InboxEntities, UserProxy, UserRepository } from '../../infrastructure/persistence/index.js';

import type { EditUserCommand } from './command.js';

/**
 * Outcome of a successful edit.
 */
export interface UserEdited {
	readonly userId: number;
	readonly renamed: boolean;
	/** Ids of the owned messages that were edited, in command order */
	readonly editedMessageIds: readonly number[];
	readonly summary: CommitSummary;
}

export interface EditUserUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly unitOfWork: UnitOfWork<InboxEntities>;
	readonly logger?: Logger;
}

export function createEditUserUseCase(deps: EditUserUseCaseDeps): UseCase<EditUserCommand, UserEdited> {
	const { userRepository, unitOfWork } = deps;
	const logger = createChildLogger(deps.logger ?? getLogger(), { useCase: 'edit-user' });

	return {
		async execute(command: EditUserCommand): Promise<Result<UserEdited>> {
			const userIdResult = validatePositiveInteger(command.userId, 'userId', 'INVALID_USER_ID');
			if (Result.isFailure(userIdResult)) {
				return userIdResult;
			}

			const edits = command.messages ?? [];
			if (command.name === undefined && edits.length === 0) {
				return Result.failure(
					UseCaseError.validation('NO_CHANGES', 'Nothing to edit: provide a name or message edits', {
						userId: command.userId,
					}),
				);
			}

			if (command.name !== undefined) {
				const nameResult = validateRequired(command.name, 'name', 'NAME_REQUIRED');
				if (Result.isFailure(nameResult)) {
					return nameResult;
				}

				const lengthResult = validateMaxLength(command.name, USER_NAME_MAX_LENGTH, 'name', 'NAME_TOO_LONG');
				if (Result.isFailure(lengthResult)) {
					return lengthResult;
				}
			}

			for (const edit of edits) {
				const bodyResult = validateRequired(edit.body, 'body', 'BODY_REQUIRED', `Message ${edit.messageId} body is required`);
				if (Result.isFailure(bodyResult)) {
					return bodyResult;
				}
			}

			let user: UserProxy;
			try {
				user = await userRepository.withId(command.userId);
			} catch (error) {
				if (error instanceof NotFoundError) {
					return Result.failure(
						UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userId: command.userId }),
					);
				}
				throw error;
			}

			const editedMessageIds: number[] = [];
			for (const edit of edits) {
				if (user.findMessage(edit.messageId)) {
					user.editMessage(edit.messageId, edit.body);
					editedMessageIds.push(edit.messageId);
				}
			}

			if (command.name !== undefined) {
				user.rename(command.name);
			}

			const summary = await unitOfWork.commit();

			logger.info(
				{ userId: user.userId, renamed: command.name !== undefined, editedMessageIds, ...summary },
				'User edited',
			);

			return Result.success({
				userId: user.userId,
				renamed: command.name !== undefined,
				editedMessageIds,
				summary,
			});
		},
	};
}
