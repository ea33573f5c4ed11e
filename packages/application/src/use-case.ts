/**
 * UseCase Interface
 *
 * UseCases encapsulate a single business operation. Each use case:
 * - Takes a command (input data)
 * - Performs validation and business rule checks
 * - Loads aggregates through repositories and changes them through their proxies
 * - Commits the unit of work and returns a Result
 *
 * Expected problems (bad input, missing entities) come back as failures.
 * Infrastructure errors thrown by the unit of work are not caught here.
 *
 * @example
 * ```typescript
 * export function createRenameUserUseCase(deps: RenameUserDeps): UseCase<RenameUserCommand, UserRenamed> {
 *     return {
 *         async execute(command) {
 *             const user = await deps.userRepository.withId(command.userId);
 *             user.rename(command.name);
 *             const summary = await deps.unitOfWork.commit();
 *             return Result.success({ userId: user.userId, summary });
 *         },
 *     };
 * }
 * ```
 */

import type { Result } from '@inkpost/domain-core';

/**
 * Base marker interface for commands.
 *
 * Commands are plain, immutable data objects carrying the intent of one
 * write operation.
 */
export interface Command {
	/**
	 * Optional operation type identifier, used in logs.
	 */
	readonly operation?: string | undefined;
}

/**
 * UseCase interface for write operations.
 *
 * @typeParam TCommand - The command type (input data)
 * @typeParam TOutcome - The value returned on success
 */
export interface UseCase<TCommand extends Command, TOutcome> {
	execute(command: TCommand): Promise<Result<TOutcome>>;
}
