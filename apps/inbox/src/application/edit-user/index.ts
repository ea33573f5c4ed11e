export type { EditUserCommand, MessageEdit } from './command.js';
export { createEditUserUseCase, type EditUserUseCaseDeps, type UserEdited } from './use-case.js';
