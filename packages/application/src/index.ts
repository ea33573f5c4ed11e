/**
 * @inkpost/application
 *
 * Application layer contracts: commands, use cases and validation helpers.
 */

export type { Command, UseCase } from './use-case.js';

export { validateRequired, validateMaxLength, validatePositiveInteger } from './validation.js';
