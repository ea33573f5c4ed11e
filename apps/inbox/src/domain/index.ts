/**
 * Inbox domain: users and the messages they own.
 */

export { Message } from './message.js';
export { User, USER_NAME_MAX_LENGTH } from './user.js';
