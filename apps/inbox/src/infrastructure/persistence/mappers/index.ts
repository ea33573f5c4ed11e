export { createMessageMapper, type MessageMapper } from './message-mapper.js';
export { createUserMapper, type UserMapper } from './user-mapper.js';
