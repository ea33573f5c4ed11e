export { MessageProxy } from './message-proxy.js';
export { UserProxy } from './user-proxy.js';
