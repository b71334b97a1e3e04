export { createFriendshipLog, formatFriendshipMessage } from './friendship-log.js';
export type { FriendshipLog, CreateFriendshipLogParams } from './friendship-log.js';
export { FriendNotFoundError } from './friendship-errors.js';
