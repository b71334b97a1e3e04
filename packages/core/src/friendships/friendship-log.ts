import type { FriendshipStatus } from '@repo/types';
import type { User } from '../users/user.js';

export interface FriendshipLog {
  readonly kind: 'friendship';
  readonly id: string;
  readonly user1: User;
  readonly user2: User;
  readonly status: FriendshipStatus;
  readonly createdAt: Date;
}

export type CreateFriendshipLogParams = Omit<FriendshipLog, 'kind'>;

export function createFriendshipLog(params: CreateFriendshipLogParams): FriendshipLog {
  return Object.freeze({ kind: 'friendship' as const, ...params });
}

/**
 * "<user1> <status> <user2> as a friend."
 */
export function formatFriendshipMessage(log: FriendshipLog): string {
  return `${log.user1.username} ${log.status} ${log.user2.username} as a friend.`;
}
