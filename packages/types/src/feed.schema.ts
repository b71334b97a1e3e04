import { z } from 'zod';

export const FriendshipStatusSchema = z.enum(['added', 'removed']);

export type FriendshipStatus = z.infer<typeof FriendshipStatusSchema>;
