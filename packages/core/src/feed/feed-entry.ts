import { formatFriendshipMessage, type FriendshipLog } from '../friendships/friendship-log.js';
import { formatPaymentMessage, type Payment } from '../payments/payment.js';

/**
 * Anything that can appear in a user's feed
 */
export type FeedEntry = Payment | FriendshipLog;

export function formatFeedMessage(entry: FeedEntry): string {
  switch (entry.kind) {
    case 'payment':
      return formatPaymentMessage(entry);
    case 'friendship':
      return formatFriendshipMessage(entry);
  }
}
