export { formatFeedMessage } from './feed-entry.js';
export type { FeedEntry } from './feed-entry.js';
