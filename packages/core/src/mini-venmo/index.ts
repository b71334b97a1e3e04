export { MiniVenmo } from './mini-venmo.js';
export type { DemoResult, FeedWriter, MiniVenmoDependencies } from './mini-venmo.js';
