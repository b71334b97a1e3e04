/**
 * @repo/core - Domain logic for Mini Venmo
 *
 * Users and their ledgers, payments, friendships, feeds and the MiniVenmo facade.
 */

export { MiniVenmoError } from './errors.js';
export { loadMiniVenmoConfig } from './config.js';
export type { MiniVenmoConfig } from './config.js';
export * from './cards/index.js';
export * from './payments/index.js';
export * from './friendships/index.js';
export * from './feed/index.js';
export * from './users/index.js';
export * from './mini-venmo/index.js';
