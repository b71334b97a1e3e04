/**
 * @repo/types
 *
 * Shared zod schemas and inferred types for Mini Venmo.
 */

export * from './user.schema.js';
export * from './payment.schema.js';
export * from './feed.schema.js';
