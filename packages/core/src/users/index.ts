/**
 * Users Domain
 *
 * Exports for the user ledger entity
 */

export { User } from './user.js';
export type { UserDependencies } from './user-types.js';

export { UserError, UsernameError, DuplicateUsernameError } from './user-errors.js';
