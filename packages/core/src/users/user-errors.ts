/**
 * User Domain Errors
 *
 * Custom error classes for user-related business rule violations.
 */

import { MiniVenmoError } from '../errors.js';

export class UserError extends MiniVenmoError {}

export class UsernameError extends UserError {
  constructor(username: string) {
    super(`Username not valid: ${username}`);
  }
}

export class DuplicateUsernameError extends UserError {
  constructor(username: string) {
    super(`Username already in use: ${username}`);
  }
}
