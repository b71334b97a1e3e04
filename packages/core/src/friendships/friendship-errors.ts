import { UserError } from '../users/user-errors.js';

export class FriendNotFoundError extends UserError {
  constructor(username: string, friendUsername: string) {
    super(`${friendUsername} is not in ${username}'s friend list`);
  }
}
