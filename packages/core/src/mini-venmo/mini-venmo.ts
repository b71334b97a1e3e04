/**
 * MiniVenmo
 *
 * Application facade: creates and registers users, renders feeds and runs the
 * demo scenario. Users created here share the facade's collaborators.
 */

import type { AmountInput } from '@repo/types';
import { logger as defaultLogger, type Logger } from '@repo/observability';
import { PaymentError } from '../payments/payment-errors.js';
import { User } from '../users/user.js';
import { DuplicateUsernameError } from '../users/user-errors.js';
import type { UserDependencies } from '../users/user-types.js';

/** Receives one rendered feed line at a time */
export type FeedWriter = (line: string) => void;

export interface MiniVenmoDependencies extends UserDependencies {
  /** Where renderFeed and runDemo write (default: console.log) */
  writeLine?: FeedWriter;
}

export interface DemoResult {
  bobby: User;
  carol: User;
}

export class MiniVenmo {
  private readonly users = new Map<string, User>();
  private readonly userDependencies: UserDependencies;
  private readonly writeLine: FeedWriter;
  private readonly logger: Logger;

  constructor(dependencies: MiniVenmoDependencies = {}) {
    const { writeLine, ...userDependencies } = dependencies;
    this.userDependencies = userDependencies;
    this.writeLine = writeLine ?? ((line) => console.log(line));
    this.logger = (dependencies.logger ?? defaultLogger).child({ module: 'mini-venmo' });
  }

  /**
   * Create a user with a starting balance and a card.
   * The user is only registered once every step has succeeded.
   */
  createUser(username: string, balance: AmountInput, creditCardNumber: string): User {
    if (this.users.has(username)) {
      throw new DuplicateUsernameError(username);
    }

    const user = new User(username, this.userDependencies);
    user.addToBalance(balance);
    user.addCreditCard(creditCardNumber);

    this.users.set(user.username, user);
    this.logger.info({ username: user.username, balance: user.balance }, 'user created');

    return user;
  }

  getUser(username: string): User | null {
    return this.users.get(username) ?? null;
  }

  renderFeed(feed: readonly string[]): void {
    for (const line of feed) {
      this.writeLine(line);
    }
  }

  /**
   * Bobby pays Carol 5.00 for Coffee, Carol pays Bobby 15.00 for Lunch,
   * Bobby's feed is rendered, then Bobby adds Carol as a friend.
   */
  runDemo(): DemoResult {
    const bobby = this.createUser('Bobby', 5.0, '4111111111111111');
    const carol = this.createUser('Carol', 10.0, '4242424242424242');

    try {
      bobby.pay(carol, 5.0, 'Coffee');
      carol.pay(bobby, 15.0, 'Lunch');
    } catch (error) {
      if (!(error instanceof PaymentError)) {
        throw error;
      }
      this.writeLine(error.message);
    }

    this.renderFeed(bobby.retrieveFeed());
    bobby.addFriend(carol);

    return { bobby, carol };
  }
}
