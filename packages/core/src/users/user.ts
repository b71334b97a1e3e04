/**
 * User ledger entity
 *
 * Owns a balance, at most one credit card, a friend list and an append-only feed.
 * Every operation validates before it mutates anything, so a thrown error
 * leaves balances, cards and feeds exactly as they were.
 */

import { randomUUID } from 'node:crypto';
import { UsernameSchema, type AmountInput, type FriendshipStatus } from '@repo/types';
import { logger as defaultLogger, type Logger } from '@repo/observability';
import { StubCardProcessor, type CardProcessor } from '../cards/card-processor.js';
import { isAcceptedCardNumber } from '../cards/card-validation.js';
import { InvalidCreditCardError, MultipleCreditCardsError } from '../cards/card-errors.js';
import { formatFeedMessage, type FeedEntry } from '../feed/feed-entry.js';
import { createFriendshipLog, type FriendshipLog } from '../friendships/friendship-log.js';
import { FriendNotFoundError } from '../friendships/friendship-errors.js';
import { parseAmount } from '../payments/amount.js';
import { createPayment, type Payment, type PaymentSource } from '../payments/payment.js';
import {
  InsufficientBalanceError,
  InvalidAmountError,
  InvalidAmountFormatError,
  NoCreditCardError,
  type PaymentError,
  SameUserPaymentError,
} from '../payments/payment-errors.js';
import { UsernameError } from './user-errors.js';
import type { UserDependencies } from './user-types.js';

export class User {
  readonly username: string;

  private currentBalance = 0;
  private cardNumber: string | null = null;
  private readonly friendList: User[] = [];
  private readonly feedEntries: FeedEntry[] = [];

  private readonly cardProcessor: CardProcessor;
  private readonly acceptedCardNumbers: readonly string[] | undefined;
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private readonly clock: () => Date;

  constructor(username: string, dependencies: UserDependencies = {}) {
    const parsed = UsernameSchema.safeParse(username);
    if (!parsed.success) {
      throw new UsernameError(username);
    }

    const baseLogger = dependencies.logger ?? defaultLogger;
    this.username = parsed.data;
    this.logger = baseLogger.child({ module: 'user', username });
    this.cardProcessor = dependencies.cardProcessor ?? new StubCardProcessor(baseLogger);
    this.acceptedCardNumbers = dependencies.acceptedCardNumbers;
    this.idFactory = dependencies.idFactory ?? randomUUID;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  get balance(): number {
    return this.currentBalance;
  }

  get creditCardNumber(): string | null {
    return this.cardNumber;
  }

  get friends(): readonly User[] {
    return this.friendList;
  }

  get feed(): readonly FeedEntry[] {
    return this.feedEntries;
  }

  /**
   * Display messages for every feed entry, oldest first
   */
  retrieveFeed(): string[] {
    return this.feedEntries.map(formatFeedMessage);
  }

  /**
   * Link to another user.
   * Only this user's friend list changes; the log goes to both feeds.
   */
  addFriend(newFriend: User): FriendshipLog {
    this.friendList.push(newFriend);
    return this.recordFriendship(newFriend, 'added');
  }

  removeFriend(friend: User): FriendshipLog {
    const index = this.friendList.indexOf(friend);
    if (index === -1) {
      throw new FriendNotFoundError(this.username, friend.username);
    }

    this.friendList.splice(index, 1);
    return this.recordFriendship(friend, 'removed');
  }

  addToBalance(amount: AmountInput): void {
    const value = parseAmount(amount);
    if (value === null || value <= 0) {
      throw new InvalidAmountError();
    }

    this.credit(value);
  }

  /**
   * Register the user's card. A second card is refused even when it is valid.
   */
  addCreditCard(creditCardNumber: string): void {
    if (this.cardNumber !== null) {
      throw new MultipleCreditCardsError();
    }

    if (!isAcceptedCardNumber(creditCardNumber, this.acceptedCardNumbers)) {
      throw new InvalidCreditCardError();
    }

    this.cardNumber = creditCardNumber;
    this.logger.info({ creditCardNumber }, 'credit card added');
  }

  /**
   * Pay another user.
   *
   * Business rules:
   * - Amount must parse as a number and be positive
   * - Balance covers the whole amount: paid from balance
   * - Otherwise: paid entirely by card, balance untouched
   * - The payment is appended to both users' feeds
   */
  pay(target: User, amount: AmountInput, note: string): Payment {
    const value = parseAmount(amount);
    if (value === null) {
      throw this.rejectPayment(new InvalidAmountFormatError());
    }
    if (value <= 0) {
      throw this.rejectPayment(new InvalidAmountError());
    }

    const source: PaymentSource = this.currentBalance >= value ? 'balance' : 'card';
    this.logger.debug({ target: target.username, amount: value, source }, 'routing payment');

    const payment =
      source === 'balance'
        ? this.payWithBalance(target, value, note)
        : this.payWithCard(target, value, note);

    this.appendToFeeds(payment, target);
    this.logger.info(
      { paymentId: payment.id, target: target.username, amount: value, source },
      'payment completed'
    );

    return payment;
  }

  /**
   * Move money from this user's balance to the target's. Feeds are not touched.
   */
  payWithBalance(target: User, amount: AmountInput, note: string): Payment {
    const value = this.requirePayableAmount(target, amount);
    if (this.currentBalance < value) {
      throw this.rejectPayment(new InsufficientBalanceError());
    }

    const payment = this.buildPayment(target, value, note, 'balance');
    this.currentBalance -= value;
    target.credit(value);

    return payment;
  }

  /**
   * Charge this user's card and credit the target. This user's balance is not touched.
   */
  payWithCard(target: User, amount: AmountInput, note: string): Payment {
    const value = this.requirePayableAmount(target, amount);
    if (this.cardNumber === null) {
      throw this.rejectPayment(new NoCreditCardError());
    }

    const payment = this.buildPayment(target, value, note, 'card');
    this.cardProcessor.charge({ cardNumber: this.cardNumber, amount: value });
    target.credit(value);

    return payment;
  }

  /**
   * Increase the balance by an amount that has already been validated
   */
  private credit(amount: number): void {
    this.currentBalance += amount;
  }

  private requirePayableAmount(target: User, amount: AmountInput): number {
    const value = parseAmount(amount);
    if (value === null) {
      throw this.rejectPayment(new InvalidAmountFormatError());
    }
    if (this.username === target.username) {
      throw this.rejectPayment(new SameUserPaymentError());
    }
    if (value <= 0) {
      throw this.rejectPayment(new InvalidAmountError());
    }
    return value;
  }

  private buildPayment(target: User, amount: number, note: string, source: PaymentSource): Payment {
    return createPayment({
      id: this.idFactory(),
      amount,
      actor: this,
      target,
      note,
      source,
      createdAt: this.clock(),
    });
  }

  private recordFriendship(other: User, status: FriendshipStatus): FriendshipLog {
    const log = createFriendshipLog({
      id: this.idFactory(),
      user1: this,
      user2: other,
      status,
      createdAt: this.clock(),
    });

    this.appendToFeeds(log, other);
    this.logger.info({ logId: log.id, friend: other.username, status }, 'friendship updated');

    return log;
  }

  private appendToFeeds(entry: FeedEntry, other: User): void {
    this.feedEntries.push(entry);
    if (other !== this) {
      other.feedEntries.push(entry);
    }
  }

  private rejectPayment(error: PaymentError): PaymentError {
    this.logger.warn({ err: error }, 'payment rejected');
    return error;
  }
}
