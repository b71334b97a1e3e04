/**
 * Payment records
 *
 * A Payment is created once a payment has been resolved and is frozen from then on.
 * The same instance is appended to the payer's and the payee's feeds.
 */

import type { User } from '../users/user.js';
import { formatAmount } from './amount.js';
import { InvalidAmountError, SameUserPaymentError } from './payment-errors.js';

/** Where the money came from */
export type PaymentSource = 'balance' | 'card';

export interface Payment {
  readonly kind: 'payment';
  readonly id: string;
  readonly amount: number;
  readonly actor: User;
  readonly target: User;
  readonly note: string;
  readonly source: PaymentSource;
  readonly createdAt: Date;
}

export type CreatePaymentParams = Omit<Payment, 'kind'>;

export function createPayment(params: CreatePaymentParams): Payment {
  if (!(params.amount > 0)) {
    throw new InvalidAmountError();
  }
  if (params.actor.username === params.target.username) {
    throw new SameUserPaymentError();
  }

  return Object.freeze({ kind: 'payment' as const, ...params });
}

/**
 * "<actor> paid <target> $<amount> for <note>"
 */
export function formatPaymentMessage(payment: Payment): string {
  return `${payment.actor.username} paid ${payment.target.username} ${formatAmount(payment.amount)} for ${payment.note}`;
}
