/**
 * Payment Domain Errors
 *
 * Thrown before any balance or feed is touched, so a caller can recover
 * from every one of them.
 */

import { MiniVenmoError } from '../errors.js';

export class PaymentError extends MiniVenmoError {}

export class InvalidAmountError extends PaymentError {
  constructor(message = 'Amount must be a positive number.') {
    super(message);
  }
}

export class InvalidAmountFormatError extends InvalidAmountError {
  constructor() {
    super('Amount must be a valid number.');
  }
}

export class SameUserPaymentError extends PaymentError {
  constructor() {
    super('User cannot pay themselves.');
  }
}

export class InsufficientBalanceError extends PaymentError {
  constructor() {
    super('Insufficient balance to make the payment.');
  }
}

export class NoCreditCardError extends PaymentError {
  constructor() {
    super('Must have a credit card to make a payment.');
  }
}
