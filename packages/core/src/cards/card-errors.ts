import { MiniVenmoError } from '../errors.js';

export class CreditCardError extends MiniVenmoError {}

export class InvalidCreditCardError extends CreditCardError {
  constructor() {
    super('Invalid credit card number.');
  }
}

export class MultipleCreditCardsError extends CreditCardError {
  constructor() {
    super('Only one credit card per user!');
  }
}
