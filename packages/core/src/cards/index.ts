export { StubCardProcessor } from './card-processor.js';
export type { CardCharge, CardProcessor } from './card-processor.js';
export { isAcceptedCardNumber } from './card-validation.js';
export { CreditCardError, InvalidCreditCardError, MultipleCreditCardsError } from './card-errors.js';
