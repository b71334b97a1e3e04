/**
 * Payments Domain
 */

export { createPayment, formatPaymentMessage } from './payment.js';
export type { Payment, PaymentSource, CreatePaymentParams } from './payment.js';
export { parseAmount, formatAmount } from './amount.js';
export {
  PaymentError,
  InvalidAmountError,
  InvalidAmountFormatError,
  SameUserPaymentError,
  InsufficientBalanceError,
  NoCreditCardError,
} from './payment-errors.js';
