/**
 * Payment input schemas
 * Shared by balance top-ups, payments and configuration parsing
 */

import { z } from 'zod';

/**
 * Test card numbers accepted when no other list is configured
 */
export const DEFAULT_ACCEPTED_CARD_NUMBERS = ['4111111111111111', '4242424242424242'] as const;

/**
 * Card number format (digits only, 13-19 long).
 * Acceptance is decided separately against the configured card list.
 */
export const CreditCardNumberSchema = z
  .string()
  .trim()
  .regex(/^\d{13,19}$/, 'Credit card number must be 13-19 digits');

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Monetary amount as supplied by a caller: a number or a decimal string
 * - "5", "5.00", " 12.5 ", "1e2" parse
 * - "", "five", "0x10", NaN and Infinity do not
 */
export const AmountInputSchema = z
  .union([
    z.number(),
    z.string().trim().regex(DECIMAL_PATTERN, 'Amount must be a valid number.').transform(Number),
  ])
  .pipe(z.number().finite('Amount must be a valid number.'));

export type AmountInput = z.input<typeof AmountInputSchema>;
