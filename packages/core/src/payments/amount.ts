import { AmountInputSchema, type AmountInput } from '@repo/types';

/**
 * Parse a caller-supplied amount, returning null when it is not a finite number
 */
export function parseAmount(input: AmountInput): number | null {
  const result = AmountInputSchema.safeParse(input);
  return result.success ? result.data : null;
}

/**
 * Format a dollar amount for display, e.g. 5 -> "$5.00"
 */
export function formatAmount(amount: number): string {
  return `$${amount.toFixed(2)}`;
}
