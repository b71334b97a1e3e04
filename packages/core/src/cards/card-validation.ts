import { DEFAULT_ACCEPTED_CARD_NUMBERS } from '@repo/types';

/**
 * Stand-in for a card network check: a card is accepted only when it is
 * one of the configured numbers.
 */
export function isAcceptedCardNumber(
  cardNumber: string,
  acceptedCardNumbers: readonly string[] = DEFAULT_ACCEPTED_CARD_NUMBERS
): boolean {
  return acceptedCardNumbers.includes(cardNumber);
}
