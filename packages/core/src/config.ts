import { CreditCardNumberSchema, DEFAULT_ACCEPTED_CARD_NUMBERS } from '@repo/types';

export type MiniVenmoConfig = {
  acceptedCardNumbers: readonly string[];
};

function parseAcceptedCardNumbers(raw: string): string[] {
  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    throw new Error('MINI_VENMO_ACCEPTED_CARDS must list at least one card number');
  }

  return entries.map((entry, index) => {
    const parsed = CreditCardNumberSchema.safeParse(entry);
    if (!parsed.success) {
      throw new Error(`MINI_VENMO_ACCEPTED_CARDS[${index}] must be 13-19 digits`);
    }
    return parsed.data;
  });
}

export function loadMiniVenmoConfig(env: NodeJS.ProcessEnv = process.env): MiniVenmoConfig {
  const raw = env.MINI_VENMO_ACCEPTED_CARDS;

  if (!raw || !raw.trim()) {
    return { acceptedCardNumbers: [...DEFAULT_ACCEPTED_CARD_NUMBERS] };
  }

  return { acceptedCardNumbers: parseAcceptedCardNumbers(raw) };
}
