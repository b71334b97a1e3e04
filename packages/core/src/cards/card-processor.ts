/**
 * Card processor boundary
 *
 * charge() either completes or throws. No retries happen on this side;
 * a failure propagates to whoever started the payment.
 */

import { logger as defaultLogger, type Logger } from '@repo/observability';

export interface CardCharge {
  cardNumber: string;
  amount: number;
}

export interface CardProcessor {
  charge(charge: CardCharge): void;
}

/**
 * Processor used when no real one is wired in: records the charge and succeeds
 */
export class StubCardProcessor implements CardProcessor {
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger.child({ module: 'card-processor' });
  }

  charge(charge: CardCharge): void {
    this.logger.info({ charge }, 'card charged');
  }
}
