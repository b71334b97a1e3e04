/**
 * User Domain Types
 */

import type { Logger } from '@repo/observability';
import type { CardProcessor } from '../cards/card-processor.js';

/**
 * Collaborators a user works with. Every field falls back to a default.
 */
export interface UserDependencies {
  /** Charges cards on the card path (default: StubCardProcessor) */
  cardProcessor?: CardProcessor;
  /** Card numbers addCreditCard accepts (default: the two test cards) */
  acceptedCardNumbers?: readonly string[];
  logger?: Logger;
  /** Ids for payments and friendship logs (default: randomUUID) */
  idFactory?: () => string;
  clock?: () => Date;
}
