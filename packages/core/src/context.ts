import type { Logger } from '@card-ledger/observability';
import type { CardRepository } from './ledger/card-repository.js';
import type { LedgerEvents } from './ledger/ledger-events.js';
import type { AccessControl } from './security/access-control.js';
import type { ReentrancyGuard } from './security/reentrancy-guard.js';
import type { Clock } from './interfaces.js';

/**
 * Collaborators shared by every ledger service
 * One engine instance hands the same repository, guard and emitter to all of them.
 */
export type LedgerContext = {
  cards: CardRepository;
  access: AccessControl;
  guard: ReentrancyGuard;
  events: LedgerEvents;
  clock: Clock;
  logger?: Logger;
};
