export { AccessControl, LEDGER_CAPABILITIES, isLedgerCapability } from './access-control.js';
export type { LedgerCapability } from './access-control.js';
export { ReentrancyGuard } from './reentrancy-guard.js';
