export { SettlementService } from './settlement-service.js';
export type { TransferRequestParams, SettlementConfirmationParams } from './settlement-service.js';
