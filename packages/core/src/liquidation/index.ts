export { LiquidationService } from './liquidation-service.js';
