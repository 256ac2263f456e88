export {
  BorrowService,
  MAX_LEVERAGE,
  LEVERAGE_SCALE,
  MAX_PRICE_DECIMALS,
  REPAY_WINDOW_SECONDS,
} from './borrow-service.js';
