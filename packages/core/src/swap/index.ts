export { SwapService, SWAP_DEADLINE_SECONDS, SWAP_ROUTES } from './swap-service.js';
export type { SwapParams } from './swap-service.js';
