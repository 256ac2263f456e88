/**
 * Engine composition root
 *
 * Wires one card store, access control, re-entrancy guard and event emitter
 * into the ledger services.
 */

import type { LedgerConfig } from '@card-ledger/types';
import { createLogger, type Logger } from '@card-ledger/observability';
import { BorrowService } from './borrow/index.js';
import { systemClock } from './clock.js';
import { loadLedgerConfig } from './config.js';
import type { LedgerContext } from './context.js';
import type { AssetPorts, Clock, PriceOracle, SwapRouter } from './interfaces.js';
import { CardLedgerService, CardRepository, LedgerEventEmitter } from './ledger/index.js';
import { LiquidationService } from './liquidation/index.js';
import { AccessControl, ReentrancyGuard } from './security/index.js';
import { SettlementService } from './settlement/index.js';
import { SwapService } from './swap/index.js';

export type CardLedgerEngineOptions = {
  assets: AssetPorts;
  oracle?: PriceOracle | null;
  router?: SwapRouter | null;
  clock?: Clock;
  /** Defaults to loadLedgerConfig(process.env) */
  config?: LedgerConfig;
  logger?: Logger;
};

export function createCardLedgerEngine(options: CardLedgerEngineOptions) {
  const config = options.config ?? loadLedgerConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const clock = options.clock ?? systemClock;
  const events = new LedgerEventEmitter(logger, clock);
  const access = new AccessControl(config.ownerAddress, events);

  const context: LedgerContext = {
    cards: new CardRepository(),
    access,
    guard: new ReentrancyGuard(),
    events,
    clock,
    logger,
  };

  return {
    config,
    events,
    access,
    ledger: new CardLedgerService({
      ...context,
      assets: options.assets,
      engineAddress: config.engineAddress,
    }),
    borrow: new BorrowService({ ...context, oracle: options.oracle }),
    settlement: new SettlementService(context),
    liquidation: new LiquidationService(context),
    swap: new SwapService({
      ...context,
      assets: options.assets,
      engineAddress: config.engineAddress,
      assetAddresses: {
        native: config.nativeAssetAddress,
        token: config.tokenAssetAddress,
      },
      feeTier: config.swapFeeTier,
      router: options.router,
    }),
  };
}

export type CardLedgerEngine = ReturnType<typeof createCardLedgerEngine>;
