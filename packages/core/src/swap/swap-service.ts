/**
 * Swap Service
 *
 * Exchanges one balance of a card for the other through a DEX router.
 * Runs inside the re-entrancy guard: the input balance is debited before the
 * router is approved and called, and restored if anything after that fails.
 */

import { logger as rootLogger, type Logger } from '@card-ledger/observability';
import type { LedgerContext } from '../context.js';
import type { AssetPorts, SwapRouter } from '../interfaces.js';
import {
  InsufficientBalanceError,
  InvalidAmountError,
  TransferFailedError,
  UnconfiguredError,
} from '../ledger/ledger-errors.js';
import { assertPositiveAmount, requireTransfer } from '../ledger/ledger-guards.js';
import { balanceOf, balanceUpdate } from '../ledger/ledger-service.js';
import type { Asset, CallerContext, SwapDirection, SwapResult } from '../ledger/ledger-types.js';

export const SWAP_DEADLINE_SECONDS = 60 * 60;

export const SWAP_ROUTES = {
  'native-to-token': { assetIn: 'native', assetOut: 'token' },
  'token-to-native': { assetIn: 'token', assetOut: 'native' },
} as const satisfies Record<SwapDirection, { assetIn: Asset; assetOut: Asset }>;

type SwapDependencies = LedgerContext & {
  assets: AssetPorts;
  engineAddress: string;
  assetAddresses: Record<Asset, string>;
  feeTier: number;
  router?: SwapRouter | null;
};

export interface SwapParams {
  index: number;
  direction: SwapDirection;
  amountIn: bigint;
  minAmountOut?: bigint;
}

export class SwapService {
  private router: SwapRouter | null;
  private readonly log: Logger;

  constructor(private readonly deps: SwapDependencies) {
    this.router = deps.router ?? null;
    this.log = (deps.logger ?? rootLogger).child({ module: 'swap' });
  }

  setSwapRouter(caller: CallerContext, router: SwapRouter | null): void {
    this.deps.access.requireCapability(caller, 'ledger:configure');
    this.router = router;
    this.log.info({ router: router?.address ?? null }, 'Swap router updated');
  }

  /**
   * Swap `amountIn` of one card balance into the other
   *
   * @throws {UnconfiguredError} If no router is set
   * @throws {InsufficientBalanceError} If the input balance is below amountIn
   * @throws {TransferFailedError} If approval, the router call or slippage fails
   */
  swap(caller: CallerContext, params: SwapParams): SwapResult {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    const router = this.router;
    if (!router) {
      throw new UnconfiguredError('Swap router');
    }

    const { index, direction, amountIn } = params;
    const minAmountOut = params.minAmountOut ?? 0n;
    const { assetIn, assetOut } = SWAP_ROUTES[direction];

    return this.deps.guard.run('swap', () => {
      const card = this.deps.cards.getOrThrow(index);
      assertPositiveAmount(amountIn);
      if (minAmountOut < 0n) {
        throw new InvalidAmountError(minAmountOut);
      }

      const balance = balanceOf(card, assetIn);
      if (balance < amountIn) {
        throw new InsufficientBalanceError(index, assetIn, balance, amountIn);
      }

      this.deps.cards.update(index, balanceUpdate(assetIn, balance - amountIn));

      const amountOut = this.restoreOnFailure(index, assetIn, amountIn, () => {
        requireTransfer('swap approval', () =>
          this.deps.assets[assetIn].approve(router.address, amountIn)
        );

        let received: bigint;
        try {
          received = router.exactInputSingle({
            tokenIn: this.deps.assetAddresses[assetIn],
            tokenOut: this.deps.assetAddresses[assetOut],
            fee: this.deps.feeTier,
            recipient: this.deps.engineAddress,
            deadline: this.deps.clock.now() + SWAP_DEADLINE_SECONDS,
            amountIn,
            amountOutMinimum: minAmountOut,
          });
        } catch (error) {
          throw new TransferFailedError('swap', { cause: error });
        }

        if (received < minAmountOut || received < 0n) {
          throw new TransferFailedError('swap');
        }
        return received;
      });

      const latest = this.deps.cards.getOrThrow(index);
      this.deps.cards.update(index, balanceUpdate(assetOut, balanceOf(latest, assetOut) + amountOut));

      this.deps.events.emit({ type: 'swap.executed', index, direction, amountIn, amountOut });
      this.log.info({ index, direction, amountIn, amountOut }, 'Swap executed');

      return { amountIn, amountOut };
    });
  }

  private restoreOnFailure<T>(index: number, asset: Asset, amount: bigint, step: () => T): T {
    try {
      return step();
    } catch (error) {
      const latest = this.deps.cards.getOrThrow(index);
      this.deps.cards.update(index, balanceUpdate(asset, balanceOf(latest, asset) + amount));
      this.log.warn({ index, asset, amount, err: error }, 'Swap failed, input restored');
      throw error;
    }
  }
}
