import { invariant } from '../utils/invariant.js';
import { mulDiv, pow10, type RoundingMode } from '../utils/math.js';
import type { PoolState } from '../types/PoolState.js';

/**
 * Share/asset conversions with a virtual offset: the pool behaves as if it always
 * held one extra asset unit and `10^decimalsOffset` extra shares, which makes a
 * donation to a near-empty pool too expensive to skew the rate.
 *
 * Every preview rounds against the caller:
 * - deposit / redeem round down (caller gets no more than justified)
 * - mint / withdraw round up (caller pays no less than required)
 */
export class ConversionEngine {
  static validateState(state: PoolState): void {
    invariant(state.totalAssets >= 0n, 'totalAssets must be non-negative');
    invariant(state.totalShares >= 0n, 'totalShares must be non-negative');
    invariant(
      Number.isInteger(state.decimalsOffset) && state.decimalsOffset >= 0,
      'decimalsOffset must be a non-negative integer'
    );
  }

  static toShares(state: PoolState, assets: bigint, rounding: RoundingMode): bigint {
    this.validateState(state);
    invariant(assets >= 0n, 'assets must be non-negative');
    return mulDiv(assets, state.totalShares + pow10(state.decimalsOffset), state.totalAssets + 1n, rounding);
  }

  static toAssets(state: PoolState, shares: bigint, rounding: RoundingMode): bigint {
    this.validateState(state);
    invariant(shares >= 0n, 'shares must be non-negative');
    return mulDiv(shares, state.totalAssets + 1n, state.totalShares + pow10(state.decimalsOffset), rounding);
  }

  static convertToShares(state: PoolState, assets: bigint): bigint {
    return this.toShares(state, assets, 'down');
  }

  static convertToAssets(state: PoolState, shares: bigint): bigint {
    return this.toAssets(state, shares, 'down');
  }

  static previewDeposit(state: PoolState, assets: bigint): bigint {
    return this.toShares(state, assets, 'down');
  }

  static previewMint(state: PoolState, shares: bigint): bigint {
    return this.toAssets(state, shares, 'up');
  }

  static previewWithdraw(state: PoolState, assets: bigint): bigint {
    return this.toShares(state, assets, 'up');
  }

  static previewRedeem(state: PoolState, shares: bigint): bigint {
    return this.toAssets(state, shares, 'down');
  }
}
