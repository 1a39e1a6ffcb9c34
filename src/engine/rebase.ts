import { ArithmeticError } from "../errors.js";
import { MIN_DIVISOR, USDN_DECIMALS } from "../constants.js";
import { mulDiv } from "../math/fixedPoint.js";

/**
 * Token-side operations the rebase needs.
 */
export interface RebaseTarget {
  totalSupply(): bigint;
  totalShares(): bigint;
  divisor(): bigint;
  rebase(newDivisor: bigint): void;
}

export interface RebaseParams {
  vaultBalance: bigint;
  assetPrice: bigint;
  assetDecimals: number;
  targetUsdnPrice: bigint;
  usdnRebaseThreshold: bigint;
  usdnRebaseInterval: bigint;
  lastRebaseCheck: bigint;
  now: bigint;
  forceCheck: boolean;
}

export interface RebaseResult {
  rebased: boolean;
  oldDivisor: bigint;
  newDivisor: bigint;
}

/**
 * Implied token price with 18 decimals: vault value over token supply.
 */
export function usdnPrice(
  vaultBalance: bigint,
  assetPrice: bigint,
  usdnTotalSupply: bigint,
  assetDecimals: number,
): bigint {
  if (usdnTotalSupply === 0n) {
    throw new ArithmeticError("DivisionByZero", "token supply is zero");
  }
  return mulDiv(
    vaultBalance * assetPrice,
    10n ** BigInt(USDN_DECIMALS),
    usdnTotalSupply * 10n ** BigInt(assetDecimals),
  );
}

/**
 * Supply at which the implied price equals `targetPrice`.
 */
export function rebaseTotalSupply(
  vaultBalance: bigint,
  assetPrice: bigint,
  targetPrice: bigint,
  assetDecimals: number,
): bigint {
  return mulDiv(vaultBalance * assetPrice, 10n ** BigInt(USDN_DECIMALS), targetPrice * 10n ** BigInt(assetDecimals));
}

/**
 * Lowers the token divisor so that the implied price returns to the target,
 * once the price is above the threshold and the interval has elapsed.
 */
export function maybeRebase(token: RebaseTarget, p: RebaseParams): RebaseResult {
  const oldDivisor = token.divisor();
  const skipped = { rebased: false, oldDivisor, newDivisor: oldDivisor };

  if (!p.forceCheck && p.now < p.lastRebaseCheck + p.usdnRebaseInterval) return skipped;
  const supply = token.totalSupply();
  if (supply === 0n || p.vaultBalance === 0n) return skipped;
  if (usdnPrice(p.vaultBalance, p.assetPrice, supply, p.assetDecimals) <= p.usdnRebaseThreshold) return skipped;

  const targetSupply = rebaseTotalSupply(p.vaultBalance, p.assetPrice, p.targetUsdnPrice, p.assetDecimals);
  if (targetSupply === 0n) return skipped;
  let newDivisor = token.totalShares() / targetSupply;
  if (newDivisor < MIN_DIVISOR) newDivisor = MIN_DIVISOR;
  if (newDivisor >= oldDivisor) return skipped;

  token.rebase(newDivisor);
  return { rebased: true, oldDivisor, newDivisor };
}
