import { ArithmeticError } from "../errors.js";
import { MULTIPLIER_FACTOR } from "../constants.js";
import * as HugeUint from "../math/hugeUint.js";
import { mulDiv } from "../math/fixedPoint.js";
import { minUsableTick, priceAtTick, roundTickDown, tickAtPrice } from "../math/tickMath.js";

/**
 * The liquidation multiplier rescales the stored price of every tick at
 * once: funding paid by longs raises the true liquidation price of all
 * positions without touching the buckets themselves.
 */

export const INITIAL_MULTIPLIER = MULTIPLIER_FACTOR;

/**
 * M' = M * oldLongExpo / (oldLongExpo - fundAsset)
 *
 * `fundAsset` is the amount of asset paid by the long side over the period
 * (negative when the vault pays the longs). Callers skip the update when the
 * long exposure is not positive.
 */
export function currentMultiplier(oldMultiplier: bigint, fundAsset: bigint, oldLongExpo: bigint): bigint {
  if (oldLongExpo <= 0n) {
    throw new ArithmeticError("MultiplierUnderflow", `long exposure is ${oldLongExpo}`);
  }
  const denominator = oldLongExpo - fundAsset;
  if (denominator <= 0n) {
    throw new ArithmeticError(
      "MultiplierUnderflow",
      `funding ${fundAsset} exceeds long exposure ${oldLongExpo}`,
    );
  }
  return HugeUint.div(HugeUint.mul(oldMultiplier, oldLongExpo), denominator);
}

/**
 * Liquidation price of a tick under the given multiplier.
 */
export function effectivePrice(tick: number, multiplier: bigint): bigint {
  return mulDiv(priceAtTick(tick), multiplier, MULTIPLIER_FACTOR);
}

/**
 * Highest tick on the spacing grid whose effective price does not exceed
 * `price`. Fails with `PriceOutOfRange` when even the lowest usable tick is
 * above `price`.
 */
export function tickForPrice(price: bigint, multiplier: bigint, tickSpacing: number): number {
  const unadjusted = mulDiv(price, MULTIPLIER_FACTOR, multiplier);
  const lowest = minUsableTick(tickSpacing);
  if (unadjusted < priceAtTick(lowest)) {
    throw new ArithmeticError("PriceOutOfRange", `price ${price} is below the lowest usable tick ${lowest}`);
  }
  return roundTickDown(tickAtPrice(unadjusted), tickSpacing);
}
