import { ArithmeticError, PolicyError } from "../errors.js";
import { LEVERAGE_FACTOR } from "../constants.js";
import { mulDiv, signedMulDiv } from "../math/fixedPoint.js";

/*
 * A long of `amount` collateral opened at `startPrice` with liquidation price
 * `liqPrice` (penalty excluded) carries a total exposure of
 *   amount * startPrice / (startPrice - liqPrice)
 * and is worth totalExpo * (price - liqPrice) / price at any later price.
 */

export function getLeverage(startPrice: bigint, liqPrice: bigint): bigint {
  if (startPrice <= liqPrice) {
    throw new PolicyError("InvalidLiquidationPrice", liqPrice, startPrice);
  }
  return mulDiv(startPrice, LEVERAGE_FACTOR, startPrice - liqPrice);
}

export function liquidationPriceForLeverage(startPrice: bigint, leverage: bigint): bigint {
  return startPrice - mulDiv(startPrice, LEVERAGE_FACTOR, leverage);
}

export function positionTotalExpo(amount: bigint, startPrice: bigint, liqPrice: bigint): bigint {
  if (startPrice <= liqPrice) {
    throw new PolicyError("InvalidLiquidationPrice", liqPrice, startPrice);
  }
  return mulDiv(amount, startPrice, startPrice - liqPrice);
}

/**
 * Signed value of a position in asset units. Negative once the price is
 * below the liquidation price (bad debt).
 */
export function positionValue(price: bigint, liqPriceWithoutPenalty: bigint, totalExpo: bigint): bigint {
  if (price <= 0n) {
    throw new ArithmeticError("DivisionByZero", "price must be positive");
  }
  return signedMulDiv(totalExpo, price - liqPriceWithoutPenalty, price);
}

/**
 * Exposure left on the long side once its balance is accounted for.
 */
export function longTradingExpo(totalExpo: bigint, balanceLong: bigint): bigint {
  return totalExpo - balanceLong;
}
