import { ArithmeticError } from "../errors.js";
import { MAX_TICK, MIN_TICK, WAD } from "../constants.js";

/*
 * Prices are quantized on a geometric grid: price(tick) = 1.0001^tick,
 * expressed with 18 decimals. Powers are taken by repeated squaring in a
 * 38-decimal fixed point, which keeps the grid strictly increasing.
 */

const POW_SCALE = 10n ** 38n;
const TICK_BASE = 10_001n * 10n ** 34n; // 1.0001
const LN_TICK_BASE = Math.log(1.0001);

function pow(exponent: number): bigint {
  let result = POW_SCALE;
  let base = TICK_BASE;
  let e = exponent;
  while (e > 0) {
    if (e & 1) {
      result = (result * base) / POW_SCALE;
    }
    base = (base * base) / POW_SCALE;
    e >>= 1;
  }
  return result;
}

export function checkTick(tick: number): void {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new ArithmeticError("TickOutOfRange", `tick ${tick}`);
  }
}

/**
 * Price of a tick, 18 decimals.
 */
export function priceAtTick(tick: number): bigint {
  checkTick(tick);
  if (tick >= 0) {
    return (WAD * pow(tick)) / POW_SCALE;
  }
  return (WAD * POW_SCALE) / pow(-tick);
}

export const MIN_PRICE = priceAtTick(MIN_TICK);
export const MAX_PRICE = priceAtTick(MAX_TICK);

/**
 * Largest tick whose price is at or below `price`.
 */
export function tickAtPrice(price: bigint): number {
  if (price < MIN_PRICE) {
    throw new ArithmeticError("PriceOutOfRange", `price ${price} is below the lowest tick`);
  }
  if (price >= MAX_PRICE) {
    return MAX_TICK;
  }
  const estimate = Math.floor((Math.log(Number(price)) - Math.log(Number(WAD))) / LN_TICK_BASE);
  let tick = Math.min(Math.max(estimate, MIN_TICK), MAX_TICK);
  while (tick > MIN_TICK && priceAtTick(tick) > price) {
    tick--;
  }
  while (tick < MAX_TICK && priceAtTick(tick + 1) <= price) {
    tick++;
  }
  return tick;
}

/**
 * Rounds a tick down to a multiple of `tickSpacing` (toward negative infinity).
 */
export function roundTickDown(tick: number, tickSpacing: number): number {
  const rounded = Math.floor(tick / tickSpacing) * tickSpacing;
  if (rounded < MIN_TICK) {
    throw new ArithmeticError("TickOutOfRange", `tick ${tick} rounds to ${rounded}, below the lowest tick`);
  }
  return rounded;
}

/**
 * Lowest multiple of `tickSpacing` inside the tick range.
 */
export function minUsableTick(tickSpacing: number): number {
  return Math.ceil(MIN_TICK / tickSpacing) * tickSpacing;
}
