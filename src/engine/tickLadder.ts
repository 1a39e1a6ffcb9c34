import { ArithmeticError, PreconditionError } from "../errors.js";
import { checkTick } from "../math/tickMath.js";
import type { LiqTickInfo, Position, PositionId, TickData } from "./types.js";
import { effectivePrice } from "./liquidationMultiplier.js";
import { positionValue } from "./longMath.js";
import * as Bitmap from "./tickBitmap.js";

/**
 * Buckets of positions keyed by tick.
 *
 * A bucket's aggregate exposure always equals the sum of the exposures of
 * the live positions stored under its current version. Liquidating a bucket
 * bumps its version, which orphans every position id issued before.
 */
export interface LadderState {
  tickSpacing: number;
  ticks: Map<number, TickData>;
  tickVersions: Map<number, number>;
  /** slots per `${tick}:${version}`; removed positions leave a null slot */
  positions: Map<string, (Position | null)[]>;
  bitmap: Bitmap.TickBitmap;
  totalExpo: bigint;
  totalLongPositions: number;
}

export interface LiquidationOutcome {
  liquidatedTicks: LiqTickInfo[];
  /** liquidatable buckets remain because the iteration budget ran out */
  isLiquidationPending: boolean;
}

export function createLadder(tickSpacing: number): LadderState {
  return {
    tickSpacing,
    ticks: new Map(),
    tickVersions: new Map(),
    positions: new Map(),
    bitmap: Bitmap.createTickBitmap(),
    totalExpo: 0n,
    totalLongPositions: 0,
  };
}

function slotsKey(tick: number, version: number): string {
  return `${tick}:${version}`;
}

export function getTickVersion(ladder: LadderState, tick: number): number {
  return ladder.tickVersions.get(tick) ?? 0;
}

export function getTickData(ladder: LadderState, tick: number): TickData | undefined {
  return ladder.ticks.get(tick);
}

export function isPopulated(ladder: LadderState, tick: number): boolean {
  return Bitmap.isSet(ladder.bitmap, tick, ladder.tickSpacing);
}

export function highestPopulatedTick(ladder: LadderState): number | undefined {
  return Bitmap.findLastSet(ladder.bitmap, ladder.tickSpacing);
}

export function isStale(ladder: LadderState, posId: PositionId): boolean {
  return getTickVersion(ladder, posId.tick) !== posId.tickVersion;
}

/**
 * Penalty that applies to a new position in `tick`: the bucket's own when it
 * is populated, `fallback` otherwise.
 */
export function tickLiquidationPenalty(ladder: LadderState, tick: number, fallback: number): number {
  return ladder.ticks.get(tick)?.liquidationPenalty ?? fallback;
}

export function registerPosition(
  ladder: LadderState,
  tick: number,
  position: Position,
  liquidationPenalty: number,
): PositionId {
  checkTick(tick);
  if (tick % ladder.tickSpacing !== 0) {
    throw new ArithmeticError("TickOutOfRange", `tick ${tick} is not on the spacing grid`);
  }
  const tickVersion = getTickVersion(ladder, tick);
  let data = ladder.ticks.get(tick);
  if (data === undefined) {
    data = { totalExpo: 0n, totalPos: 0, liquidationPenalty };
    ladder.ticks.set(tick, data);
    Bitmap.set(ladder.bitmap, tick, ladder.tickSpacing);
  }
  data.totalExpo += position.totalExpo;
  data.totalPos += 1;
  ladder.totalExpo += position.totalExpo;
  ladder.totalLongPositions += 1;

  const key = slotsKey(tick, tickVersion);
  let slots = ladder.positions.get(key);
  if (slots === undefined) {
    slots = [];
    ladder.positions.set(key, slots);
  }
  slots.push(position);
  return { tick, tickVersion, index: slots.length - 1 };
}

/**
 * Live position behind an id, with the penalty of its bucket.
 */
export function getPosition(
  ladder: LadderState,
  posId: PositionId,
): { position: Position; liquidationPenalty: number } {
  if (isStale(ladder, posId)) {
    throw new PreconditionError(
      "StaleReference",
      `tick ${posId.tick} is at version ${getTickVersion(ladder, posId.tick)}, not ${posId.tickVersion}`,
    );
  }
  const position = ladder.positions.get(slotsKey(posId.tick, posId.tickVersion))?.[posId.index];
  const data = ladder.ticks.get(posId.tick);
  if (!position || data === undefined) {
    throw new PreconditionError("StaleReference", `no position at index ${posId.index} of tick ${posId.tick}`);
  }
  return { position, liquidationPenalty: data.liquidationPenalty };
}

/**
 * Removes `amount` collateral and `totalExpo` exposure from a position;
 * removing the whole amount frees the slot.
 */
export function removePosition(ladder: LadderState, posId: PositionId, amount: bigint, totalExpo: bigint): void {
  const { position } = getPosition(ladder, posId);
  const data = ladder.ticks.get(posId.tick);
  if (data === undefined) {
    throw new PreconditionError("StaleReference", `tick ${posId.tick} is empty`);
  }
  if (amount >= position.amount) {
    const slots = ladder.positions.get(slotsKey(posId.tick, posId.tickVersion));
    if (slots) slots[posId.index] = null;
    data.totalPos -= 1;
    ladder.totalLongPositions -= 1;
  } else {
    position.amount -= amount;
    position.totalExpo -= totalExpo;
  }
  data.totalExpo -= totalExpo;
  ladder.totalExpo -= totalExpo;
  if (data.totalPos === 0) {
    ladder.ticks.delete(posId.tick);
    Bitmap.unset(ladder.bitmap, posId.tick, ladder.tickSpacing);
  }
}

/**
 * Re-prices the exposure of a position in place.
 */
export function updatePositionExpo(ladder: LadderState, posId: PositionId, newTotalExpo: bigint): void {
  const { position } = getPosition(ladder, posId);
  const data = ladder.ticks.get(posId.tick);
  if (data === undefined) return;
  const delta = newTotalExpo - position.totalExpo;
  position.totalExpo = newTotalExpo;
  data.totalExpo += delta;
  ladder.totalExpo += delta;
}

/**
 * Liquidates buckets from the highest populated tick down while their
 * liquidation price is at or above `price`, at most `maxIterations` of them.
 * Each bucket is liquidated whole.
 */
export function liquidateBucketsUpTo(
  ladder: LadderState,
  price: bigint,
  multiplier: bigint,
  maxIterations: number,
): LiquidationOutcome {
  const liquidatedTicks: LiqTickInfo[] = [];
  let isLiquidationPending = false;

  for (;;) {
    const tick = highestPopulatedTick(ladder);
    if (tick === undefined) break;
    const tickPrice = effectivePrice(tick, multiplier);
    if (tickPrice < price) break;
    if (liquidatedTicks.length >= maxIterations) {
      isLiquidationPending = true;
      break;
    }

    const data = ladder.ticks.get(tick);
    if (data === undefined) break;
    const priceWithoutPenalty = effectivePrice(tick - data.liquidationPenalty, multiplier);
    const tickVersion = getTickVersion(ladder, tick);

    ladder.totalExpo -= data.totalExpo;
    ladder.totalLongPositions -= data.totalPos;
    ladder.tickVersions.set(tick, tickVersion + 1);
    ladder.ticks.delete(tick);
    ladder.positions.delete(slotsKey(tick, tickVersion));
    Bitmap.unset(ladder.bitmap, tick, ladder.tickSpacing);

    liquidatedTicks.push({
      tick,
      tickVersion,
      totalPositions: data.totalPos,
      totalExpo: data.totalExpo,
      remainingCollateral: positionValue(price, priceWithoutPenalty, data.totalExpo),
      tickPrice,
      priceWithoutPenalty,
    });
  }

  return { liquidatedTicks, isLiquidationPending };
}
