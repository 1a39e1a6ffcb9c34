import { PreconditionError } from "../errors.js";
import { FUNDING_RATE_DECIMALS, FUNDING_RATE_FACTOR, FUNDING_SF_DECIMALS, SECONDS_PER_DAY } from "../constants.js";
import { abs, max, signedMulDiv } from "../math/fixedPoint.js";
import { currentMultiplier } from "./liquidationMultiplier.js";
import { longTradingExpo } from "./longMath.js";
import type { ProtocolState } from "./state.js";

export interface FundingResult {
  /** signed rate with 18 decimals; positive when longs pay the vault */
  fund: bigint;
  /** long trading exposure at the last update */
  oldLongExpo: bigint;
}

export interface SettlementResult {
  applied: boolean;
  fund: bigint;
  fundAsset: bigint;
  /** asset moved from the vault to the long side by price movement */
  pnl: bigint;
}

/**
 * Funding scaling factor widened from 3 to 18 decimals.
 */
export function scalingFactor(fundingSF: number): bigint {
  return BigInt(fundingSF) * 10n ** BigInt(FUNDING_RATE_DECIMALS - FUNDING_SF_DECIMALS);
}

/**
 * Funding accrued between the last update and `timestamp`. Reads state only.
 */
export function funding(state: ProtocolState, timestamp: bigint, ema: bigint): FundingResult {
  if (timestamp < state.lastUpdateTimestamp) {
    throw new PreconditionError(
      "TimestampTooOld",
      `${timestamp} is before the last update at ${state.lastUpdateTimestamp}`,
    );
  }
  const oldLongExpo = longTradingExpo(state.ladder.totalExpo, state.balanceLong);
  if (timestamp === state.lastUpdateTimestamp) {
    return { fund: 0n, oldLongExpo };
  }

  const sf = scalingFactor(state.config.fundingSF);
  const vaultExpo = state.balanceVault;

  if (vaultExpo === 0n) {
    if (oldLongExpo > 0n) return { fund: sf + ema, oldLongExpo };
    if (oldLongExpo < 0n) return { fund: -sf + ema, oldLongExpo };
    return { fund: ema, oldLongExpo };
  }
  if (oldLongExpo <= 0n) {
    return { fund: -sf + ema, oldLongExpo };
  }

  const elapsed = timestamp - state.lastUpdateTimestamp;
  const imbalance = oldLongExpo - vaultExpo;
  const denominator = max(oldLongExpo, vaultExpo) * SECONDS_PER_DAY;
  const magnitude = signedMulDiv(abs(imbalance) * elapsed, sf, denominator);
  return { fund: (imbalance < 0n ? -magnitude : magnitude) + ema, oldLongExpo };
}

/**
 * Asset paid by the long side for a funding rate.
 */
export function fundingAsset(fund: bigint, oldLongExpo: bigint): bigint {
  if (oldLongExpo <= 0n) return 0n;
  return signedMulDiv(fund, oldLongExpo, FUNDING_RATE_FACTOR);
}

/**
 * New EMA of the funding rate after `elapsed` seconds.
 */
export function updatedEma(ema: bigint, lastFunding: bigint, elapsed: bigint, emaPeriod: bigint): bigint {
  if (elapsed >= emaPeriod) return ema;
  return (lastFunding * elapsed + ema * (emaPeriod - elapsed)) / emaPeriod;
}

/**
 * Vault balance implied by moving the price from `oldPrice` to `newPrice`
 * with the given exposure figures. Reads nothing else.
 */
export function vaultAssetAvailable(
  totalExpo: bigint,
  balanceVault: bigint,
  balanceLong: bigint,
  newPrice: bigint,
  oldPrice: bigint,
): bigint {
  const total = balanceVault + balanceLong;
  const newLong = totalExpo - signedMulDiv(longTradingExpo(totalExpo, balanceLong), oldPrice, newPrice);
  if (newLong < 0n) return total;
  if (newLong > total) return 0n;
  return total - newLong;
}

function clampLong(state: ProtocolState, newLong: bigint, total: bigint): bigint {
  if (newLong < 0n) {
    state.shortfall += -newLong;
    return 0n;
  }
  if (newLong > total) {
    state.shortfall += newLong - total;
    return total;
  }
  return newLong;
}

/**
 * Brings both balances to `price` at `timestamp`: long PnL since the last
 * price, then funding, then the EMA and the liquidation multiplier.
 * Does nothing unless `timestamp` is after the last update.
 */
export function applyPnlAndFunding(state: ProtocolState, price: bigint, timestamp: bigint): SettlementResult {
  if (timestamp <= state.lastUpdateTimestamp) {
    return { applied: false, fund: 0n, fundAsset: 0n, pnl: 0n };
  }

  const { fund, oldLongExpo } = funding(state, timestamp, state.ema);
  const fundAsset = fundingAsset(fund, oldLongExpo);

  const total = state.balanceLong + state.balanceVault;
  const longExpo = longTradingExpo(state.ladder.totalExpo, state.balanceLong);
  let newLong = clampLong(state, state.ladder.totalExpo - signedMulDiv(longExpo, state.lastPrice, price), total);
  const pnl = newLong - state.balanceLong;
  newLong = clampLong(state, newLong - fundAsset, total);

  state.balanceLong = newLong;
  state.balanceVault = total - newLong;

  const elapsed = timestamp - state.lastUpdateTimestamp;
  state.ema = updatedEma(state.ema, state.lastFunding, elapsed, state.config.emaPeriod);
  state.lastFunding = fund;

  if (oldLongExpo > 0n && fundAsset !== 0n) {
    state.liquidationMultiplier = currentMultiplier(state.liquidationMultiplier, fundAsset, oldLongExpo);
  }

  state.lastPrice = price;
  state.lastUpdateTimestamp = timestamp;
  return { applied: true, fund, fundAsset, pnl };
}
