import { MULTIPLIER_FACTOR, WAD } from "../src/constants.js";
import { parseConfig } from "../src/config.js";
import { createInitialState, type ProtocolState } from "../src/engine/state.js";
import {
  applyPnlAndFunding,
  funding,
  fundingAsset,
  scalingFactor,
  updatedEma,
  vaultAssetAvailable,
} from "../src/engine/funding.js";
import { assert, assertEq, expectError } from "./helpers.js";

console.log("Testing funding and settlement...\n");

const T = 1_700_000_000n;
const HOUR = 3_600n;
const DAY = 86_400n;

/**
 * Vault 10, long balance 5 at 2x (total exposure 10), last settled at 2000.
 */
function twoXState(): ProtocolState {
  const state = createInitialState(parseConfig({}), "11111111111111111111111111111111");
  state.balanceVault = 10n * WAD;
  state.balanceLong = 5n * WAD;
  state.ladder.totalExpo = 10n * WAD;
  state.lastPrice = 2000n * WAD;
  state.lastUpdateTimestamp = T;
  return state;
}

{
  assertEq(scalingFactor(120), 120_000_000_000_000_000n, "0.12 with 18 decimals");
  assertEq(scalingFactor(0), 0n, "zero scaling factor");
  console.log("✓ scalingFactor");
}

// No time elapsed: zero funding, exposure recovered exactly, nothing mutated
{
  const state = twoXState();
  const before = structuredClone(state);

  const first = funding(state, T, 0n);
  const second = funding(state, T, 0n);
  assertEq(first.fund, 0n, "no funding at the last update");
  assertEq(first.oldLongExpo, state.ladder.totalExpo - state.balanceLong, "long exposure is totalExpo - balanceLong");
  assertEq(first.oldLongExpo, 5n * WAD, "long exposure value");
  assertEq(second.fund, first.fund, "repeatable");
  assertEq(second.oldLongExpo, first.oldLongExpo, "repeatable exposure");

  assertEq(state.lastFunding, before.lastFunding, "lastFunding untouched");
  assertEq(state.ema, before.ema, "ema untouched");
  assertEq(state.balanceLong, before.balanceLong, "balanceLong untouched");
  assertEq(state.lastUpdateTimestamp, before.lastUpdateTimestamp, "timestamp untouched");

  expectError(() => funding(state, T - 1n, 0n), "TimestampTooOld", "timestamp before the last update");

  console.log("✓ funding idempotence at the last update");
}

// Vault empty, longs exposed: saturates at +sf + ema whatever the elapsed time
{
  const state = twoXState();
  state.balanceVault = 0n;
  assertEq(funding(state, T + HOUR, 0n).fund, 120_000_000_000_000_000n, "saturated funding after one hour");
  assertEq(funding(state, T + HOUR, 5_000_000_000_000_000n).fund, 125_000_000_000_000_000n, "saturation plus ema");
  assertEq(funding(state, T + DAY, 0n).fund, 120_000_000_000_000_000n, "saturation is not scaled by time");
  console.log("✓ funding saturates when the vault is empty");
}

// Long exposure not positive: -sf + ema
{
  const state = twoXState();
  state.ladder.totalExpo = state.balanceLong;
  assertEq(funding(state, T + HOUR, 7n).fund, 7n - 120_000_000_000_000_000n, "negative saturation");
  console.log("✓ funding with no long exposure");
}

// Vault heavier than longs: longs are paid, proportionally to elapsed time
{
  const state = twoXState();
  const { fund, oldLongExpo } = funding(state, T + DAY, 0n);
  // |5 - 10| * 1 day * 0.12 / (10 * 1 day)
  assertEq(fund, -60_000_000_000_000_000n, "one day of funding");
  assertEq(fundingAsset(fund, oldLongExpo), -300_000_000_000_000_000n, "asset paid to longs");
  assertEq(fundingAsset(fund, 0n), 0n, "no asset without long exposure");
  console.log("✓ funding proportional to imbalance");
}

{
  assertEq(updatedEma(0n, 100n, 1n, 4n), 25n, "weighted by elapsed/period");
  assertEq(updatedEma(40n, 100n, 4n, 4n), 40n, "unchanged once elapsed reaches the period");
  assertEq(updatedEma(40n, 100n, 10n, 4n), 40n, "unchanged past the period");
  console.log("✓ updatedEma");
}

// Same price, one day: only funding moves balances, and the multiplier follows
{
  const state = twoXState();
  const result = applyPnlAndFunding(state, 2000n * WAD, T + DAY);
  assert(result.applied, "applied");
  assertEq(result.pnl, 0n, "no PnL at an unchanged price");
  assertEq(state.balanceLong, 5_300_000_000_000_000_000n, "longs received funding");
  assertEq(state.balanceVault, 9_700_000_000_000_000_000n, "vault paid funding");
  assertEq(state.lastFunding, -60_000_000_000_000_000n, "lastFunding recorded");
  assertEq(state.ema, 0n, "ema weighted with the previous funding of zero");
  assertEq(state.liquidationMultiplier, 94339622641509433962264150943396226415n, "M * 5 / 5.3");
  assertEq(state.lastUpdateTimestamp, T + DAY, "timestamp advanced");

  const again = applyPnlAndFunding(state, 2100n * WAD, T + DAY);
  assert(!again.applied, "second call at the same timestamp is a no-op");
  assertEq(state.lastPrice, 2000n * WAD, "price unchanged by the no-op");

  console.log("✓ applyPnlAndFunding with funding only");
}

// Price up 10% over one second
{
  const state = twoXState();
  const result = applyPnlAndFunding(state, 2200n * WAD, T + 1n);
  assertEq(result.pnl, 454_545_454_545_454_546n, "long PnL");
  assertEq(result.fundAsset, -3_472_222_222_220n, "one second of funding");
  assertEq(state.balanceLong, 5_454_548_926_767_676_766n, "long balance");
  assertEq(state.balanceVault, 9_545_451_073_232_323_234n, "vault balance");
  assertEq(state.balanceLong + state.balanceVault, 15n * WAD, "balances conserved");
  assertEq(state.shortfall, 0n, "no shortfall");
  console.log("✓ applyPnlAndFunding with PnL");
}

// Crash beyond the long balance: clamped, excess recorded as shortfall
{
  const state = twoXState();
  applyPnlAndFunding(state, 900n * WAD, T + 1n);
  assertEq(state.shortfall, 1_111_111_111_111_111_111n, "unpayable loss");
  assertEq(state.balanceLong, 3_472_222_222_220n, "only the funding received is left");
  assertEq(state.balanceLong + state.balanceVault, 15n * WAD, "balances conserved");
  assert(state.balanceVault >= 0n, "vault not negative");
  console.log("✓ PnL clamped at zero");
}

// Multiplier untouched without long exposure
{
  const state = twoXState();
  state.ladder.totalExpo = state.balanceLong;
  applyPnlAndFunding(state, 2000n * WAD, T + HOUR);
  assertEq(state.liquidationMultiplier, MULTIPLIER_FACTOR, "multiplier skipped");
  console.log("✓ multiplier update skipped without long exposure");
}

{
  // 10 vault + 5 long, longs exposed for 5 at 2000; price doubles
  assertEq(
    vaultAssetAvailable(10n * WAD, 10n * WAD, 5n * WAD, 4000n * WAD, 2000n * WAD),
    7_500_000_000_000_000_000n,
    "vault loses half of the long exposure",
  );
  assertEq(vaultAssetAvailable(10n * WAD, 10n * WAD, 5n * WAD, 1000n * WAD, 2000n * WAD), 15n * WAD, "clamped at total");
  console.log("✓ vaultAssetAvailable");
}

console.log("\n✅ All funding tests passed!");
