import { PolicyError } from "../errors.js";
import { BPS_DIVISOR } from "../constants.js";

/**
 * Exposure figures the imbalance checks read. `vaultExpo` includes pending
 * vault movements.
 */
export interface ExposureSnapshot {
  totalExpo: bigint;
  balanceLong: bigint;
  balanceVault: bigint;
  pendingBalanceVault: bigint;
}

function vaultExpo(s: ExposureSnapshot): bigint {
  return s.balanceVault + s.pendingBalanceVault;
}

function longExpo(s: ExposureSnapshot): bigint {
  return s.totalExpo - s.balanceLong;
}

function enforce(imbalanceBps: bigint, limitBps: number): void {
  if (imbalanceBps > BigInt(limitBps)) {
    throw new PolicyError("ImbalanceLimitReached", imbalanceBps, BigInt(limitBps));
  }
}

/**
 * A deposit grows the vault relative to the long side.
 */
export function checkDepositImbalance(s: ExposureSnapshot, limitBps: number, depositValue: bigint): void {
  if (limitBps === 0) return;
  const currentLongExpo = longExpo(s);
  if (currentLongExpo <= 0n) {
    throw new PolicyError("InvalidLongExpo", currentLongExpo);
  }
  const newVaultExpo = vaultExpo(s) + depositValue;
  enforce(((newVaultExpo - currentLongExpo) * BPS_DIVISOR) / currentLongExpo, limitBps);
}

export function checkWithdrawalImbalance(s: ExposureSnapshot, limitBps: number, withdrawalValue: bigint): void {
  if (limitBps === 0) return;
  const newVaultExpo = vaultExpo(s) - withdrawalValue;
  if (newVaultExpo <= 0n) {
    throw new PolicyError("EmptyVault", newVaultExpo);
  }
  enforce(((longExpo(s) - newVaultExpo) * BPS_DIVISOR) / newVaultExpo, limitBps);
}

export function checkOpenImbalance(
  s: ExposureSnapshot,
  limitBps: number,
  openCollateral: bigint,
  openTotalExpo: bigint,
): void {
  if (limitBps === 0) return;
  const currentVaultExpo = vaultExpo(s);
  if (currentVaultExpo <= 0n) {
    throw new PolicyError("EmptyVault", currentVaultExpo);
  }
  const newLongExpo = s.totalExpo + openTotalExpo - (s.balanceLong + openCollateral);
  enforce(((newLongExpo - currentVaultExpo) * BPS_DIVISOR) / currentVaultExpo, limitBps);
}

export function checkCloseImbalance(
  s: ExposureSnapshot,
  limitBps: number,
  closeValue: bigint,
  closeTotalExpo: bigint,
): void {
  if (limitBps === 0) return;
  const newLongExpo = s.totalExpo - closeTotalExpo - (s.balanceLong - closeValue);
  if (newLongExpo <= 0n) {
    throw new PolicyError("InvalidLongExpo", newLongExpo);
  }
  enforce(((vaultExpo(s) - newLongExpo) * BPS_DIVISOR) / newLongExpo, limitBps);
}

/**
 * Vault excess over the long side in basis points, or undefined when the long
 * side has no exposure left.
 */
export function vaultImbalanceBps(s: ExposureSnapshot): bigint | undefined {
  const currentLongExpo = longExpo(s);
  if (currentLongExpo <= 0n) return undefined;
  return ((vaultExpo(s) - currentLongExpo) * BPS_DIVISOR) / currentLongExpo;
}
