import { PublicKey } from "@solana/web3.js";
import { WAD } from "../src/constants.js";
import type { ProtocolConfigInput } from "../src/config.js";
import { encodePriceData } from "../src/abi/priceData.js";
import { deploy, type DeployOptions, type Deployment } from "../src/runtime/deploy.js";
import type { PositionId } from "../src/engine/types.js";

/**
 * No funding, no fees and no imbalance limits: balances only move with the
 * price, which keeps expected values exact.
 */
export const QUIET = {
  fundingSF: 0,
  positionFeeBps: 0,
  vaultFeeBps: 0,
  openExpoImbalanceLimitBps: 0,
  depositExpoImbalanceLimitBps: 0,
  withdrawalExpoImbalanceLimitBps: 0,
  closeExpoImbalanceLimitBps: 0,
  rebalancerCloseExpoImbalanceLimitBps: 0,
} satisfies ProtocolConfigInput;

export const START = 1_700_000_000n;
export const SECURITY_DEPOSIT = WAD / 2n;

// 5 units at 2x, liquidation price around 1012
export const INIT_TICK = 69_200;
export const INIT_TOTAL_EXPO = 9_919_970_269_703_689_010n;

export function priceAt(d: Deployment, price: bigint): Uint8Array {
  return encodePriceData(price, d.ledger.timestamp());
}

export function fundedUser(d: Deployment, asset = 5n * WAD, native = WAD): PublicKey {
  const key = PublicKey.unique();
  d.ledger.asset.mint(key.toBase58(), asset);
  d.ledger.native.mint(key.toBase58(), native);
  return key;
}

export interface Initialized {
  d: Deployment;
  initPosId: PositionId;
}

/**
 * Deploys at START and initializes with 10 units in the vault and a 5 unit
 * long at 2000.
 */
export function initialized(config: ProtocolConfigInput = {}, opts: Omit<DeployOptions, "config"> = {}): Initialized {
  const d = deploy({ config: { ...QUIET, ...config }, startTimestamp: START, ...opts });
  d.ledger.asset.mint(d.owner.toBase58(), 100n * WAD);
  d.ledger.native.mint(d.owner.toBase58(), WAD);
  const initPosId = d.protocol.initialize(d.owner, {
    depositAmount: 10n * WAD,
    longAmount: 5n * WAD,
    desiredLiqPrice: 1000n * WAD,
    priceData: priceAt(d, 2000n * WAD),
    value: opts.oracleFee,
  });
  return { d, initPosId };
}

/**
 * Asset held by the protocol, and what its accounting says it should hold.
 */
export function custodyCheck(d: Deployment): { held: bigint; accounted: bigint } {
  const b = d.protocol.getBalances();
  return {
    held: d.ledger.asset.balanceOf(d.protocol.custody),
    accounted: b.balanceLong + b.balanceVault + b.escrowedAssets + b.pendingProtocolFee,
  };
}
