import type { ProtocolConfig } from "../config.js";
import type { Address } from "./types.js";
import { createLadder, type LadderState } from "./tickLadder.js";
import { INITIAL_MULTIPLIER } from "./liquidationMultiplier.js";
import { createQueue, type QueueState } from "./pendingQueue.js";

/**
 * Everything the protocol owns, as plain data. The ledger checkpoints it with
 * structuredClone, so it holds no class instances.
 */
export interface ProtocolState {
  initialized: boolean;
  config: ProtocolConfig;
  feeCollector: Address;

  ladder: LadderState;
  liquidationMultiplier: bigint;

  balanceLong: bigint;
  balanceVault: bigint;
  /** pending deposits minus estimated pending withdrawals */
  pendingBalanceVault: bigint;
  /** deposit amounts and close proceeds held for pending actions */
  escrowedAssets: bigint;
  pendingProtocolFee: bigint;
  totalFeesSkimmed: bigint;
  /** PnL and funding that could not be paid because a side was empty */
  shortfall: bigint;

  lastFunding: bigint;
  lastUpdateTimestamp: bigint;
  lastPrice: bigint;
  ema: bigint;
  lastRebaseCheck: bigint;

  queue: QueueState;
  /** security deposits owed to validators, claimable with refundSecurityDeposit */
  refunds: Map<Address, bigint>;
}

export function createInitialState(config: ProtocolConfig, feeCollector: Address): ProtocolState {
  return {
    initialized: false,
    config,
    feeCollector,
    ladder: createLadder(config.tickSpacing),
    liquidationMultiplier: INITIAL_MULTIPLIER,
    balanceLong: 0n,
    balanceVault: 0n,
    pendingBalanceVault: 0n,
    escrowedAssets: 0n,
    pendingProtocolFee: 0n,
    totalFeesSkimmed: 0n,
    shortfall: 0n,
    lastFunding: 0n,
    lastUpdateTimestamp: 0n,
    lastPrice: 0n,
    ema: 0n,
    lastRebaseCheck: 0n,
    queue: createQueue(),
    refunds: new Map(),
  };
}
