import { PreconditionError } from "../errors.js";
import type { Address, PositionId } from "../engine/types.js";
import type { TokenLedger } from "./tokenLedger.js";
import type { Checkpointable } from "../runtime/ledger.js";

export interface RebalancerStateData {
  pendingAssets: bigint;
  /** leverage with 21 decimals */
  maxLeverage: bigint;
  currentPosId: PositionId | null;
}

export interface Rebalancer {
  readonly address: Address;
  notifyMinDepositChanged(minLongPosition: bigint): void;
  getCurrentStateData(): RebalancerStateData;
  /**
   * Called by the protocol once it has closed the previous position (worth
   * `previousPosValue`) and opened `newPosId` with it plus the pending assets.
   */
  updatePosition(newPosId: PositionId, previousPosValue: bigint): void;
}

interface RebalancerSnapshot {
  pendingAssets: bigint;
  positionAmount: bigint;
  currentPosId: PositionId | null;
  deposits: Map<Address, bigint>;
  minAssetDeposit: bigint;
}

/**
 * Pools user deposits and lets the protocol put them to work as one long
 * position when the vault side grows too heavy.
 */
export class InMemoryRebalancer implements Rebalancer, Checkpointable<RebalancerSnapshot> {
  private pendingAssets = 0n;
  private positionAmount = 0n;
  private currentPosId: PositionId | null = null;
  private deposits = new Map<Address, bigint>();
  private minAssetDeposit = 0n;

  constructor(
    readonly address: Address,
    private readonly asset: TokenLedger,
    readonly maxLeverage: bigint,
  ) {}

  /**
   * Moves `amount` of the asset from `user` into the pool.
   */
  deposit(user: Address, amount: bigint): void {
    if (amount === 0n) throw new PreconditionError("ZeroAmount");
    if (amount < this.minAssetDeposit) {
      throw new PreconditionError("InsufficientBalance", `deposit ${amount} is below ${this.minAssetDeposit}`);
    }
    this.asset.transfer(user, this.address, amount);
    this.pendingAssets += amount;
    this.deposits.set(user, (this.deposits.get(user) ?? 0n) + amount);
  }

  depositOf(user: Address): bigint {
    return this.deposits.get(user) ?? 0n;
  }

  minimumDeposit(): bigint {
    return this.minAssetDeposit;
  }

  positionAmountInProtocol(): bigint {
    return this.positionAmount;
  }

  notifyMinDepositChanged(minLongPosition: bigint): void {
    this.minAssetDeposit = minLongPosition;
  }

  getCurrentStateData(): RebalancerStateData {
    return {
      pendingAssets: this.pendingAssets,
      maxLeverage: this.maxLeverage,
      currentPosId: this.currentPosId,
    };
  }

  updatePosition(newPosId: PositionId, previousPosValue: bigint): void {
    this.positionAmount = previousPosValue + this.pendingAssets;
    this.pendingAssets = 0n;
    this.currentPosId = newPosId;
  }

  checkpoint(): RebalancerSnapshot {
    return {
      pendingAssets: this.pendingAssets,
      positionAmount: this.positionAmount,
      currentPosId: this.currentPosId && { ...this.currentPosId },
      deposits: new Map(this.deposits),
      minAssetDeposit: this.minAssetDeposit,
    };
  }

  restore(snapshot: RebalancerSnapshot): void {
    this.pendingAssets = snapshot.pendingAssets;
    this.positionAmount = snapshot.positionAmount;
    this.currentPosId = snapshot.currentPosId;
    this.deposits = snapshot.deposits;
    this.minAssetDeposit = snapshot.minAssetDeposit;
  }
}
