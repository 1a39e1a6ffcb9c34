import { ArithmeticError, PreconditionError } from "../errors.js";
import { MAX_DIVISOR, MIN_DIVISOR } from "../constants.js";
import type { Address } from "../engine/types.js";
import type { RebaseTarget } from "../engine/rebase.js";
import type { Checkpointable } from "../runtime/ledger.js";

interface ElasticTokenSnapshot {
  shares: Map<Address, bigint>;
  totalShares: bigint;
  divisor: bigint;
}

/**
 * Elastic-supply token accounted in shares. A holder's balance is
 * shares / divisor, so lowering the divisor raises every balance at once.
 */
export class ElasticToken implements RebaseTarget, Checkpointable<ElasticTokenSnapshot> {
  private shares = new Map<Address, bigint>();
  private _totalShares = 0n;
  private _divisor = MAX_DIVISOR;

  constructor(readonly symbol = "USDN") {}

  divisor(): bigint {
    return this._divisor;
  }

  totalShares(): bigint {
    return this._totalShares;
  }

  totalSupply(): bigint {
    return this._totalShares / this._divisor;
  }

  sharesOf(owner: Address): bigint {
    return this.shares.get(owner) ?? 0n;
  }

  balanceOf(owner: Address): bigint {
    return this.sharesOf(owner) / this._divisor;
  }

  convertToShares(amount: bigint): bigint {
    return amount * this._divisor;
  }

  convertToTokens(shares: bigint): bigint {
    return shares / this._divisor;
  }

  mint(to: Address, amount: bigint): bigint {
    const shares = this.convertToShares(amount);
    this.mintShares(to, shares);
    return shares;
  }

  mintShares(to: Address, shares: bigint): void {
    if (shares < 0n) throw new PreconditionError("ZeroAmount", `cannot mint ${shares} shares`);
    this.shares.set(to, this.sharesOf(to) + shares);
    this._totalShares += shares;
  }

  burnShares(from: Address, shares: bigint): void {
    const held = this.sharesOf(from);
    if (shares < 0n || held < shares) {
      throw new PreconditionError("InsufficientBalance", `${from} holds ${held} shares, burning ${shares}`);
    }
    this.shares.set(from, held - shares);
    this._totalShares -= shares;
  }

  transferShares(from: Address, to: Address, shares: bigint): void {
    const held = this.sharesOf(from);
    if (shares < 0n || held < shares) {
      throw new PreconditionError("InsufficientBalance", `${from} holds ${held} shares, sending ${shares}`);
    }
    this.shares.set(from, held - shares);
    this.shares.set(to, this.sharesOf(to) + shares);
  }

  /**
   * The divisor only ever goes down, and never below MIN_DIVISOR.
   */
  rebase(newDivisor: bigint): void {
    if (newDivisor >= this._divisor || newDivisor < MIN_DIVISOR) {
      throw new ArithmeticError("Underflow", `invalid divisor ${newDivisor}, current ${this._divisor}`);
    }
    this._divisor = newDivisor;
  }

  checkpoint(): ElasticTokenSnapshot {
    return { shares: new Map(this.shares), totalShares: this._totalShares, divisor: this._divisor };
  }

  restore(snapshot: ElasticTokenSnapshot): void {
    this.shares = snapshot.shares;
    this._totalShares = snapshot.totalShares;
    this._divisor = snapshot.divisor;
  }
}
