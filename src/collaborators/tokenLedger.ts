import { PreconditionError } from "../errors.js";
import type { Address } from "../engine/types.js";
import type { Checkpointable } from "../runtime/ledger.js";

export type TransferHook = (from: Address, to: Address, amount: bigint) => void;

/**
 * Fungible balances of one currency. The optional hook runs after every
 * transfer, the way a token callback would.
 */
export class TokenLedger implements Checkpointable<Map<Address, bigint>> {
  private balances = new Map<Address, bigint>();
  private hook: TransferHook | undefined;

  constructor(readonly symbol: string) {}

  balanceOf(owner: Address): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  mint(to: Address, amount: bigint): void {
    if (amount < 0n) throw new PreconditionError("ZeroAmount", `cannot mint ${amount} ${this.symbol}`);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return;
    const balance = this.balanceOf(from);
    if (amount < 0n || balance < amount) {
      throw new PreconditionError("InsufficientBalance", `${from} holds ${balance} ${this.symbol}, needs ${amount}`);
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.hook?.(from, to, amount);
  }

  setTransferHook(hook: TransferHook | undefined): void {
    this.hook = hook;
  }

  checkpoint(): Map<Address, bigint> {
    return new Map(this.balances);
  }

  restore(snapshot: Map<Address, bigint>): void {
    this.balances = snapshot;
  }
}
