import { PreconditionError } from "../errors.js";
import { TokenLedger } from "../collaborators/tokenLedger.js";
import { EventLog } from "./events.js";

/**
 * A component whose state the ledger can save before a call and put back
 * when the call fails.
 */
export interface Checkpointable<T> {
  checkpoint(): T;
  restore(snapshot: T): void;
}

type Restorer = () => void;

export const DEFAULT_START_TIMESTAMP = 1_700_000_000n;

/**
 * Serially ordered, single-writer ledger. Owns the clock, the asset and
 * native-currency balances and the event log; every call made through
 * `execute` either commits entirely or leaves every registered component as
 * it was.
 */
export class Ledger {
  readonly asset = new TokenLedger("ASSET");
  readonly native = new TokenLedger("NATIVE");
  readonly events = new EventLog();

  private now: bigint;
  private readonly components: Array<() => Restorer> = [];

  constructor(startTimestamp: bigint = DEFAULT_START_TIMESTAMP) {
    this.now = startTimestamp;
    this.register(this.asset);
    this.register(this.native);
    this.register(this.events);
  }

  timestamp(): bigint {
    return this.now;
  }

  warp(timestamp: bigint): void {
    if (timestamp < this.now) {
      throw new PreconditionError("TimestampTooOld", `cannot warp back from ${this.now} to ${timestamp}`);
    }
    this.now = timestamp;
  }

  skip(seconds: bigint): void {
    this.warp(this.now + seconds);
  }

  register<T>(component: Checkpointable<T>): void {
    this.components.push(() => {
      const snapshot = component.checkpoint();
      return () => component.restore(snapshot);
    });
  }

  /**
   * Runs `fn` atomically: if it throws, every registered component is
   * restored and the error is rethrown.
   */
  execute<T>(fn: () => T): T {
    const restorers = this.components.map((take) => take());
    try {
      return fn();
    } catch (e) {
      for (const restore of restorers.reverse()) restore();
      throw e;
    }
  }
}
