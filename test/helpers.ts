import { ProtocolError } from "../src/errors.js";

export function assert(cond: boolean, msg: string): void {
  if (!cond) throw new Error(`FAIL: ${msg}`);
}

export function assertEq<T>(actual: T, expected: T, msg: string): void {
  if (actual !== expected) {
    throw new Error(`FAIL: ${msg}: expected ${String(expected)}, got ${String(actual)}`);
  }
}

/**
 * Runs `fn` and returns the ProtocolError it throws with `code`.
 */
export function expectError(fn: () => unknown, code: string, msg: string): ProtocolError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ProtocolError && e.code === code) return e;
    throw new Error(`FAIL: ${msg}: expected ${code}, got ${e instanceof Error ? e.message : String(e)}`);
  }
  throw new Error(`FAIL: ${msg}: expected ${code}, nothing was thrown`);
}

/**
 * Deterministic generator for property checks.
 */
export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    return state / 0x1_0000_0000;
  };
}

export function randomBigInt(rand: () => number, min: bigint, max: bigint): bigint {
  let r = 0n;
  // 128 random bits cover every range used in tests
  for (let i = 0; i < 4; i++) r = (r << 32n) | BigInt(Math.floor(rand() * 0x1_0000_0000));
  return min + (r % (max - min + 1n));
}

/**
 * Runs `fn` and checks that it throws an error whose message contains `fragment`.
 */
export function expectThrow(fn: () => unknown, fragment: string, msg: string): void {
  try {
    fn();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    if (message.includes(fragment)) return;
    throw new Error(`FAIL: ${msg}: "${message}" does not contain "${fragment}"`);
  }
  throw new Error(`FAIL: ${msg}: nothing was thrown`);
}
