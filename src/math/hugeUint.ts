import { ArithmeticError } from "../errors.js";
import { UINT256_MAX } from "../constants.js";
import { toUint256 } from "./fixedPoint.js";

/**
 * 512-bit unsigned integer split in two 256-bit limbs.
 *
 * Only used where a product of two 256-bit words must be kept whole before
 * being divided back down (the liquidation multiplier update).
 */
export interface Uint512 {
  hi: bigint;
  lo: bigint;
}

const LIMB_BITS = 256n;
const UINT512_MAX = (1n << 512n) - 1n;

function join(x: Uint512): bigint {
  return (x.hi << LIMB_BITS) | x.lo;
}

function split(x: bigint): Uint512 {
  if (x < 0n) {
    throw new ArithmeticError("Underflow", "HugeUint result is negative");
  }
  if (x > UINT512_MAX) {
    throw new ArithmeticError("Overflow", "HugeUint result exceeds 512 bits");
  }
  return { hi: x >> LIMB_BITS, lo: x & UINT256_MAX };
}

export function wrap(x: bigint): Uint512 {
  return { hi: 0n, lo: toUint256(x, "HugeUint operand") };
}

export function add(a: Uint512, b: Uint512): Uint512 {
  return split(join(a) + join(b));
}

export function sub(a: Uint512, b: Uint512): Uint512 {
  return split(join(a) - join(b));
}

/**
 * Full 512-bit product of two 256-bit words.
 */
export function mul(a: bigint, b: bigint): Uint512 {
  return split(toUint256(a, "HugeUint operand") * toUint256(b, "HugeUint operand"));
}

/**
 * Divides a 512-bit value by a 256-bit word. The quotient must fit in 256 bits.
 */
export function div(a: Uint512, d: bigint): bigint {
  if (d === 0n) {
    throw new ArithmeticError("HugeUintDivisionFailed", "division by zero");
  }
  const q = join(a) / toUint256(d, "HugeUint divisor");
  if (q > UINT256_MAX) {
    throw new ArithmeticError("HugeUintDivisionFailed", "quotient exceeds 256 bits");
  }
  return q;
}

export function cmp(a: Uint512, b: Uint512): -1 | 0 | 1 {
  const x = join(a);
  const y = join(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

export function isZero(a: Uint512): boolean {
  return a.hi === 0n && a.lo === 0n;
}
