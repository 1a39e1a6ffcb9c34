import { ArithmeticError } from "../errors.js";
import { INT256_MAX, INT256_MIN, UINT256_MAX } from "../constants.js";

/**
 * Checked fixed-width helpers. Values are bigints, but every result that
 * would not fit the 256-bit words of the ledger aborts instead of wrapping.
 */

export function toUint256(x: bigint, what = "value"): bigint {
  if (x < 0n) {
    throw new ArithmeticError("Underflow", `${what} is negative: ${x}`);
  }
  if (x > UINT256_MAX) {
    throw new ArithmeticError("Overflow", `${what} exceeds uint256`);
  }
  return x;
}

export function toInt256(x: bigint, what = "value"): bigint {
  if (x > INT256_MAX || x < INT256_MIN) {
    throw new ArithmeticError("Overflow", `${what} exceeds int256`);
  }
  return x;
}

/**
 * floor(a * b / d) for unsigned operands.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  toUint256(a, "mulDiv operand");
  toUint256(b, "mulDiv operand");
  if (d === 0n) {
    throw new ArithmeticError("DivisionByZero", "mulDiv denominator is zero");
  }
  return toUint256((a * b) / toUint256(d, "mulDiv denominator"), "mulDiv result");
}

/**
 * ceil(a * b / d) for unsigned operands.
 */
export function mulDivUp(a: bigint, b: bigint, d: bigint): bigint {
  const down = mulDiv(a, b, d);
  return (a * b) % d === 0n ? down : down + 1n;
}

/**
 * a * b / d for signed operands, truncated toward zero.
 */
export function signedMulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d === 0n) {
    throw new ArithmeticError("DivisionByZero", "signedMulDiv denominator is zero");
  }
  return toInt256((a * b) / d, "signedMulDiv result");
}

export function checkedSub(a: bigint, b: bigint, what = "value"): bigint {
  if (b > a) {
    throw new ArithmeticError("Underflow", `${what}: ${a} - ${b}`);
  }
  return a - b;
}

export function abs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

export function sign(x: bigint): bigint {
  return x > 0n ? 1n : x < 0n ? -1n : 0n;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function clamp(x: bigint, lo: bigint, hi: bigint): bigint {
  return x < lo ? lo : x > hi ? hi : x;
}
