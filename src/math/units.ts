/**
 * Decimal string <-> fixed-point bigint conversion.
 */

const DECIMAL_RE = /^(\d+)(?:\.(\d+))?$/;

export function parseUnits(value: string, decimals: number): bigint {
  const m = DECIMAL_RE.exec(value.trim());
  if (!m) throw new Error(`Invalid decimal amount: "${value}"`);
  const whole = m[1];
  const frac = m[2] ?? "";
  if (frac.length > decimals) {
    throw new Error(`Too many decimals in "${value}" (max ${decimals})`);
  }
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(frac.padEnd(decimals, "0") || "0");
}

export function formatUnits(value: bigint, decimals: number): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const frac = (abs % base).toString().padStart(decimals, "0").replace(/0+$/, "");
  return `${negative ? "-" : ""}${whole}${frac ? `.${frac}` : ""}`;
}
