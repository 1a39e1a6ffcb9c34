import { PublicKey } from "@solana/web3.js";

// DataView readers: records may come back from structuredClone as plain
// Uint8Array, which lacks Buffer's read helpers.
function dv(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

export function readU8(data: Uint8Array, off: number): number {
  return dv(data).getUint8(off);
}

export function readU32LE(data: Uint8Array, off: number): number {
  return dv(data).getUint32(off, true);
}

export function readI32LE(data: Uint8Array, off: number): number {
  return dv(data).getInt32(off, true);
}

export function readU64LE(data: Uint8Array, off: number): bigint {
  return dv(data).getBigUint64(off, true);
}

export function readU128LE(data: Uint8Array, off: number): bigint {
  const lo = readU64LE(data, off);
  const hi = readU64LE(data, off + 8);
  return (hi << 64n) | lo;
}

export function readU256LE(data: Uint8Array, off: number): bigint {
  return (readU128LE(data, off + 16) << 128n) | readU128LE(data, off);
}

export function readPubkey(data: Uint8Array, off: number): PublicKey {
  return new PublicKey(data.subarray(off, off + 32));
}
