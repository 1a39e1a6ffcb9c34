import { PublicKey } from "@solana/web3.js";

/**
 * Little-endian fixed-width encoders. Each throws when the value does not fit.
 */

function checkRange(value: bigint, min: bigint, max: bigint, kind: string): bigint {
  if (value < min || value > max) {
    throw new Error(`Value ${value} out of range for ${kind}`);
  }
  return value;
}

function toBigInt(value: bigint | string | number): bigint {
  return typeof value === "bigint" ? value : BigInt(value);
}

export function encU8(value: number): Buffer {
  const buf = Buffer.alloc(1);
  buf.writeUInt8(value);
  return buf;
}

export function encU32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(value);
  return buf;
}

export function encI32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeInt32LE(value);
  return buf;
}

export function encU64(value: bigint | string | number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64LE(checkRange(toBigInt(value), 0n, (1n << 64n) - 1n, "u64"));
  return buf;
}

export function encU128(value: bigint | string | number): Buffer {
  const v = checkRange(toBigInt(value), 0n, (1n << 128n) - 1n, "u128");
  const buf = Buffer.alloc(16);
  buf.writeBigUInt64LE(v & 0xffff_ffff_ffff_ffffn, 0);
  buf.writeBigUInt64LE(v >> 64n, 8);
  return buf;
}

export function encU256(value: bigint | string | number): Buffer {
  const v = checkRange(toBigInt(value), 0n, (1n << 256n) - 1n, "u256");
  return Buffer.concat([encU128(v & ((1n << 128n) - 1n)), encU128(v >> 128n)]);
}

export function encPubkey(value: PublicKey | string): Buffer {
  const key = typeof value === "string" ? new PublicKey(value) : value;
  return key.toBuffer();
}

/**
 * Pads `buf` with zeros up to `size` bytes.
 */
export function padTo(buf: Buffer, size: number): Buffer {
  if (buf.length > size) {
    throw new Error(`Encoded length ${buf.length} exceeds record size ${size}`);
  }
  return Buffer.concat([buf, Buffer.alloc(size - buf.length)]);
}
