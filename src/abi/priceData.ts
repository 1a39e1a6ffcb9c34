import { OracleError } from "../errors.js";
import { encU128, encU64 } from "./encode.js";
import { readU128LE, readU64LE } from "./decode.js";

/**
 * Signed price update as submitted by callers.
 * Layout: price(16) + timestamp(8) + reserved(16)
 */
export const PRICE_DATA_SIZE = 40;

export interface PriceRecord {
  price: bigint;
  timestamp: bigint;
}

export function encodePriceData(price: bigint, timestamp: bigint): Uint8Array {
  return Buffer.concat([encU128(price), encU64(timestamp), Buffer.alloc(16)]);
}

export function decodePriceData(data: Uint8Array): PriceRecord {
  if (data.length !== PRICE_DATA_SIZE) {
    throw new OracleError("InvalidPriceData", `expected ${PRICE_DATA_SIZE} bytes, got ${data.length}`);
  }
  return {
    price: readU128LE(data, 0),
    timestamp: readU64LE(data, 16),
  };
}
