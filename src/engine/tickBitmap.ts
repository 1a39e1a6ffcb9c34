/**
 * Populated-tick bitmap.
 *
 * Ticks live on the spacing grid, so a tick is stored as `tick / spacing`
 * in 256-bit words. A sorted index of non-empty words lets lookups jump over
 * empty ranges without walking them.
 */
export interface TickBitmap {
  words: Map<number, bigint>;
  /** ascending indices of words that have at least one bit set */
  wordIndices: number[];
}

const WORD_BITS = 256;

export function createTickBitmap(): TickBitmap {
  return { words: new Map(), wordIndices: [] };
}

function locate(tick: number, tickSpacing: number): { word: number; bit: number } {
  const compressed = Math.floor(tick / tickSpacing);
  const word = Math.floor(compressed / WORD_BITS);
  return { word, bit: compressed - word * WORD_BITS };
}

function mostSignificantBit(x: bigint): number {
  return x.toString(2).length - 1;
}

// index of the first element >= word
function lowerBound(indices: number[], word: number): number {
  let lo = 0;
  let hi = indices.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (indices[mid] < word) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export function isSet(bitmap: TickBitmap, tick: number, tickSpacing: number): boolean {
  const { word, bit } = locate(tick, tickSpacing);
  const value = bitmap.words.get(word) ?? 0n;
  return ((value >> BigInt(bit)) & 1n) === 1n;
}

export function set(bitmap: TickBitmap, tick: number, tickSpacing: number): void {
  const { word, bit } = locate(tick, tickSpacing);
  const value = bitmap.words.get(word);
  if (value === undefined) {
    const at = lowerBound(bitmap.wordIndices, word);
    bitmap.wordIndices.splice(at, 0, word);
  }
  bitmap.words.set(word, (value ?? 0n) | (1n << BigInt(bit)));
}

export function unset(bitmap: TickBitmap, tick: number, tickSpacing: number): void {
  const { word, bit } = locate(tick, tickSpacing);
  const value = bitmap.words.get(word);
  if (value === undefined) return;
  const next = value & ~(1n << BigInt(bit));
  if (next === 0n) {
    bitmap.words.delete(word);
    bitmap.wordIndices.splice(lowerBound(bitmap.wordIndices, word), 1);
  } else {
    bitmap.words.set(word, next);
  }
}

/**
 * Highest populated tick at or below `upTo`, or the highest populated tick
 * overall when `upTo` is omitted.
 */
export function findLastSet(bitmap: TickBitmap, tickSpacing: number, upTo?: number): number | undefined {
  const indices = bitmap.wordIndices;
  if (indices.length === 0) return undefined;

  let candidate: number;
  if (upTo === undefined) {
    candidate = indices.length - 1;
  } else {
    const { word, bit } = locate(upTo, tickSpacing);
    const value = bitmap.words.get(word);
    if (value !== undefined) {
      const masked = value & ((1n << BigInt(bit + 1)) - 1n);
      if (masked !== 0n) {
        return (word * WORD_BITS + mostSignificantBit(masked)) * tickSpacing;
      }
    }
    candidate = lowerBound(indices, word) - 1;
    if (candidate < 0) return undefined;
  }

  const word = indices[candidate];
  const value = bitmap.words.get(word) ?? 0n;
  return (word * WORD_BITS + mostSignificantBit(value)) * tickSpacing;
}
