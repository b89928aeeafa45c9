import { IndexOutOfRangeError } from '../errors';

/**
 * Hash and equality for one side of the index.
 */
export interface KeyComparer<T> {
  hash(key: T): number;
  equals(left: T, right: T): boolean;
}

export interface IndexPair<TFirst, TSecond> {
  readonly first: TFirst;
  readonly second: TSecond;
}

interface IndexEntry<TFirst, TSecond> {
  first: TFirst;
  second: TSecond;
  firstHash: number;
  secondHash: number;
  /** Next entry in the same first-key bucket, or -1. */
  nextFirst: number;
  /** Next entry in the same second-key bucket, or -1. */
  nextSecond: number;
}

const NONE = -1;
const HASH_MASK = 0x7fffffff;
const SMALL_PRIMES = [3, 7, 11, 17, 23, 29, 37, 47, 59, 71, 89, 107, 131, 163, 197, 239, 293, 353, 431, 521, 631, 761, 919];

function isPrime(candidate: number): boolean {
  if (candidate % 2 === 0) return candidate === 2;
  const limit = Math.floor(Math.sqrt(candidate));
  for (let divisor = 3; divisor <= limit; divisor += 2) {
    if (candidate % divisor === 0) return false;
  }
  return true;
}

/**
 * Smallest table prime >= `min`.
 * @internal
 */
export function getPrime(min: number): number {
  for (const prime of SMALL_PRIMES) {
    if (prime >= min) return prime;
  }
  for (let candidate = min | 1; ; candidate += 2) {
    if (isPrime(candidate)) return candidate;
  }
}

/**
 * Ordinal string comparer (FNV-1a).
 */
export const ordinalStringComparer: KeyComparer<string> = {
  hash(key) {
    let hash = 0x811c9dc5;
    for (let i = 0; i < key.length; i++) {
      hash ^= key.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193);
    }
    return hash;
  },
  equals(left, right) {
    return left === right;
  },
};

/**
 * Ordered list of `(first, second)` pairs with O(1) average lookup by either key.
 *
 * One backing array holds the entries in order; two bucket-head tables chain
 * into it through per-entry `next` links, so both maps share the same storage.
 * Keys are unique on each side: an insert that would duplicate either key is
 * refused.
 *
 * Inserting anywhere but the end shifts later entries and renumbers every
 * link that points past the insertion point, which is O(n). The index is
 * built once and then only read.
 */
export class OrderedBiDirectionalIndex<TFirst, TSecond> implements Iterable<IndexPair<TFirst, TSecond>> {
  private readonly entries: IndexEntry<TFirst, TSecond>[] = [];
  private firstBuckets: Int32Array;
  private secondBuckets: Int32Array;

  constructor(
    private readonly firstComparer: KeyComparer<TFirst>,
    private readonly secondComparer: KeyComparer<TSecond>,
    capacity: number = 0,
  ) {
    const size = getPrime(Math.max(capacity, 1));
    this.firstBuckets = new Int32Array(size).fill(NONE);
    this.secondBuckets = new Int32Array(size).fill(NONE);
  }

  get count(): number {
    return this.entries.length;
  }

  /**
   * Append a pair. Returns `false` if either key is already present.
   */
  add(first: TFirst, second: TSecond): boolean {
    return this.insert(this.entries.length, first, second);
  }

  /**
   * Insert a pair at `index`, shifting later entries. Returns `false` (and
   * changes nothing) if either key is already present.
   */
  insert(index: number, first: TFirst, second: TSecond): boolean {
    const count = this.entries.length;
    if (!Number.isInteger(index) || index < 0 || index > count) {
      throw new IndexOutOfRangeError(index, count);
    }

    const firstHash = this.firstComparer.hash(first) & HASH_MASK;
    const secondHash = this.secondComparer.hash(second) & HASH_MASK;
    if (this.findFirst(first, firstHash) !== NONE || this.findSecond(second, secondHash) !== NONE) {
      return false;
    }

    if (count >= this.firstBuckets.length) {
      this.resize(getPrime(count * 2));
    }

    if (index < count) {
      this.shiftLinks(index);
    }

    const entry: IndexEntry<TFirst, TSecond> = {
      first,
      second,
      firstHash,
      secondHash,
      nextFirst: NONE,
      nextSecond: NONE,
    };
    this.entries.splice(index, 0, entry);
    this.link(index);
    return true;
  }

  /**
   * Replace the second key of the entry at `index`. Returns `false` if another
   * entry already holds `second`.
   */
  setSecondAt(index: number, second: TSecond): boolean {
    const entry = this.entryAt(index);
    if (this.secondComparer.equals(entry.second, second)) return true;

    const secondHash = this.secondComparer.hash(second) & HASH_MASK;
    if (this.findSecond(second, secondHash) !== NONE) return false;

    // Unlink from the old second-key chain
    const oldBucket = entry.secondHash % this.secondBuckets.length;
    if (this.secondBuckets[oldBucket] === index) {
      this.secondBuckets[oldBucket] = entry.nextSecond;
    }
    else {
      let cursor = this.secondBuckets[oldBucket];
      while (cursor !== NONE && this.entries[cursor].nextSecond !== index) {
        cursor = this.entries[cursor].nextSecond;
      }
      if (cursor !== NONE) {
        this.entries[cursor].nextSecond = entry.nextSecond;
      }
    }

    entry.second = second;
    entry.secondHash = secondHash;
    const newBucket = secondHash % this.secondBuckets.length;
    entry.nextSecond = this.secondBuckets[newBucket];
    this.secondBuckets[newBucket] = index;
    return true;
  }

  /**
   * Position of the entry whose first key equals `first`, or -1.
   */
  lookupByFirst(first: TFirst): number {
    return this.findFirst(first, this.firstComparer.hash(first) & HASH_MASK);
  }

  /**
   * Position of the entry whose second key equals `second`, or -1.
   */
  lookupBySecond(second: TSecond): number {
    return this.findSecond(second, this.secondComparer.hash(second) & HASH_MASK);
  }

  getAt(index: number): IndexPair<TFirst, TSecond> {
    const entry = this.entryAt(index);
    return { first: entry.first, second: entry.second };
  }

  *[Symbol.iterator](): Iterator<IndexPair<TFirst, TSecond>> {
    for (const entry of this.entries) {
      yield { first: entry.first, second: entry.second };
    }
  }

  private entryAt(index: number): IndexEntry<TFirst, TSecond> {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new IndexOutOfRangeError(index, this.entries.length);
    }
    return this.entries[index];
  }

  private findFirst(first: TFirst, hash: number): number {
    let cursor = this.firstBuckets[hash % this.firstBuckets.length];
    while (cursor !== NONE) {
      const entry = this.entries[cursor];
      if (entry.firstHash === hash && this.firstComparer.equals(entry.first, first)) {
        return cursor;
      }
      cursor = entry.nextFirst;
    }
    return NONE;
  }

  private findSecond(second: TSecond, hash: number): number {
    let cursor = this.secondBuckets[hash % this.secondBuckets.length];
    while (cursor !== NONE) {
      const entry = this.entries[cursor];
      if (entry.secondHash === hash && this.secondComparer.equals(entry.second, second)) {
        return cursor;
      }
      cursor = entry.nextSecond;
    }
    return NONE;
  }

  /**
   * Push the entry at `index` onto the head of both of its bucket chains.
   */
  private link(index: number): void {
    const entry = this.entries[index];
    const firstBucket = entry.firstHash % this.firstBuckets.length;
    entry.nextFirst = this.firstBuckets[firstBucket];
    this.firstBuckets[firstBucket] = index;

    const secondBucket = entry.secondHash % this.secondBuckets.length;
    entry.nextSecond = this.secondBuckets[secondBucket];
    this.secondBuckets[secondBucket] = index;
  }

  /**
   * Renumber every link at or past `index` ahead of an insertion there.
   */
  private shiftLinks(index: number): void {
    const bump = (link: number): number => (link >= index ? link + 1 : link);

    for (let bucket = 0; bucket < this.firstBuckets.length; bucket++) {
      this.firstBuckets[bucket] = bump(this.firstBuckets[bucket]);
      this.secondBuckets[bucket] = bump(this.secondBuckets[bucket]);
    }
    for (const entry of this.entries) {
      entry.nextFirst = bump(entry.nextFirst);
      entry.nextSecond = bump(entry.nextSecond);
    }
  }

  private resize(size: number): void {
    this.firstBuckets = new Int32Array(size).fill(NONE);
    this.secondBuckets = new Int32Array(size).fill(NONE);
    for (let i = 0; i < this.entries.length; i++) {
      this.link(i);
    }
  }
}
