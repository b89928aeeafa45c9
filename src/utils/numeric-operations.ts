import type { BigIntKind, IntegerKind, NumberKind, NumericOperations } from '../types';

const DECIMAL_PATTERN = /^[+-]?[0-9]+$/;
const HEX_PATTERN = /^[0-9A-Fa-f]+$/;

/**
 * Parse decimal digits with an optional sign into a bigint.
 * @internal
 */
function parseDecimalBigInt(text: string): bigint | undefined {
  if (!DECIMAL_PATTERN.test(text)) return undefined;
  const negative = text.startsWith('-');
  const digits = text.startsWith('-') || text.startsWith('+') ? text.slice(1) : text;
  const magnitude = BigInt(digits);
  return negative ? -magnitude : magnitude;
}

/**
 * Parse bare hex digits into an unsigned bigint.
 * @internal
 */
function parseHexBigInt(text: string): bigint | undefined {
  if (!HEX_PATTERN.test(text)) return undefined;
  return BigInt(`0x${text}`);
}

/**
 * Whether `text` looks like a base-10 integer literal.
 * Used to tell range failures apart from unmatched text.
 */
export function isNumericText(text: string): boolean {
  return DECIMAL_PATTERN.test(text);
}

// Number-backed kinds
// ==============================

class SmallIntegerOperations implements NumericOperations<number> {
  readonly byteWidth: number;
  readonly zero = 0;
  readonly one = 1;
  readonly allOnes: number;
  readonly minValue: number;
  readonly maxValue: number;

  private readonly bits: number;
  private readonly shift: number;
  private readonly mask: number;

  constructor(
    readonly kind: NumberKind,
    bits: number,
    readonly signed: boolean,
  ) {
    this.bits = bits;
    this.byteWidth = bits / 8;
    this.shift = 32 - bits;
    this.mask = bits === 32 ? 0xffffffff : (1 << bits) - 1;
    this.minValue = signed ? -(2 ** (bits - 1)) : 0;
    this.maxValue = signed ? 2 ** (bits - 1) - 1 : 2 ** bits - 1;
    this.allOnes = signed ? -1 : this.maxValue;
  }

  /**
   * Reduce an int32-range result to this width.
   */
  private wrap(value: number): number {
    if (this.bits === 32) return this.signed ? value | 0 : value >>> 0;
    return this.signed ? (value << this.shift) >> this.shift : value & this.mask;
  }

  add(left: number, right: number): number {
    return this.wrap((left + right) | 0);
  }

  subtract(left: number, right: number): number {
    return this.wrap((left - right) | 0);
  }

  and(left: number, right: number): number {
    return this.wrap(left & right);
  }

  or(left: number, right: number): number {
    return this.wrap(left | right);
  }

  xor(left: number, right: number): number {
    return this.wrap(left ^ right);
  }

  not(value: number): number {
    return this.wrap(~value);
  }

  leftShift(value: number, bits: number): number {
    if (bits >= this.bits) return 0;
    return this.wrap(value << bits);
  }

  compare(left: number, right: number): number {
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  equals(left: number, right: number): boolean {
    return left === right;
  }

  isPowerOfTwoOrZero(value: number): boolean {
    return this.and(value, this.subtract(value, 1)) === 0;
  }

  hash(value: number): number {
    return value | 0;
  }

  toBigInt(value: number): bigint {
    return BigInt(value);
  }

  fromInteger(value: number | bigint): number | undefined {
    if (typeof value === 'bigint') {
      if (value < BigInt(this.minValue) || value > BigInt(this.maxValue)) return undefined;
      return Number(value);
    }
    if (!Number.isInteger(value) || value < this.minValue || value > this.maxValue) {
      return undefined;
    }
    // Normalizes -0
    return value + 0;
  }

  parseDecimal(text: string): number | undefined {
    const parsed = parseDecimalBigInt(text);
    return parsed === undefined ? undefined : this.fromInteger(parsed);
  }

  parseHex(text: string): number | undefined {
    const parsed = parseHexBigInt(text);
    if (parsed === undefined || parsed > BigInt(this.mask)) return undefined;
    const bitPattern = this.signed ? BigInt.asIntN(this.bits, parsed) : parsed;
    return Number(bitPattern);
  }

  formatDecimal(value: number): string {
    return String(value);
  }

  formatHex(value: number): string {
    return BigInt.asUintN(this.bits, BigInt(value))
      .toString(16)
      .toUpperCase()
      .padStart(this.byteWidth * 2, '0');
  }
}

// BigInt-backed kinds
// ==============================

const WIDE_BITS = 64;

class WideIntegerOperations implements NumericOperations<bigint> {
  readonly byteWidth = WIDE_BITS / 8;
  readonly zero = 0n;
  readonly one = 1n;
  readonly allOnes: bigint;
  readonly minValue: bigint;
  readonly maxValue: bigint;

  constructor(
    readonly kind: BigIntKind,
    readonly signed: boolean,
  ) {
    this.minValue = signed ? -(2n ** 63n) : 0n;
    this.maxValue = signed ? 2n ** 63n - 1n : 2n ** 64n - 1n;
    this.allOnes = signed ? -1n : this.maxValue;
  }

  private wrap(value: bigint): bigint {
    return this.signed ? BigInt.asIntN(WIDE_BITS, value) : BigInt.asUintN(WIDE_BITS, value);
  }

  add(left: bigint, right: bigint): bigint {
    return this.wrap(left + right);
  }

  subtract(left: bigint, right: bigint): bigint {
    return this.wrap(left - right);
  }

  and(left: bigint, right: bigint): bigint {
    return this.wrap(left & right);
  }

  or(left: bigint, right: bigint): bigint {
    return this.wrap(left | right);
  }

  xor(left: bigint, right: bigint): bigint {
    return this.wrap(left ^ right);
  }

  not(value: bigint): bigint {
    return this.wrap(~value);
  }

  leftShift(value: bigint, bits: number): bigint {
    return this.wrap(value << BigInt(bits));
  }

  compare(left: bigint, right: bigint): number {
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  equals(left: bigint, right: bigint): boolean {
    return left === right;
  }

  isPowerOfTwoOrZero(value: bigint): boolean {
    return this.and(value, this.subtract(value, 1n)) === 0n;
  }

  hash(value: bigint): number {
    return Number(BigInt.asIntN(32, value ^ (value >> 32n)));
  }

  toBigInt(value: bigint): bigint {
    return value;
  }

  fromInteger(value: number | bigint): bigint | undefined {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) return undefined;
    const wide = BigInt(value);
    if (wide < this.minValue || wide > this.maxValue) return undefined;
    return wide;
  }

  parseDecimal(text: string): bigint | undefined {
    const parsed = parseDecimalBigInt(text);
    return parsed === undefined ? undefined : this.fromInteger(parsed);
  }

  parseHex(text: string): bigint | undefined {
    const parsed = parseHexBigInt(text);
    if (parsed === undefined || parsed > 2n ** 64n - 1n) return undefined;
    return this.wrap(parsed);
  }

  formatDecimal(value: bigint): string {
    return value.toString();
  }

  formatHex(value: bigint): string {
    return BigInt.asUintN(WIDE_BITS, value)
      .toString(16)
      .toUpperCase()
      .padStart(this.byteWidth * 2, '0');
  }
}

// Shared instances
// ==============================

const NUMBER_OPERATIONS: { [K in NumberKind]: NumericOperations<number> } = {
  int8: new SmallIntegerOperations('int8', 8, true),
  uint8: new SmallIntegerOperations('uint8', 8, false),
  int16: new SmallIntegerOperations('int16', 16, true),
  uint16: new SmallIntegerOperations('uint16', 16, false),
  int32: new SmallIntegerOperations('int32', 32, true),
  uint32: new SmallIntegerOperations('uint32', 32, false),
};

const BIGINT_OPERATIONS: { [K in BigIntKind]: NumericOperations<bigint> } = {
  int64: new WideIntegerOperations('int64', true),
  uint64: new WideIntegerOperations('uint64', false),
};

export function isBigIntKind(kind: IntegerKind): kind is BigIntKind {
  return kind === 'int64' || kind === 'uint64';
}

/**
 * Return the shared operations for an integer kind.
 *
 * One instance exists per kind, so callers may compare them by identity.
 */
export function numericOperationsFor(kind: NumberKind): NumericOperations<number>;
export function numericOperationsFor(kind: BigIntKind): NumericOperations<bigint>;
export function numericOperationsFor(
  kind: IntegerKind,
): NumericOperations<number> | NumericOperations<bigint>;
export function numericOperationsFor(
  kind: IntegerKind,
): NumericOperations<number> | NumericOperations<bigint> {
  if (isBigIntKind(kind)) return BIGINT_OPERATIONS[kind];
  const operations = NUMBER_OPERATIONS[kind];
  if (!operations) {
    throw new Error(`Unknown integer kind "${String(kind)}"`);
  }
  return operations;
}
