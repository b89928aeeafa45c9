/**
 * Value carried by a domain member: `number` for widths up to 32 bits,
 * `bigint` for the 64-bit kinds.
 */
export type Numeric = number | bigint;

/**
 * Integer kinds whose values fit a JS `number`.
 */
export type NumberKind = 'int8' | 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32';

/**
 * Integer kinds whose values are carried as `bigint`.
 */
export type BigIntKind = 'int64' | 'uint64';

export type IntegerKind = NumberKind | BigIntKind;

/**
 * Kind union that matches a value type.
 */
export type KindOf<W extends Numeric> = W extends bigint ? BigIntKind : NumberKind;

/**
 * Fixed-width integer arithmetic for one integer kind.
 *
 * Every arithmetic and bitwise result wraps to the kind's width, two's complement
 * for signed kinds, the way a machine integer of that width behaves.
 */
export interface NumericOperations<W extends Numeric> {
  readonly kind: KindOf<W>;
  readonly byteWidth: number;
  readonly signed: boolean;
  readonly zero: W;
  readonly one: W;
  /** Every bit of the width set (`-1` for signed kinds). */
  readonly allOnes: W;
  readonly minValue: W;
  readonly maxValue: W;

  add(left: W, right: W): W;
  subtract(left: W, right: W): W;
  and(left: W, right: W): W;
  or(left: W, right: W): W;
  xor(left: W, right: W): W;
  not(value: W): W;
  leftShift(value: W, bits: number): W;
  compare(left: W, right: W): number;
  equals(left: W, right: W): boolean;
  isPowerOfTwoOrZero(value: W): boolean;
  hash(value: W): number;
  toBigInt(value: W): bigint;

  /**
   * Range-checked conversion. Returns `undefined` when `value` is not an integer
   * representable in this kind.
   */
  fromInteger(value: number | bigint): W | undefined;

  /** Base-10 with an optional leading sign. `undefined` if malformed or out of range. */
  parseDecimal(text: string): W | undefined;
  /** Bare hex digits read as the raw bit pattern. `undefined` if malformed or out of range. */
  parseHex(text: string): W | undefined;
  formatDecimal(value: W): string;
  /** Upper-case, zero-padded to two digits per byte. */
  formatHex(value: W): string;
}

/**
 * A member as supplied by the host: name, value and opaque tags.
 */
export interface RawMember<W extends Numeric = number> {
  name: string;
  value: W;
  tags?: readonly unknown[];
}

/**
 * An immutable member of a built domain.
 */
export interface DomainMember<W extends Numeric = Numeric> {
  readonly name: string;
  readonly value: W;
  /** Tags with the preferred textual tag (if any) hoisted to the front. */
  readonly tags: readonly unknown[];
  /** Text of the preferred textual tag, used by the `Tag` selector. */
  readonly text: string | undefined;
  /** `false` for aliases: later names sharing a value with a primary member. */
  readonly isPrimary: boolean;
}

/**
 * Extracts construction hints from a member's tags.
 * Only consulted while a domain is being built.
 */
export interface TagInspector {
  preferredText(tags: readonly unknown[]): { index: number; text: string } | undefined;
  isPrimaryMarker(tags: readonly unknown[]): boolean;
}

/**
 * Identifier of a formatting/parsing strategy. Built-ins live in `Selector`;
 * custom formatters receive ids from their registry.
 */
export type FormatSelector = number;

/**
 * Custom formatter. Returning `null` or `undefined` lets the next selector try.
 */
export type MemberFormatter<W extends Numeric = Numeric> = (
  member: DomainMember<W>,
) => string | null | undefined;

/**
 * Range summary of a domain's primary values.
 *
 * `isContiguous` holds when the primary values form an unbroken ascending run,
 * which lets membership tests compare against the bounds instead of probing.
 */
export interface ContiguitySummary<W extends Numeric> {
  minValue: W;
  maxValue: W;
  isContiguous: boolean;
}

/**
 * Definition of a closed value domain.
 *
 * @example
 * ```ts
 * const access = createDomain({
 *   name: 'Access',
 *   kind: 'uint8',
 *   flags: true,
 *   members: [
 *     { name: 'None', value: 0 },
 *     { name: 'Read', value: 1, tags: [description('read access')] },
 *     { name: 'Write', value: 2 },
 *     { name: 'ReadWrite', value: 3 },
 *   ],
 * });
 * ```
 */
export interface DomainDefinition<W extends Numeric = number> {
  /** Used in error messages and `describe()`. */
  name: string;
  kind: KindOf<W>;
  /**
   * Marks a flag domain, whose valid values are OR-combinations of its
   * single-bit members. Defaults to `false`.
   */
  flags?: boolean;
  /**
   * Members in declaration order, or a thunk evaluated on first build.
   */
  members: readonly RawMember<W>[] | (() => readonly RawMember<W>[]);
  /** Defaults to `defaultTagInspector`. */
  tagInspector?: TagInspector;
  /**
   * Custom validity check. A non-`undefined` answer overrides the default
   * `isValid` logic.
   */
  validate?: (value: W) => boolean | undefined;
}

/**
 * Options for text parsing.
 */
export interface ParseOptions {
  /** Match names and formatted texts without regard to case. Defaults to `false`. */
  ignoreCase?: boolean;
  /** Selector order. Defaults to `[Selector.Name, Selector.Decimal]`. */
  selectors?: readonly FormatSelector[];
}

/**
 * Options for flag formatting and parsing.
 */
export interface FlagTextOptions extends ParseOptions {
  /** Defaults to `', '`. */
  delimiter?: string;
}

/**
 * JSON-friendly summary of a built domain. Values are decimal strings so
 * 64-bit domains serialize without loss.
 */
export interface DomainSummary {
  name: string;
  kind: IntegerKind;
  isFlagDomain: boolean;
  counts: {
    primary: number;
    total: number;
  };
  contiguity?: {
    minValue: string;
    maxValue: string;
    isContiguous: boolean;
  };
  /** Only present for flag domains. */
  flagUnion?: string;
  members: Array<{
    name: string;
    value: string;
    isPrimary: boolean;
    text?: string;
  }>;
}
