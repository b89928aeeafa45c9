import { InvalidValueError, MalformedDomainError, NotFlagDomainError, ValueOutOfRangeError } from './errors';
import { DOMAIN_SELECTOR_START, FormatterRegistry, Selector } from './formatters';
import { defaultTagInspector } from './tags';
import type {
  DomainDefinition,
  DomainMember,
  DomainSummary,
  FlagTextOptions,
  FormatSelector,
  IntegerKind,
  KindOf,
  MemberFormatter,
  Numeric,
  NumericOperations,
  ParseOptions,
} from './types';
import { FlagAlgebra } from './utils/flag-algebra';
import { MemberCache } from './utils/member-cache';
import { isBigIntKind, numericOperationsFor } from './utils/numeric-operations';
import { TextPipeline } from './utils/text-pipeline';

const INTEGER_KINDS: readonly IntegerKind[] = [
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
];

/** Per-domain selector ids run from `DOMAIN_SELECTOR_START` up to this many. */
const DOMAIN_FORMATTER_CAPACITY = 1_000_000;

/**
 * Build a domain immediately, outside any registry.
 *
 * Overloads:
 * - `number`-valued kinds (`int8` through `uint32`)
 * - `bigint`-valued kinds (`int64`, `uint64`)
 *
 * @throws MalformedDomainError when the definition or its members are invalid.
 */

// Up to 32 bits
export function createDomain(definition: DomainDefinition<number>): ValueDomain<number>;

// 64 bits
export function createDomain(definition: DomainDefinition<bigint>): ValueDomain<bigint>;

// Implementation
export function createDomain(
  definition: DomainDefinition<number> | DomainDefinition<bigint>,
): ValueDomain<number> | ValueDomain<bigint> {
  validateDefinition(definition);

  if (isBigIntDefinition(definition)) {
    return ValueDomain.create(definition, numericOperationsFor(definition.kind));
  }
  return ValueDomain.create(definition, numericOperationsFor(definition.kind));
}

/**
 * @internal
 */
export function isBigIntDefinition(
  definition: DomainDefinition<number> | DomainDefinition<bigint>,
): definition is DomainDefinition<bigint> {
  return isBigIntKind(definition.kind);
}

/**
 * A built, immutable closed value domain: member metadata, flag operations
 * and text conversion for one set of named integer constants.
 *
 * @example
 * ```ts
 * const color = createDomain({
 *   name: 'Color',
 *   kind: 'uint8',
 *   members: [
 *     { name: 'Red', value: 1 },
 *     { name: 'Green', value: 2 },
 *     { name: 'Blue', value: 3, tags: [description('deep blue')] },
 *   ],
 * });
 *
 * color.format(3);                  // 'Blue'
 * color.format(3, Selector.Tag);    // 'deep blue'
 * color.parse('green', { ignoreCase: true }); // 2
 * ```
 */
export class ValueDomain<W extends Numeric> {
  readonly name: string;
  readonly kind: KindOf<W>;
  readonly isFlagDomain: boolean;
  readonly operations: NumericOperations<W>;

  private readonly cache: MemberCache<W>;
  private readonly flagAlgebra: FlagAlgebra<W> | undefined;
  private readonly formatters: FormatterRegistry<W>;
  private readonly pipeline: TextPipeline<W>;
  private readonly customValidate: ((value: W) => boolean | undefined) | undefined;

  private constructor(definition: DomainDefinition<W>, operations: NumericOperations<W>, cache: MemberCache<W>) {
    this.name = definition.name;
    this.kind = operations.kind;
    this.isFlagDomain = definition.flags ?? false;
    this.operations = operations;
    this.cache = cache;
    this.customValidate = definition.validate;
    this.flagAlgebra = this.isFlagDomain ? new FlagAlgebra(this.name, cache, operations) : undefined;
    this.formatters = new FormatterRegistry<W>(DOMAIN_SELECTOR_START, DOMAIN_FORMATTER_CAPACITY);
    this.pipeline = new TextPipeline(this.name, cache, operations, this.flagAlgebra, this.formatters);
  }

  /**
   * Build a domain from a definition whose kind has already been resolved to
   * its numeric operations. Evaluates a `members` thunk exactly once.
   */
  static create<TValue extends Numeric>(
    definition: DomainDefinition<TValue>,
    operations: NumericOperations<TValue>,
  ): ValueDomain<TValue> {
    const rawMembers = typeof definition.members === 'function' ? definition.members() : definition.members;
    const cache = MemberCache.create(rawMembers, {
      domainName: definition.name,
      operations,
      isFlagDomain: definition.flags ?? false,
      tagInspector: definition.tagInspector ?? defaultTagInspector,
    });
    return new ValueDomain(definition, operations, cache);
  }

  // Members
  // ==============================

  /**
   * Number of members; aliases are only counted when asked.
   */
  count(includeAliases: boolean = false): number {
    return this.cache.count(includeAliases);
  }

  /**
   * Members in ascending value order. With aliases, each primary member comes
   * before the aliases of its value.
   */
  members(includeAliases: boolean = false): DomainMember<W>[] {
    return this.cache.enumerateAll(includeAliases);
  }

  names(includeAliases: boolean = false): string[] {
    return this.cache.enumerateAll(includeAliases).map((member) => member.name);
  }

  values(includeAliases: boolean = false): W[] {
    return this.cache.enumerateAll(includeAliases).map((member) => member.value);
  }

  /**
   * Primary member for `value`, or `undefined`.
   */
  member(value: W): DomainMember<W> | undefined {
    return this.cache.getByValue(value);
  }

  /**
   * Member (primary or alias) called `name`, or `undefined`.
   */
  memberByName(name: string, ignoreCase: boolean = false): DomainMember<W> | undefined {
    return this.cache.getByName(name, ignoreCase);
  }

  isDefined(value: W): boolean {
    return this.cache.isDefined(value);
  }

  /**
   * Whether `value` is acceptable for this domain: a defined member, or for
   * flag domains any valid flag combination. A definition's `validate` hook
   * overrides this when it returns a boolean.
   */
  isValid(value: W): boolean {
    const custom = this.customValidate?.(value);
    if (custom !== undefined) return custom;
    return this.flagAlgebra ? this.flagAlgebra.isValidFlagCombination(value) : this.cache.isDefined(value);
  }

  /**
   * Return `value` if it passes `isValid`, otherwise throw.
   * @throws InvalidValueError
   */
  validate(value: W): W {
    if (!this.isValid(value)) {
      throw new InvalidValueError(this.name, this.operations.formatDecimal(value));
    }
    return value;
  }

  /**
   * Convert any integer to this domain's value type, checking the range of the
   * kind and, when `validate` is set, `isValid`.
   * @throws ValueOutOfRangeError when `value` does not fit the kind.
   * @throws InvalidValueError when validation is requested and fails.
   */
  toValue(value: number | bigint, validate: boolean = false): W {
    const converted = this.operations.fromInteger(value);
    if (converted === undefined) {
      throw new ValueOutOfRangeError(this.name, String(value), this.kind);
    }
    return validate ? this.validate(converted) : converted;
  }

  /**
   * Like `toValue`, returning `undefined` instead of throwing.
   */
  tryToValue(value: number | bigint, validate: boolean = false): W | undefined {
    const converted = this.operations.fromInteger(value);
    if (converted === undefined || (validate && !this.isValid(converted))) return undefined;
    return converted;
  }

  compare(left: W, right: W): number {
    return this.operations.compare(left, right);
  }

  equals(left: W, right: W): boolean {
    return this.operations.equals(left, right);
  }

  // Formatting
  // ==============================

  /**
   * Render `value` with the first selector that yields text. Defaults to
   * `Selector.Name, Selector.Decimal`.
   *
   * @returns `undefined` when no selector produced text.
   * @throws UnknownSelectorError for a selector that is neither built in nor registered.
   */
  format(value: W, ...selectors: FormatSelector[]): string | undefined {
    return this.pipeline.format(value, selectors.length > 0 ? selectors : undefined);
  }

  /**
   * Default text of `value`. Valid flag combinations are rendered with
   * `formatFlags`; anything else by name, falling back to decimal.
   */
  asString(value: W): string {
    if (this.flagAlgebra && this.flagAlgebra.isValidFlagCombination(value)) {
      return this.pipeline.formatFlags(value);
    }
    return this.pipeline.format(value, [Selector.Name, Selector.Decimal]) ?? this.operations.formatDecimal(value);
  }

  /**
   * @throws NotFlagDomainError
   * @throws InvalidFlagCombinationError
   */
  formatFlags(value: W, options?: FlagTextOptions): string {
    return this.pipeline.formatFlags(value, options);
  }

  /**
   * Register a formatter usable only with this domain.
   *
   * @returns A selector id of `DOMAIN_SELECTOR_START` or above.
   */
  registerFormatter(formatter: MemberFormatter<W>): FormatSelector {
    return this.formatters.register(formatter);
  }

  // Parsing
  // ==============================

  /**
   * Flag domains accept delimited flag text here, as `parseFlags` does.
   * @throws ValueOutOfRangeError for numeric text outside the kind's range.
   * @throws ParseFailureError when nothing matches.
   * @throws InvalidFlagCombinationError for flag values outside the flag union.
   */
  parse(text: string, options?: ParseOptions): W {
    return this.pipeline.parse(text, options);
  }

  tryParse(text: string, options?: ParseOptions): W | undefined {
    return this.pipeline.tryParse(text, options);
  }

  /**
   * Parse to a member rather than a value.
   */
  parseMember(text: string, options?: ParseOptions): DomainMember<W> {
    return this.pipeline.parseMember(text, options);
  }

  /**
   * Parse delimited flag text such as `'Read, Write'`.
   * @throws NotFlagDomainError
   */
  parseFlags(text: string, options?: FlagTextOptions): W {
    return this.pipeline.parseFlags(text, options);
  }

  tryParseFlags(text: string, options?: FlagTextOptions): W | undefined {
    return this.pipeline.tryParseFlags(text, options);
  }

  // Flags
  // ==============================

  /**
   * OR of every single-bit member. Throws for non-flag domains.
   */
  get allFlags(): W {
    return this.requireFlags('allFlags').allFlags;
  }

  isValidFlagCombination(value: W): boolean {
    return this.requireFlags('isValidFlagCombination').isValidFlagCombination(value);
  }

  hasAnyFlags(value: W, mask?: W): boolean {
    return this.requireFlags('hasAnyFlags').hasAnyFlags(value, mask);
  }

  hasAllFlags(value: W, mask?: W): boolean {
    return this.requireFlags('hasAllFlags').hasAllFlags(value, mask);
  }

  commonFlags(left: W, right: W): W {
    return this.requireFlags('commonFlags').commonFlags(left, right);
  }

  /**
   * OR together flag values, given as arguments or as one iterable.
   */
  combineFlags(values: Iterable<W>): W;
  combineFlags(...values: W[]): W;
  combineFlags(...args: Array<W | Iterable<W>>): W {
    const flags = this.requireFlags('combineFlags');
    const values: W[] = [];
    for (const arg of args) {
      if (isIterable(arg)) values.push(...arg);
      else values.push(arg);
    }
    return flags.combineFlags(values);
  }

  toggleFlags(value: W, mask?: W): W {
    return this.requireFlags('toggleFlags').toggleFlags(value, mask);
  }

  removeFlags(value: W, mask: W): W {
    return this.requireFlags('removeFlags').removeFlags(value, mask);
  }

  /**
   * Alias of `removeFlags`.
   */
  excludeFlags(value: W, mask: W): W {
    return this.requireFlags('excludeFlags').removeFlags(value, mask);
  }

  /**
   * Single-bit values set in `value`, lowest first. Lazy; each iteration
   * rescans.
   */
  getFlags(value: W): Iterable<W> {
    return this.requireFlags('getFlags').getFlags(value);
  }

  getFlagMembers(value: W): DomainMember<W>[] {
    return this.requireFlags('getFlagMembers').getFlagMembers(value);
  }

  // Introspection
  // ==============================

  /**
   * JSON-friendly summary of the domain. Values are decimal strings.
   */
  describe(): DomainSummary {
    const operations = this.operations;
    const summary: DomainSummary = {
      name: this.name,
      kind: this.kind,
      isFlagDomain: this.isFlagDomain,
      counts: {
        primary: this.cache.count(),
        total: this.cache.count(true),
      },
      members: this.cache.enumerateAll(true).map((member) => ({
        name: member.name,
        value: operations.formatDecimal(member.value),
        isPrimary: member.isPrimary,
        ...(member.text !== undefined ? { text: member.text } : {}),
      })),
    };

    const contiguity = this.cache.contiguity;
    if (contiguity) {
      summary.contiguity = {
        minValue: operations.formatDecimal(contiguity.minValue),
        maxValue: operations.formatDecimal(contiguity.maxValue),
        isContiguous: contiguity.isContiguous,
      };
    }
    if (this.flagAlgebra) {
      summary.flagUnion = operations.formatDecimal(this.flagAlgebra.allFlags);
    }

    return summary;
  }

  toJSON(): DomainSummary {
    return this.describe();
  }

  private requireFlags(operation: string): FlagAlgebra<W> {
    if (!this.flagAlgebra) {
      throw new NotFlagDomainError(this.name, operation);
    }
    return this.flagAlgebra;
  }
}

// Utilities
// ==============================

function isIterable<W extends Numeric>(value: W | Iterable<W>): value is Iterable<W> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function validateDefinition(definition: DomainDefinition<number> | DomainDefinition<bigint>): void {
  const name = typeof definition?.name === 'string' && definition.name.length > 0 ? definition.name : '(unnamed)';
  const problems: string[] = [];

  if (definition == null || typeof definition !== 'object') {
    throw new MalformedDomainError(name, ['definition must be an object']);
  }
  if (typeof definition.name !== 'string' || definition.name.length === 0) {
    problems.push('name must be a non-empty string');
  }
  if (!INTEGER_KINDS.includes(definition.kind)) {
    problems.push(`kind "${String(definition.kind)}" is not one of ${INTEGER_KINDS.join(', ')}`);
  }
  if (definition.members == null) {
    problems.push('members are missing');
  }

  if (problems.length > 0) {
    throw new MalformedDomainError(name, problems);
  }
}
