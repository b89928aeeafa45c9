import { NotFlagDomainError, ParseFailureError, UnknownSelectorError, ValueOutOfRangeError } from '../errors';
import {
  DEFAULT_SELECTORS,
  type FormatterRegistry,
  resolveGlobalFormatter,
  Selector,
} from '../formatters';
import type {
  DomainMember,
  FlagTextOptions,
  FormatSelector,
  MemberFormatter,
  Numeric,
  NumericOperations,
  ParseOptions,
} from '../types';
import type { FlagAlgebra } from './flag-algebra';
import { foldCase, type MemberCache } from './member-cache';
import { isNumericText } from './numeric-operations';

export const DEFAULT_DELIMITER = ', ';

/**
 * Reverse index from one selector's rendered text to members. The
 * case-insensitive variant is built on first use; when several texts fold to
 * the same key, the first in value order wins.
 * @internal
 */
class ReverseLookup<W extends Numeric> {
  private folded: Map<string, DomainMember<W>> | undefined;

  constructor(private readonly exact: Map<string, DomainMember<W>>) {}

  find(text: string, ignoreCase: boolean): DomainMember<W> | undefined {
    const member = this.exact.get(text);
    if (member || !ignoreCase) return member;

    let folded = this.folded;
    if (!folded) {
      folded = new Map();
      for (const [key, candidate] of this.exact) {
        const foldedKey = foldCase(key);
        if (!folded.has(foldedKey)) folded.set(foldedKey, candidate);
      }
      this.folded = folded;
    }
    return folded.get(foldCase(text));
  }
}

type ParseOutcome<W extends Numeric> =
  | { ok: true; value: W; member: DomainMember<W> | undefined }
  | { ok: false; outOfRange: boolean };

/**
 * Text encoding and decoding for one domain.
 *
 * Selectors are tried left to right and the first non-null result wins.
 * Reverse lookups for `Tag` and custom selectors are built the first time a
 * selector is used for parsing, then kept for the life of the domain.
 */
export class TextPipeline<W extends Numeric> {
  private readonly reverseLookups = new Map<FormatSelector, ReverseLookup<W>>();

  constructor(
    private readonly domainName: string,
    private readonly cache: MemberCache<W>,
    private readonly operations: NumericOperations<W>,
    private readonly flags: FlagAlgebra<W> | undefined,
    private readonly formatters: FormatterRegistry<W>,
  ) {}

  // Formatting
  // ==============================

  /**
   * Render `value` with the first selector that yields text.
   * Member lookup happens at most once, and only if a selector needs it.
   */
  format(
    value: W,
    selectors: readonly FormatSelector[] = DEFAULT_SELECTORS,
    knownMember?: DomainMember<W>,
  ): string | undefined {
    let member = knownMember;
    let looked = knownMember !== undefined;

    for (const selector of selectors) {
      if (selector === Selector.Decimal) return this.operations.formatDecimal(value);
      if (selector === Selector.Hex) return this.operations.formatHex(value);

      if (!looked) {
        member = this.cache.getByValue(value);
        looked = true;
      }
      const text = member ? this.renderMember(member, selector) : this.checkSelector(selector);
      if (text != null) return text;
    }

    return undefined;
  }

  /**
   * Join the texts of `value`'s flags with the delimiter. A value that is
   * itself a member renders directly, so named combinations win over their
   * parts.
   */
  formatFlags(value: W, options: FlagTextOptions = {}): string {
    const flags = this.requireFlags('formatFlags');
    flags.requireValid(value);
    const selectors = nonEmpty(options.selectors) ?? DEFAULT_SELECTORS;
    const delimiter = options.delimiter || DEFAULT_DELIMITER;

    const member = this.cache.getByValue(value);
    if (member) {
      const direct = this.format(value, selectors, member);
      if (direct !== undefined) return direct;
    }

    const parts: string[] = [];
    for (const flag of flags.getFlags(value)) {
      parts.push(this.format(flag, selectors) ?? this.operations.formatDecimal(flag));
    }
    if (parts.length > 0) return parts.join(delimiter);

    const zero = this.operations.zero;
    const zeroMember = this.cache.getByValue(zero);
    return (zeroMember && this.format(zero, selectors, zeroMember)) ?? '0';
  }

  // Parsing
  // ==============================

  /**
   * Parse one value. Flag domains read delimited flag text with the default
   * delimiter, so `formatFlags` output parses back. Blank text never parses.
   */
  parse(text: string, options: ParseOptions = {}): W {
    if (this.flags && text.trim() !== '') return this.parseFlags(text, options);
    return this.parseMemberOrValue(text, options).value;
  }

  tryParse(text: string, options: ParseOptions = {}): W | undefined {
    if (this.flags) {
      return text.trim() === '' ? undefined : this.tryParseFlags(text, options);
    }
    const outcome = this.tryParseToken(text.trim(), options);
    return outcome.ok ? outcome.value : undefined;
  }

  /**
   * Parse to a member. Numeric text resolves only if its value is defined.
   */
  parseMember(text: string, options: ParseOptions = {}): DomainMember<W> {
    const parsed = this.parseMemberOrValue(text, options);
    const member = parsed.member ?? this.cache.getByValue(parsed.value);
    if (!member) {
      throw new ParseFailureError(this.domainName, text);
    }
    return member;
  }

  parseFlags(text: string, options: FlagTextOptions = {}): W {
    const flags = this.requireFlags('parseFlags');
    let result = this.operations.zero;

    for (const token of splitFlagTokens(text, options.delimiter)) {
      const outcome = this.tryParseToken(token, options);
      if (!outcome.ok) {
        if (outcome.outOfRange) {
          throw new ValueOutOfRangeError(this.domainName, text, this.operations.kind, token);
        }
        throw new ParseFailureError(this.domainName, text, token);
      }
      result = this.operations.or(result, flags.requireValid(outcome.value, token));
    }

    return result;
  }

  tryParseFlags(text: string, options: FlagTextOptions = {}): W | undefined {
    const flags = this.requireFlags('tryParseFlags');
    let result = this.operations.zero;

    for (const token of splitFlagTokens(text, options.delimiter)) {
      const outcome = this.tryParseToken(token, options);
      if (!outcome.ok || !flags.isValidFlagCombination(outcome.value)) return undefined;
      result = this.operations.or(result, outcome.value);
    }

    return result;
  }

  private parseMemberOrValue(text: string, options: ParseOptions): { value: W; member: DomainMember<W> | undefined } {
    const trimmed = text.trim();
    const outcome = this.tryParseToken(trimmed, options);
    if (outcome.ok) return outcome;
    if (outcome.outOfRange) {
      throw new ValueOutOfRangeError(this.domainName, trimmed, this.operations.kind);
    }
    throw new ParseFailureError(this.domainName, trimmed);
  }

  /**
   * Resolve one already-trimmed token. Plain decimal text is tried before any
   * selector, which also accepts raw bitmasks for flag domains. Selectors that
   * ask for `Hex` without `Decimal` skip that step, so digit-only hex such as
   * `'10'` reads as 16.
   */
  private tryParseToken(token: string, options: ParseOptions): ParseOutcome<W> {
    const ignoreCase = options.ignoreCase ?? false;
    const selectors = nonEmpty(options.selectors) ?? DEFAULT_SELECTORS;
    const readsDecimal = selectors.includes(Selector.Decimal) || !selectors.includes(Selector.Hex);

    if (readsDecimal) {
      const numeric = this.operations.parseDecimal(token);
      if (numeric !== undefined) return { ok: true, value: numeric, member: undefined };
    }

    for (const selector of selectors) {
      if (selector === Selector.Decimal) continue;

      if (selector === Selector.Hex) {
        const hex = this.operations.parseHex(token);
        if (hex !== undefined) return { ok: true, value: hex, member: undefined };
        continue;
      }

      const member =
        selector === Selector.Name
          ? this.cache.getByName(token, ignoreCase)
          : this.getReverseLookup(selector).find(token, ignoreCase);
      if (member) return { ok: true, value: member.value, member };
    }

    return { ok: false, outOfRange: readsDecimal && isNumericText(token) };
  }

  // Selectors
  // ==============================

  private renderMember(member: DomainMember<W>, selector: FormatSelector): string | undefined {
    if (selector === Selector.Decimal) return this.operations.formatDecimal(member.value);
    if (selector === Selector.Hex) return this.operations.formatHex(member.value);
    if (selector === Selector.Name) return member.name;
    if (selector === Selector.Tag) return member.text;
    return this.resolveFormatter(selector)(member) ?? undefined;
  }

  /**
   * Validate a selector that has no member to render.
   */
  private checkSelector(selector: FormatSelector): undefined {
    if (selector !== Selector.Name && selector !== Selector.Tag) {
      this.resolveFormatter(selector);
    }
    return undefined;
  }

  private resolveFormatter(selector: FormatSelector): MemberFormatter<W> {
    const formatter = this.formatters.owns(selector)
      ? this.formatters.resolve(selector)
      : resolveGlobalFormatter(selector);
    if (!formatter) {
      throw new UnknownSelectorError(selector);
    }
    return formatter;
  }

  private getReverseLookup(selector: FormatSelector): ReverseLookup<W> {
    let lookup = this.reverseLookups.get(selector);
    if (!lookup) {
      const exact = new Map<string, DomainMember<W>>();
      for (const member of this.cache.enumerateAll(true)) {
        const text = this.renderMember(member, selector);
        if (text != null && !exact.has(text)) exact.set(text, member);
      }
      if (selector !== Selector.Tag && this.cache.count() === 0) {
        this.resolveFormatter(selector);
      }
      lookup = new ReverseLookup(exact);
      this.reverseLookups.set(selector, lookup);
    }
    return lookup;
  }

  private requireFlags(operation: string): FlagAlgebra<W> {
    if (!this.flags) {
      throw new NotFlagDomainError(this.domainName, operation);
    }
    return this.flags;
  }
}

// Utilities
// ==============================

function nonEmpty(selectors: readonly FormatSelector[] | undefined): readonly FormatSelector[] | undefined {
  return selectors && selectors.length > 0 ? selectors : undefined;
}

/**
 * Split flag text into trimmed tokens. The delimiter is trimmed too, unless
 * that would leave it empty. Blank input yields no tokens.
 * @internal
 */
export function splitFlagTokens(text: string, delimiter?: string): string[] {
  const requested = delimiter || DEFAULT_DELIMITER;
  const effective = requested.trim() || requested;
  const tokens: string[] = [];

  let start = 0;
  while (start < text.length) {
    let end = text.indexOf(effective, start);
    if (end < 0) end = text.length;
    tokens.push(text.slice(start, end).trim());
    start = end + effective.length;
  }

  if (tokens.length === 1 && tokens[0] === '') return [];
  return tokens;
}
