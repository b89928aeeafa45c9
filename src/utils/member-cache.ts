import { MalformedDomainError } from '../errors';
import type {
  ContiguitySummary,
  DomainMember,
  Numeric,
  NumericOperations,
  RawMember,
  TagInspector,
} from '../types';
import { OrderedBiDirectionalIndex, ordinalStringComparer } from './ordered-bidirectional-index';

export interface MemberCacheOptions<W extends Numeric> {
  domainName: string;
  operations: NumericOperations<W>;
  isFlagDomain: boolean;
  tagInspector: TagInspector;
}

// Implementation
// ==============================

/**
 * Name/value metadata of one domain.
 *
 * Primary members (one per distinct value, value-ascending) live in an
 * ordered bidirectional index; later names for an existing value are kept as
 * aliases, sorted by value. Built once, then read-only apart from the lazily
 * built case-insensitive name index.
 */
export class MemberCache<W extends Numeric> {
  readonly flagUnion: W;
  readonly contiguity: ContiguitySummary<W> | undefined;

  private readonly operations: NumericOperations<W>;
  private readonly primaryIndex: OrderedBiDirectionalIndex<W, string>;
  private readonly primaries: DomainMember<W>[];
  private readonly aliases: Map<string, DomainMember<W>>;
  private ignoreCaseNames: Map<string, DomainMember<W>> | undefined;

  private constructor(
    operations: NumericOperations<W>,
    primaryIndex: OrderedBiDirectionalIndex<W, string>,
    primaries: DomainMember<W>[],
    aliases: DomainMember<W>[],
    flagUnion: W,
  ) {
    this.operations = operations;
    this.primaryIndex = primaryIndex;
    this.primaries = primaries;
    this.flagUnion = flagUnion;

    // Stable, so aliases sharing a value keep declaration order
    aliases.sort((left, right) => operations.compare(left.value, right.value));
    this.aliases = new Map(aliases.map((member) => [member.name, member]));

    if (primaries.length > 0) {
      const minValue = primaries[0].value;
      const maxValue = primaries[primaries.length - 1].value;
      const span = operations.toBigInt(maxValue) - operations.toBigInt(minValue) + 1n;
      this.contiguity = {
        minValue,
        maxValue,
        isContiguous: span === BigInt(primaries.length),
      };
    }
  }

  /**
   * Build a cache from the host's raw members.
   *
   * Duplicate policy:
   * - first name seen for a value is primary, later names become aliases;
   * - a member carrying the primary marker swaps places with the current
   *   primary for its value.
   *
   * Primary insertion scans backward from the tail, assuming near-sorted
   * input; unsorted input makes construction O(n²).
   */
  static create<W extends Numeric>(
    rawMembers: readonly RawMember<W>[],
    options: MemberCacheOptions<W>,
  ): MemberCache<W> {
    const { domainName, operations, isFlagDomain, tagInspector } = options;
    validateRawMembers(rawMembers, domainName, operations);

    const primaryIndex = new OrderedBiDirectionalIndex<W, string>(
      { hash: (value) => operations.hash(value), equals: (left, right) => operations.equals(left, right) },
      ordinalStringComparer,
      rawMembers.length,
    );
    const primaries: DomainMember<W>[] = [];
    const aliases: DomainMember<W>[] = [];
    const markedPrimary = new Set<string>();
    let flagUnion = operations.zero;

    for (const raw of rawMembers) {
      const tags = raw.tags ?? [];
      const isMarked = tagInspector.isPrimaryMarker(tags);
      const member = createMember(raw.name, raw.value, tags, tagInspector);
      const existingIndex = primaryIndex.lookupByFirst(member.value);

      if (existingIndex < 0) {
        let position = primaryIndex.count;
        while (position > 0 && operations.compare(primaryIndex.getAt(position - 1).first, member.value) > 0) {
          position--;
        }
        primaryIndex.insert(position, member.value, member.name);
        primaries.splice(position, 0, member);
        if (operations.isPowerOfTwoOrZero(member.value)) {
          flagUnion = operations.or(flagUnion, member.value);
        }
        if (isMarked) markedPrimary.add(member.name);
        continue;
      }

      const existing = primaries[existingIndex];
      if (!isMarked) {
        aliases.push(demote(member));
        continue;
      }

      if (markedPrimary.has(existing.name)) {
        // eslint-disable-next-line no-console
        console.warn(
          `Domain '${domainName}': '${raw.name}' and '${existing.name}' are both marked primary ` +
          `for value ${operations.formatDecimal(member.value)}; '${raw.name}' wins.`,
        );
      }
      primaryIndex.setSecondAt(existingIndex, member.name);
      primaries[existingIndex] = member;
      aliases.push(demote(existing));
      markedPrimary.add(member.name);
    }

    if (isFlagDomain) {
      warnOnStrayFlagBits(primaries, flagUnion, domainName, operations);
    }

    return new MemberCache(operations, primaryIndex, primaries, aliases, flagUnion);
  }

  /**
   * Number of members, counting aliases only when asked.
   */
  count(includeAliases: boolean = false): number {
    return this.primaries.length + (includeAliases ? this.aliases.size : 0);
  }

  getByValue(value: W): DomainMember<W> | undefined {
    const index = this.primaryIndex.lookupByFirst(value);
    return index < 0 ? undefined : this.primaries[index];
  }

  /**
   * Look a member up by name: primary names, then aliases, then (when
   * `ignoreCase` is set) a case-folded index of both. An exact match always
   * wins; among names that differ only by case, the first in value order
   * (primary before its aliases) answers a case-insensitive lookup.
   */
  getByName(name: string, ignoreCase: boolean = false): DomainMember<W> | undefined {
    const index = this.primaryIndex.lookupBySecond(name);
    if (index >= 0) return this.primaries[index];

    const alias = this.aliases.get(name);
    if (alias) return alias;

    if (!ignoreCase) return undefined;
    return this.getIgnoreCaseNames().get(foldCase(name));
  }

  /**
   * Whether `value` is a primary value. Contiguous domains answer from the
   * bounds alone.
   */
  isDefined(value: W): boolean {
    const contiguity = this.contiguity;
    if (!contiguity) return false;
    if (contiguity.isContiguous) {
      return (
        this.operations.compare(value, contiguity.minValue) >= 0 &&
        this.operations.compare(value, contiguity.maxValue) <= 0
      );
    }
    return this.primaryIndex.lookupByFirst(value) >= 0;
  }

  /**
   * Members in ascending value order. With aliases, each primary precedes the
   * aliases of its value.
   */
  enumerateAll(includeAliases: boolean = false): DomainMember<W>[] {
    if (!includeAliases || this.aliases.size === 0) return this.primaries.slice();

    const operations = this.operations;
    const primaries = this.primaries;
    const aliases = Array.from(this.aliases.values());
    const result: DomainMember<W>[] = [];
    let pointerP = 0;
    let pointerA = 0;

    while (pointerP < primaries.length || pointerA < aliases.length) {
      const takeAlias =
        pointerA < aliases.length &&
        (pointerP >= primaries.length ||
          operations.compare(aliases[pointerA].value, primaries[pointerP].value) < 0);

      if (takeAlias) {
        result.push(aliases[pointerA]);
        pointerA++;
      }
      else {
        result.push(primaries[pointerP]);
        pointerP++;
      }
    }

    return result;
  }

  private getIgnoreCaseNames(): Map<string, DomainMember<W>> {
    let names = this.ignoreCaseNames;
    if (!names) {
      names = new Map();
      for (const member of this.enumerateAll(true)) {
        const key = foldCase(member.name);
        if (!names.has(key)) names.set(key, member);
      }
      this.ignoreCaseNames = names;
    }
    return names;
  }
}

// Utilities
// ==============================

/**
 * Case folding shared by every case-insensitive lookup.
 * @internal
 */
export function foldCase(text: string): string {
  return text.toUpperCase();
}

function createMember<W extends Numeric>(
  name: string,
  value: W,
  rawTags: readonly unknown[],
  tagInspector: TagInspector,
): DomainMember<W> {
  const preferred = tagInspector.preferredText(rawTags);
  let tags = rawTags;
  if (preferred && preferred.index > 0) {
    tags = [rawTags[preferred.index], ...rawTags.filter((_tag, index) => index !== preferred.index)];
  }
  return Object.freeze({
    name,
    value,
    tags: Object.freeze(tags.slice()),
    text: preferred?.text,
    isPrimary: true,
  });
}

function demote<W extends Numeric>(member: DomainMember<W>): DomainMember<W> {
  return Object.freeze({ ...member, isPrimary: false });
}

/**
 * Reject host input the cache cannot represent. Collects every problem
 * before throwing.
 * @internal
 */
function validateRawMembers<W extends Numeric>(
  rawMembers: readonly RawMember<W>[],
  domainName: string,
  operations: NumericOperations<W>,
): void {
  const problems: string[] = [];
  const seenNames = new Set<string>();

  if (!Array.isArray(rawMembers)) {
    throw new MalformedDomainError(domainName, ['members must be an array']);
  }

  rawMembers.forEach((raw, position) => {
    if (raw == null || typeof raw !== 'object') {
      problems.push(`member #${position} is not an object`);
      return;
    }
    if (typeof raw.name !== 'string' || raw.name.length === 0) {
      problems.push(`member #${position} is missing a name`);
    }
    else if (seenNames.has(raw.name)) {
      problems.push(`member name "${raw.name}" is declared more than once`);
    }
    else {
      seenNames.add(raw.name);
    }

    const converted = isNumericValue(raw.value) ? operations.fromInteger(raw.value) : undefined;
    if (converted === undefined || !operations.equals(converted, raw.value)) {
      problems.push(
        `member "${String(raw.name)}" has value ${String(raw.value)}, which is not a valid ${operations.kind}`,
      );
    }

    if (raw.tags !== undefined && !Array.isArray(raw.tags)) {
      problems.push(`member "${String(raw.name)}" has tags that are not an array`);
    }
  });

  if (problems.length > 0) {
    throw new MalformedDomainError(domainName, problems);
  }
}

function isNumericValue(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

function warnOnStrayFlagBits<W extends Numeric>(
  primaries: DomainMember<W>[],
  flagUnion: W,
  domainName: string,
  operations: NumericOperations<W>,
): void {
  const stray = primaries.filter(
    (member) => !operations.equals(operations.and(member.value, flagUnion), member.value),
  );
  if (stray.length === 0) return;

  // eslint-disable-next-line no-console
  console.warn(
    `Flag domain '${domainName}': ${stray.map((member) => member.name).join(', ')} ` +
    `set bits outside the single-bit members (${operations.formatDecimal(flagUnion)}) ` +
    'and will be rejected by flag operations.',
  );
}
