import { InvalidFlagCombinationError } from '../errors';
import type { DomainMember, Numeric, NumericOperations } from '../types';
import type { MemberCache } from './member-cache';

/**
 * Bit-level operations over a flag domain's members.
 *
 * Every operand is checked against the flag union (the OR of all single-bit
 * primary values) first; a value with any other bit set is rejected with
 * `InvalidFlagCombinationError`. Only `isValidFlagCombination` and `allFlags`
 * accept arbitrary values.
 */
export class FlagAlgebra<W extends Numeric> {
  constructor(
    private readonly domainName: string,
    private readonly cache: MemberCache<W>,
    private readonly operations: NumericOperations<W>,
  ) {}

  get allFlags(): W {
    return this.cache.flagUnion;
  }

  isValidFlagCombination(value: W): boolean {
    return this.operations.equals(this.operations.and(value, this.cache.flagUnion), value);
  }

  /**
   * Throw unless `value` is a valid flag combination.
   * @param token - Source text of the value, when it came from parsing.
   */
  requireValid(value: W, token?: string): W {
    if (!this.isValidFlagCombination(value)) {
      throw new InvalidFlagCombinationError(
        this.domainName,
        this.operations.formatDecimal(value),
        this.operations.formatDecimal(this.cache.flagUnion),
        token,
      );
    }
    return value;
  }

  /**
   * `value & mask` is non-zero. Without a mask, any bit counts.
   */
  hasAnyFlags(value: W, mask?: W): boolean {
    this.requireValid(value);
    const effectiveMask = mask === undefined ? this.operations.allOnes : this.requireValid(mask);
    return !this.operations.equals(this.operations.and(value, effectiveMask), this.operations.zero);
  }

  /**
   * Every bit of `mask` is set in `value`. Without a mask, every declared flag.
   */
  hasAllFlags(value: W, mask?: W): boolean {
    this.requireValid(value);
    const effectiveMask = mask === undefined ? this.cache.flagUnion : this.requireValid(mask);
    return this.operations.equals(this.operations.and(value, effectiveMask), effectiveMask);
  }

  commonFlags(left: W, right: W): W {
    return this.operations.and(this.requireValid(left), this.requireValid(right));
  }

  combineFlags(values: Iterable<W>): W {
    let combined = this.operations.zero;
    for (const value of values) {
      combined = this.operations.or(combined, this.requireValid(value));
    }
    return combined;
  }

  /**
   * Flip the bits of `mask` (every declared flag when omitted).
   */
  toggleFlags(value: W, mask?: W): W {
    this.requireValid(value);
    const effectiveMask = mask === undefined ? this.cache.flagUnion : this.requireValid(mask);
    return this.operations.xor(value, effectiveMask);
  }

  removeFlags(value: W, mask: W): W {
    this.requireValid(value);
    return this.operations.and(value, this.operations.not(this.requireValid(mask)));
  }

  /**
   * Single-bit values set in `value`, lowest bit first.
   *
   * The result is lazy and restartable: every iteration rescans the bits.
   */
  getFlags(value: W): Iterable<W> {
    const valid = this.requireValid(value);
    const operations = this.operations;

    return {
      *[Symbol.iterator]() {
        const negative = operations.compare(valid, operations.zero) < 0;
        for (
          let bit = operations.one;
          !operations.equals(bit, operations.zero) && (negative || operations.compare(valid, bit) >= 0);
          bit = operations.leftShift(bit, 1)
        ) {
          if (!operations.equals(operations.and(valid, bit), operations.zero)) {
            yield bit;
          }
        }
      },
    };
  }

  getFlagMembers(value: W): DomainMember<W>[] {
    const members: DomainMember<W>[] = [];
    for (const flag of this.getFlags(value)) {
      const member = this.cache.getByValue(flag);
      if (member) members.push(member);
    }
    return members;
  }
}
