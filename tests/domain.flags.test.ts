import { describe, it, expect } from 'vitest';
import {
  createDomain,
  InvalidFlagCombinationError,
  NotFlagDomainError,
  Selector,
} from '../src';
import {
  accessDefinition,
  colorDefinition,
  weekdayDefinition,
  wideFlagsDefinition,
} from './domains.fixture';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  }
  catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('ValueDomain - Flags', () => {
  const access = createDomain(accessDefinition);


  // Flag Union
  // ==============================

  it('computes the union of single-bit members', () => {
    expect(access.allFlags).toBe(7);
    expect(access.describe().flagUnion).toBe('7');
  });


  it('accepts only combinations of declared flags', () => {
    expect(access.isValidFlagCombination(0)).toBe(true);
    expect(access.isValidFlagCombination(5)).toBe(true);
    expect(access.isValidFlagCombination(8)).toBe(false);
    expect(access.isValid(6)).toBe(true);
    expect(access.isValid(9)).toBe(false);
  });


  // Decomposition
  // ==============================

  it('decomposes a value into its single bits, lowest first', () => {
    expect(Array.from(access.getFlags(3))).toEqual([1, 2]);
    expect(Array.from(access.getFlags(7))).toEqual([1, 2, 4]);
    expect(Array.from(access.getFlags(0))).toEqual([]);
  });


  it('yields the same flags on every iteration', () => {
    const flags = access.getFlags(5);

    expect(Array.from(flags)).toEqual([1, 4]);
    expect(Array.from(flags)).toEqual([1, 4]);
  });


  it('returns the members of the set flags', () => {
    expect(access.getFlagMembers(6).map((member) => member.name)).toEqual(['Write', 'Execute']);
  });


  it('decomposes 64-bit values up to the top bit', () => {
    const wide = createDomain(wideFlagsDefinition);
    const all = 1n + (1n << 32n) + (1n << 63n);

    expect(wide.allFlags).toBe(all);
    expect(Array.from(wide.getFlags(all))).toEqual([1n, 1n << 32n, 1n << 63n]);
  });


  it('decomposes signed values that use the sign bit', () => {
    const signed = createDomain({
      name: 'Signed',
      kind: 'int8',
      flags: true,
      members: [
        { name: 'Low', value: 1 },
        { name: 'Sign', value: -128 },
      ],
    });

    expect(signed.allFlags).toBe(-127);
    expect(Array.from(signed.getFlags(-127))).toEqual([1, -128]);
    expect(signed.formatFlags(-127)).toBe('Low, Sign');
  });


  // Queries and Combination
  // ==============================

  it('tests for any flag', () => {
    expect(access.hasAnyFlags(0)).toBe(false);
    expect(access.hasAnyFlags(4)).toBe(true);
    expect(access.hasAnyFlags(5, 2)).toBe(false);
    expect(access.hasAnyFlags(5, 6)).toBe(true);
  });


  it('tests for all flags', () => {
    expect(access.hasAllFlags(7)).toBe(true);
    expect(access.hasAllFlags(3)).toBe(false);
    expect(access.hasAllFlags(3, 2)).toBe(true);
    expect(access.hasAllFlags(1, 3)).toBe(false);
  });


  it('combines, intersects, toggles and removes flags', () => {
    expect(access.commonFlags(3, 6)).toBe(2);
    expect(access.combineFlags(1, 4)).toBe(5);
    expect(access.combineFlags([1, 2, 4])).toBe(7);
    expect(access.combineFlags(new Set([2, 4]))).toBe(6);
    expect(access.combineFlags()).toBe(0);
    expect(access.toggleFlags(5)).toBe(2);
    expect(access.toggleFlags(5, 1)).toBe(4);
    expect(access.removeFlags(7, 3)).toBe(4);
    expect(access.excludeFlags(5, 4)).toBe(1);
  });


  it('rejects operands with undeclared bits', () => {
    expect(() => access.hasAnyFlags(8)).toThrow(InvalidFlagCombinationError);
    expect(() => access.commonFlags(1, 9)).toThrow(InvalidFlagCombinationError);
    expect(() => access.removeFlags(1, 8)).toThrow(InvalidFlagCombinationError);
    expect(() => access.getFlags(16)).toThrow(InvalidFlagCombinationError);
    expect(thrownBy(() => access.combineFlags(1, 8))).toMatchObject({
      name: 'InvalidFlagCombinationError',
      domainName: 'Access',
      value: '8',
      allFlags: '7',
    });
  });


  it('refuses flag operations on a domain that is not a flag domain', () => {
    const color = createDomain(colorDefinition);

    expect(() => color.allFlags).toThrow(NotFlagDomainError);
    expect(() => color.getFlags(1)).toThrow(NotFlagDomainError);
    expect(() => color.formatFlags(1)).toThrow(NotFlagDomainError);
    expect(() => color.parseFlags('Red')).toThrow(NotFlagDomainError);
    expect(thrownBy(() => color.combineFlags(1, 2))).toMatchObject({
      domainName: 'Color',
      operation: 'combineFlags',
    });
  });


  // Flag Text
  // ==============================

  it('formats a named combination directly', () => {
    expect(access.formatFlags(3)).toBe('ReadWrite');
    expect(access.formatFlags(3, { delimiter: ',', selectors: [Selector.Name] })).toBe('ReadWrite');
  });


  it('joins the names of the set flags otherwise', () => {
    expect(access.formatFlags(5)).toBe('Read, Execute');
    expect(access.formatFlags(7)).toBe('Read, Write, Execute');
    expect(access.formatFlags(7, { delimiter: '|' })).toBe('Read|Write|Execute');
  });


  it('falls back to decimal for flags no selector can render', () => {
    expect(access.formatFlags(5, { selectors: [Selector.Tag] })).toBe('read, 4');
    expect(access.formatFlags(3, { selectors: [Selector.Tag] })).toBe('read, write');
  });


  it('formats zero as the zero member or the literal 0', () => {
    const weekday = createDomain(weekdayDefinition);

    expect(access.formatFlags(0)).toBe('None');
    expect(weekday.formatFlags(0)).toBe('0');
  });


  it('renders flag domains with formatFlags by default', () => {
    expect(access.asString(6)).toBe('Write, Execute');
    expect(access.asString(9)).toBe('9');
  });


  it('refuses to format an invalid combination', () => {
    expect(() => access.formatFlags(8)).toThrow(InvalidFlagCombinationError);
  });
});
