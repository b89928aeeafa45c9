import { describe, it, expect } from 'vitest';
import {
  createDomain,
  description,
  InvalidFlagCombinationError,
  ParseFailureError,
  Selector,
  UnknownSelectorError,
  ValueOutOfRangeError,
} from '../src';
import {
  accessDefinition,
  colorDefinition,
  temperatureDefinition,
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

describe('ValueDomain - Parsing', () => {
  const color = createDomain(colorDefinition);
  const access = createDomain(accessDefinition);


  // Names and Numbers
  // ==============================

  it('parses names, aliases and decimal text', () => {
    expect(color.parse('Green')).toBe(2);
    expect(color.parse('Azure')).toBe(3);
    expect(color.parse('2')).toBe(2);
    expect(color.parse('+7')).toBe(7);
  });


  it('trims surrounding whitespace', () => {
    expect(color.parse('  Green\t')).toBe(2);
    expect(color.parse(' 42 ')).toBe(42);
  });


  it('matches names exactly unless asked to ignore case', () => {
    expect(() => color.parse('green')).toThrow(ParseFailureError);
    expect(color.parse('green', { ignoreCase: true })).toBe(2);
    expect(color.parse('AZURE', { ignoreCase: true })).toBe(3);
  });


  it('parses negative decimal text for signed kinds', () => {
    const temperature = createDomain(temperatureDefinition);

    expect(temperature.parse('-10')).toBe(-10);
    expect(temperature.parse('Cold')).toBe(-1);
    expect(temperature.parse('FF', { selectors: [Selector.Hex] })).toBe(-1);
  });


  it('parses 64-bit text', () => {
    const wide = createDomain(wideFlagsDefinition);

    expect(wide.parse('High')).toBe(1n << 63n);
    expect(wide.parse('9223372041149743105')).toBe((1n << 63n) | (1n << 32n) | 1n);
    expect(() => wide.parse('18446744073709551615')).toThrow(InvalidFlagCombinationError);
    expect(() => wide.parse('18446744073709551616')).toThrow(ValueOutOfRangeError);
  });


  // Selectors
  // ==============================

  it('parses hex text when the hex selector is requested', () => {
    expect(color.parse('0A', { selectors: [Selector.Hex] })).toBe(10);
    expect(color.parse('ff', { selectors: [Selector.Hex] })).toBe(255);
    expect(() => color.parse('0A')).toThrow(ParseFailureError);
  });


  it('reads plain digits as hex when hex is requested without decimal', () => {
    expect(color.format(16, Selector.Hex)).toBe('10');
    expect(color.parse(color.format(16, Selector.Hex) ?? '', { selectors: [Selector.Hex] })).toBe(16);
    expect(color.parse('10', { selectors: [Selector.Hex, Selector.Decimal] })).toBe(10);
    expect(color.parse('10', { selectors: [Selector.Decimal, Selector.Hex] })).toBe(10);
    expect(() => color.parse('300', { selectors: [Selector.Hex] })).toThrow(ParseFailureError);
  });


  it('matches case-folded tag text against the lowest value first', () => {
    const speed = createDomain({
      name: 'Speed',
      kind: 'uint8',
      members: [
        { name: 'Quick', value: 2, tags: [description('FAST')] },
        { name: 'Brisk', value: 1, tags: [description('fast')] },
      ],
    });

    expect(speed.parse('FAST', { selectors: [Selector.Tag] })).toBe(2);
    expect(speed.parse('Fast', { selectors: [Selector.Tag], ignoreCase: true })).toBe(1);
  });


  it('parses tag text through a reverse lookup', () => {
    expect(color.parse('deep blue', { selectors: [Selector.Tag] })).toBe(3);
    expect(color.parse('DEEP BLUE', { selectors: [Selector.Tag], ignoreCase: true })).toBe(3);
    expect(() => color.parse('DEEP BLUE', { selectors: [Selector.Tag] })).toThrow(ParseFailureError);
    expect(() => color.parse('deep blue')).toThrow(ParseFailureError);
  });


  it('throws for an unknown selector', () => {
    expect(() => color.parse('Red', { selectors: [Selector.Tag, 999] })).toThrow(UnknownSelectorError);
  });


  // Failures
  // ==============================

  it('tells out-of-range numbers apart from unmatched text', () => {
    expect(() => color.parse('300')).toThrow(ValueOutOfRangeError);
    expect(() => color.parse('-1')).toThrow(ValueOutOfRangeError);
    expect(thrownBy(() => color.parse(' 300 '))).toMatchObject({ domainName: 'Color', text: '300', kind: 'uint8' });
    expect(thrownBy(() => color.parse('Purple'))).toMatchObject({
      name: 'ParseFailureError',
      domainName: 'Color',
      text: 'Purple',
    });
  });


  it('returns undefined from tryParse instead of throwing', () => {
    expect(color.tryParse(' Red ')).toBe(1);
    expect(color.tryParse('Purple')).toBeUndefined();
    expect(color.tryParse('300')).toBeUndefined();
    expect(color.tryParse('')).toBeUndefined();
  });


  // Members
  // ==============================

  it('parses to members', () => {
    expect(color.parseMember('Azure')).toMatchObject({ name: 'Azure', value: 3, isPrimary: false });
    expect(color.parseMember('3')).toMatchObject({ name: 'Blue', value: 3, isPrimary: true });
    expect(() => color.parseMember('9')).toThrow(ParseFailureError);
  });


  // Flags
  // ==============================

  it('parses delimited flag names', () => {
    expect(access.parseFlags('Read, Write')).toBe(3);
    expect(access.parseFlags('Read,Write')).toBe(3);
    expect(access.parseFlags('ReadWrite, Execute')).toBe(7);
    expect(access.parseFlags('read, EXECUTE', { ignoreCase: true })).toBe(5);
  });


  it('parses raw bitmasks and empty text', () => {
    expect(access.parseFlags('5')).toBe(5);
    expect(access.parseFlags('')).toBe(0);
    expect(access.parseFlags('   ')).toBe(0);
  });


  it('honours a custom delimiter', () => {
    expect(access.parseFlags('Read|Execute', { delimiter: '|' })).toBe(5);
    expect(access.parseFlags('Read | Execute', { delimiter: ' | ' })).toBe(5);
    expect(access.parseFlags('Read Write', { delimiter: ' ' })).toBe(3);
  });


  it('names the offending token when a flag fails to parse', () => {
    expect(thrownBy(() => access.parseFlags('Read, Bogus'))).toMatchObject({
      name: 'ParseFailureError',
      text: 'Read, Bogus',
      token: 'Bogus',
    });
    expect(thrownBy(() => access.parseFlags('Read, 300'))).toMatchObject({
      name: 'ValueOutOfRangeError',
      token: '300',
    });
    expect(thrownBy(() => access.parseFlags('Read, 8'))).toMatchObject({
      name: 'InvalidFlagCombinationError',
      value: '8',
      token: '8',
    });
    expect(thrownBy(() => access.parseFlags('Read, , Write'))).toMatchObject({
      name: 'ParseFailureError',
      token: '',
    });
  });


  it('parses the default text of a flag domain back to its value', () => {
    expect(access.asString(5)).toBe('Read, Execute');
    expect(access.parse(access.asString(5))).toBe(5);
    expect(access.tryParse(access.asString(5))).toBe(5);
    expect(access.parse('ReadWrite')).toBe(3);
    expect(access.parse('Write,Execute')).toBe(6);
    expect(access.parse('None')).toBe(0);
  });


  it('rejects blank text and foreign bits in parse on a flag domain', () => {
    expect(() => access.parse('')).toThrow(ParseFailureError);
    expect(access.tryParse('  ')).toBeUndefined();
    expect(() => access.parse('8')).toThrow(InvalidFlagCombinationError);
    expect(access.tryParse('8')).toBeUndefined();
    expect(thrownBy(() => access.parse('Read, Bogus'))).toMatchObject({
      name: 'ParseFailureError',
      token: 'Bogus',
    });
  });


  it('returns undefined from tryParseFlags instead of throwing', () => {
    expect(access.tryParseFlags('Write, Execute')).toBe(6);
    expect(access.tryParseFlags('Read, Bogus')).toBeUndefined();
    expect(access.tryParseFlags('Read, 8')).toBeUndefined();
    expect(() => access.parseFlags('8')).toThrow(InvalidFlagCombinationError);
  });


  it('parses 64-bit flag text', () => {
    const wide = createDomain(wideFlagsDefinition);

    expect(wide.parseFlags('High, Low')).toBe((1n << 63n) + 1n);
    expect(wide.formatFlags((1n << 63n) + (1n << 32n))).toBe('Middle, High');
  });
});
