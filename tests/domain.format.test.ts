import { describe, it, expect } from 'vitest';
import { createDomain, Selector, UnknownSelectorError } from '../src';
import {
  colorDefinition,
  temperatureDefinition,
  wideFlagsDefinition,
} from './domains.fixture';

describe('ValueDomain - Formatting', () => {
  const color = createDomain(colorDefinition);


  // Default Selectors
  // ==============================

  it('formats defined values by name and others in decimal', () => {
    expect(color.format(1)).toBe('Red');
    expect(color.format(3)).toBe('Blue');
    expect(color.format(9)).toBe('9');
  });


  it('renders values with asString', () => {
    expect(color.asString(2)).toBe('Green');
    expect(color.asString(200)).toBe('200');
  });


  // Built-in Selectors
  // ==============================

  it('takes the first selector that yields text', () => {
    expect(color.format(3, Selector.Tag)).toBe('deep blue');
    expect(color.format(1, Selector.Tag)).toBeUndefined();
    expect(color.format(1, Selector.Tag, Selector.Name)).toBe('Red');
    expect(color.format(9, Selector.Name)).toBeUndefined();
    expect(color.format(9, Selector.Name, Selector.Hex)).toBe('09');
  });


  it('formats decimal and hex regardless of membership', () => {
    expect(color.format(2, Selector.Decimal)).toBe('2');
    expect(color.format(2, Selector.Hex)).toBe('02');
    expect(color.format(255, Selector.Hex)).toBe('FF');
  });


  it('formats negative values as their bit pattern in hex', () => {
    const temperature = createDomain(temperatureDefinition);

    expect(temperature.format(-1, Selector.Hex)).toBe('FF');
    expect(temperature.format(-10, Selector.Hex)).toBe('F6');
    expect(temperature.format(-10)).toBe('Freezing');
  });


  it('formats 64-bit values', () => {
    const wide = createDomain(wideFlagsDefinition);

    expect(wide.format(1n << 63n)).toBe('High');
    expect(wide.format(1n << 63n, Selector.Hex)).toBe('8000000000000000');
    expect(wide.format(1n << 63n, Selector.Decimal)).toBe('9223372036854775808');
    expect(wide.format(6n)).toBe('6');
  });


  // Unknown Selectors
  // ==============================

  it('throws for selectors that are neither built in nor registered', () => {
    expect(() => color.format(1, 999)).toThrow(UnknownSelectorError);
    expect(() => color.format(9, 150)).toThrow(UnknownSelectorError);
    expect(() => color.format(1, 200)).toThrow('Unknown format selector 200');
  });


  it('does not reach selectors after one that produced text', () => {
    expect(color.format(1, Selector.Name, 999)).toBe('Red');
  });


  // Introspection
  // ==============================

  it('summarises the domain', () => {
    expect(color.describe()).toEqual({
      name: 'Color',
      kind: 'uint8',
      isFlagDomain: false,
      counts: { primary: 3, total: 4 },
      contiguity: { minValue: '1', maxValue: '3', isContiguous: true },
      members: [
        { name: 'Red', value: '1', isPrimary: true },
        { name: 'Green', value: '2', isPrimary: true },
        { name: 'Blue', value: '3', isPrimary: true, text: 'deep blue' },
        { name: 'Azure', value: '3', isPrimary: false },
      ],
    });
  });


  it('serialises 64-bit summaries as JSON', () => {
    const wide = createDomain(wideFlagsDefinition);
    const parsed: unknown = JSON.parse(JSON.stringify(wide));

    expect(parsed).toMatchObject({
      name: 'WideFlags',
      kind: 'uint64',
      flagUnion: '9223372041149743105',
    });
  });
});
