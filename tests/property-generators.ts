import * as fc from 'fast-check';
import type { DomainDefinition, RawMember } from '../src';

// Property Test Generators
// ==============================

/**
 * Member names that never read as numbers, so parsing cannot mistake them
 * for decimal text.
 */
const memberNameArb: fc.Arbitrary<string> = fc
  .tuple(
    fc.constantFrom('A', 'B', 'C', 'Delta', 'Echo', 'x'),
    fc.string({ minLength: 0, maxLength: 6 }).filter((suffix) => !/[\s,]/.test(suffix)),
  )
  .map(([head, suffix]) => `${head}${suffix}`);

/**
 * Random member list over int16 values, with repeated values so that some
 * members become aliases.
 */
export const memberListArb: fc.Arbitrary<RawMember<number>[]> = fc.uniqueArray(
  fc.record({
    name: memberNameArb,
    value: fc.integer({ min: -40, max: 40 }),
  }),
  { selector: (member) => member.name, minLength: 0, maxLength: 40 },
);

/**
 * Members with consecutive values, declared in random order.
 */
export const contiguousDomainArb: fc.Arbitrary<{ start: number; size: number; definition: DomainDefinition<number> }> = fc
  .record({
    start: fc.integer({ min: -1000, max: 1000 }),
    size: fc.integer({ min: 1, max: 50 }),
  })
  .chain(({ start, size }) => {
    const members = Array.from({ length: size }, (_, offset) => ({ name: `V${offset}`, value: start + offset }));
    return fc.shuffledSubarray(members, { minLength: size, maxLength: size }).map((shuffled) => ({
      start,
      size,
      definition: {
        name: 'Contiguous',
        kind: 'int16',
        members: shuffled,
      } satisfies DomainDefinition<number>,
    }));
  });

/**
 * A uint32 flag domain over random bit positions, optionally with a zero
 * member, together with a valid combination of its flags.
 */
export const flagDomainWithValueArb: fc.Arbitrary<{ definition: DomainDefinition<number>; value: number }> = fc
  .record({
    bits: fc.uniqueArray(fc.integer({ min: 0, max: 31 }), { minLength: 1, maxLength: 12 }),
    withZero: fc.boolean(),
  })
  .chain(({ bits, withZero }) => {
    const members: RawMember<number>[] = bits.map((bit) => ({ name: `Flag${bit}`, value: 2 ** bit }));
    if (withZero) members.push({ name: 'Nothing', value: 0 });

    return fc.subarray(bits).map((chosen) => ({
      definition: {
        name: 'RandomFlags',
        kind: 'uint32',
        flags: true,
        members,
      } satisfies DomainDefinition<number>,
      value: chosen.reduce((sum, bit) => sum + 2 ** bit, 0),
    }));
  });
