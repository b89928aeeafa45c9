import type { RawMember } from '../types';

/**
 * Raw members of a TypeScript numeric `enum`, in declaration order.
 *
 * Reverse-mapping keys (`'0' -> 'Name'`) and string-valued members are
 * skipped. Tags may be attached per member name.
 *
 * @example
 * ```ts
 * enum Size { Small = 1, Large = 2 }
 * membersFromEnum(Size, { Large: [description('L')] });
 * // [{ name: 'Small', value: 1 }, { name: 'Large', value: 2, tags: [...] }]
 * ```
 */
export function membersFromEnum(
  enumObject: Readonly<Record<string, string | number>>,
  tags: Readonly<Record<string, readonly unknown[]>> = {},
): RawMember<number>[] {
  const members: RawMember<number>[] = [];
  for (const name of Object.keys(enumObject)) {
    const value = enumObject[name];
    if (typeof value !== 'number') continue;

    const memberTags = Object.prototype.hasOwnProperty.call(tags, name) ? tags[name] : undefined;
    members.push(memberTags ? { name, value, tags: memberTags } : { name, value });
  }
  return members;
}
