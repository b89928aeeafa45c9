import {
  createDomain,
  description,
  registerFormatter,
  Selector,
  type DomainMember,
} from '../../src';

function kebabCase(member: DomainMember): string {
  return member.name.replace(/([a-z])([A-Z])/g, '$1-$2').toLowerCase();
}

function main() {
  const permissions = createDomain({
    name: 'Permissions',
    kind: 'uint16',
    flags: true,
    members: [
      { name: 'None', value: 0 },
      { name: 'Read', value: 1, tags: [description('read files')] },
      { name: 'Write', value: 2, tags: [description('write files')] },
      { name: 'Delete', value: 4 },
      { name: 'ReadWrite', value: 3 },
    ],
  });

  // Example 1: Flag algebra
  console.log('=== Example 1: Flags ===');
  const readDelete = permissions.combineFlags(1, 4);
  console.log('Read | Delete:', readDelete);
  console.log('Flags of 7:', Array.from(permissions.getFlags(7)));
  console.log('Has Write?', permissions.hasAllFlags(readDelete, 2));
  console.log('Without Delete:', permissions.removeFlags(readDelete, 4));
  console.log();

  // Example 2: Flag text
  console.log('=== Example 2: Flag Text ===');
  console.log('Format 3:', permissions.formatFlags(3));
  console.log('Format 5:', permissions.formatFlags(5));
  console.log('Format 5 by tag:', permissions.formatFlags(5, { selectors: [Selector.Tag, Selector.Name] }));
  console.log('Parse "Write | Delete":', permissions.parseFlags('Write | Delete', { delimiter: '|' }));
  console.log('Try parse "Read, Admin":', permissions.tryParseFlags('Read, Admin'));
  console.log();

  // Example 3: Custom formatters
  console.log('=== Example 3: Custom Formatters ===');
  const Kebab = registerFormatter(kebabCase);
  console.log('Format 3 kebab-case:', permissions.format(3, Kebab));
  console.log('Parse "read-write":', permissions.parse('read-write', { selectors: [Kebab] }));

  const Shouting = permissions.registerFormatter((member) => member.name.toUpperCase());
  console.log('Format 4 shouting:', permissions.format(4, Shouting));
}

main();
