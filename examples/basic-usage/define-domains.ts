import {
  createDomain,
  defineDomain,
  description,
  getDomain,
  membersFromEnum,
  primary,
  Selector,
} from '../../src';

enum Priority {
  Low = 0,
  Normal = 1,
  High = 2,
  Urgent = 3,
}

function main() {
  // Example 1: Domain from a TypeScript enum
  console.log('=== Example 1: Enum Domain ===');
  const priority = createDomain({
    name: 'Priority',
    kind: 'uint8',
    members: membersFromEnum(Priority, {
      Urgent: [description('drop everything')],
    }),
  });

  console.log('Names:', priority.names());
  console.log('Format 3:', priority.format(Priority.Urgent));
  console.log('Format 3 as tag:', priority.format(Priority.Urgent, Selector.Tag));
  console.log('Parse "high" (ignore case):', priority.parse('high', { ignoreCase: true }));
  console.log('Summary:', priority.describe());
  console.log();

  // Example 2: Aliases and the primary marker
  console.log('=== Example 2: Aliases ===');
  const status = createDomain({
    name: 'Status',
    kind: 'int16',
    members: [
      { name: 'Active', value: 1 },
      { name: 'Enabled', value: 1, tags: [primary()] },
      { name: 'Disabled', value: 0 },
    ],
  });

  console.log('Format 1:', status.format(1));
  console.log('Parse "Active":', status.parse('Active'));
  console.log('All names:', status.names(true));
  console.log();

  // Example 3: Registered, lazily built domains
  console.log('=== Example 3: Registry ===');
  const region = defineDomain('region', {
    name: 'Region',
    kind: 'uint8',
    members: () => [
      { name: 'North', value: 1 },
      { name: 'South', value: 2 },
    ],
  });

  console.log('Built before use:', region.isBuilt);
  console.log('Format 2:', region.get().format(2));
  console.log('Same instance:', getDomain('region') === region.get());
}

main();
