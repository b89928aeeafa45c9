export { createDomain, ValueDomain } from './domain';
export {
  DomainRegistry,
  defaultRegistry,
  defineDomain,
  getDomain,
  type AnyValueDomain,
  type DomainRef,
} from './registry';

// Types
// ==============================
export type {
  BigIntKind,
  ContiguitySummary,
  DomainDefinition,
  DomainMember,
  DomainSummary,
  FlagTextOptions,
  FormatSelector,
  IntegerKind,
  KindOf,
  MemberFormatter,
  NumberKind,
  Numeric,
  NumericOperations,
  ParseOptions,
  RawMember,
  TagInspector,
} from './types';

// Formatting
// ==============================
export {
  DEFAULT_SELECTORS,
  DOMAIN_SELECTOR_START,
  GLOBAL_SELECTOR_START,
  isBuiltInSelector,
  registerFormatter,
  Selector,
} from './formatters';

// Tags
// ==============================
export {
  defaultTagInspector,
  description,
  DescriptionTag,
  primary,
  PrimaryTag,
} from './tags';

// Errors
// ==============================
export {
  DomainAlreadyDefinedError,
  IndexOutOfRangeError,
  InvalidFlagCombinationError,
  InvalidValueError,
  MalformedDomainError,
  NotFlagDomainError,
  ParseFailureError,
  RunaError,
  UnknownSelectorError,
  ValueOutOfRangeError,
} from './errors';

// Building Blocks
// ==============================
export {
  OrderedBiDirectionalIndex,
  ordinalStringComparer,
  type IndexPair,
  type KeyComparer,
} from './utils/ordered-bidirectional-index';
export { membersFromEnum } from './utils/enum-members';
export { numericOperationsFor } from './utils/numeric-operations';
