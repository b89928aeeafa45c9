const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Base class of every error raised by this library.
 */
export class RunaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RunaError';
  }
}

/**
 * A value carries bits outside the union of a flag domain's single-bit members.
 */
export class InvalidFlagCombinationError extends RunaError {
  constructor(
    public domainName: string,
    public value: string,
    public allFlags: string,
    public token?: string
  ) {
    const subject = token === undefined ? `Value ${value}` : `Token '${token}' (${value})`;
    const dev = [
      `Invalid flag combination for '${domainName}'.`,
      '',
      `${subject} sets bits outside the declared flags (${allFlags}).`,
      '',
      'Only OR-combinations of the single-bit members are accepted.',
    ];
    super(format(`${subject} is not a valid flag combination of '${domainName}'.`, dev));
    this.name = 'InvalidFlagCombinationError';
  }
}

/**
 * Numeric text that does not fit the domain's integer kind.
 */
export class ValueOutOfRangeError extends RunaError {
  constructor(
    public domainName: string,
    public text: string,
    public kind: string,
    public token?: string
  ) {
    const subject = token === undefined ? `'${text}'` : `Token '${token}'`;
    const dev = [
      `Value out of range for '${domainName}'.`,
      '',
      `${subject} is numeric but outside the range of ${kind}.`,
    ];
    super(format(`${subject} is outside the range of ${kind}.`, dev));
    this.name = 'ValueOutOfRangeError';
  }
}

/**
 * Text that no selector could resolve and that is not numeric.
 */
export class ParseFailureError extends RunaError {
  constructor(
    public domainName: string,
    public text: string,
    public token?: string
  ) {
    const subject = token === undefined ? `'${text}'` : `Token '${token}' of '${text}'`;
    const dev = [
      `Cannot parse a '${domainName}' value.`,
      '',
      `${subject} did not match any member for the requested selectors.`,
      '',
      'To fix this:',
      '  1. Check the spelling, or pass ignoreCase: true',
      '  2. Add the selector the text was produced with to the selector list',
    ];
    super(format(`${subject} is not a member of '${domainName}'.`, dev));
    this.name = 'ParseFailureError';
  }
}

/**
 * A domain definition the cache cannot be built from. This is a host
 * programming error, so it is raised eagerly at build time.
 */
export class MalformedDomainError extends RunaError {
  constructor(
    public domainName: string,
    public problems: string[]
  ) {
    const dev = [
      `Malformed domain definition '${domainName}':`,
      '',
      ...problems.map((problem) => `  - ${problem}`),
    ];
    super(format(`Malformed domain definition '${domainName}': ${problems.join('; ')}`, dev));
    this.name = 'MalformedDomainError';
  }
}

/**
 * A flag operation was requested on a domain that is not a flag domain.
 */
export class NotFlagDomainError extends RunaError {
  constructor(
    public domainName: string,
    public operation: string
  ) {
    const dev = [
      `'${domainName}' is not a flag domain.`,
      '',
      `${operation}() is only available on domains defined with flags: true.`,
    ];
    super(format(`${operation}() requires a flag domain; '${domainName}' is not one.`, dev));
    this.name = 'NotFlagDomainError';
  }
}

/**
 * A selector id that is neither built in nor registered.
 */
export class UnknownSelectorError extends RunaError {
  constructor(public selector: number) {
    const dev = [
      `Unknown format selector ${selector}.`,
      '',
      'Use a built-in Selector or an id returned by registerFormatter().',
    ];
    super(format(`Unknown format selector ${selector}.`, dev));
    this.name = 'UnknownSelectorError';
  }
}

/**
 * A value rejected by `validate()`.
 */
export class InvalidValueError extends RunaError {
  constructor(
    public domainName: string,
    public value: string
  ) {
    const dev = [
      `Invalid '${domainName}' value ${value}.`,
      '',
      'The value is neither a defined member nor, for flag domains, a valid flag combination.',
    ];
    super(format(`Invalid '${domainName}' value ${value}.`, dev));
    this.name = 'InvalidValueError';
  }
}

export class DomainAlreadyDefinedError extends RunaError {
  constructor(public id: string) {
    const dev = [
      `Domain '${id}' is already defined.`,
      '',
      'Domain ids are unique per registry; definitions cannot be replaced.',
    ];
    super(format(`Domain '${id}' is already defined.`, dev));
    this.name = 'DomainAlreadyDefinedError';
  }
}

export class IndexOutOfRangeError extends RunaError {
  constructor(
    public index: number,
    public count: number
  ) {
    super(`Index ${index} is out of range (count ${count}).`);
    this.name = 'IndexOutOfRangeError';
  }
}
