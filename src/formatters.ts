import type { FormatSelector, MemberFormatter, Numeric } from './types';

/**
 * Built-in selectors.
 *
 * - `Decimal`: base-10 value text
 * - `Hex`: zero-padded upper-case hex of the value's bit pattern
 * - `Name`: member name
 * - `Tag`: text of the member's preferred tag (see `DescriptionTag`)
 */
export const Selector = {
  Decimal: 0,
  Hex: 1,
  Name: 2,
  Tag: 3,
} as const;

export const DEFAULT_SELECTORS: readonly FormatSelector[] = [Selector.Name, Selector.Decimal];

/** First id handed out by the global formatter registry. */
export const GLOBAL_SELECTOR_START = 100;

/** First id handed out by each domain's own formatter registry. */
export const DOMAIN_SELECTOR_START = 200;

export function isBuiltInSelector(selector: FormatSelector): boolean {
  return selector >= Selector.Decimal && selector <= Selector.Tag;
}

/**
 * Append-only list of custom formatters with ids counted up from `start`.
 *
 * Registering claims the next slot and then fills it. Both steps run inside
 * one synchronous call, so a reader never sees a claimed slot that is still
 * empty; `resolve` treats such a slot like an unknown id all the same.
 */
export class FormatterRegistry<W extends Numeric> {
  private lastIndex = -1;
  private readonly slots: Array<MemberFormatter<W> | undefined> = [];

  constructor(
    readonly start: number,
    private readonly capacity: number,
  ) {}

  get size(): number {
    return this.lastIndex + 1;
  }

  register(formatter: MemberFormatter<W>): FormatSelector {
    if (typeof formatter !== 'function') {
      throw new TypeError('formatter must be a function');
    }
    if (this.lastIndex + 1 >= this.capacity) {
      throw new RangeError(`Formatter registry starting at ${this.start} is full`);
    }
    const index = ++this.lastIndex;
    this.slots[index] = formatter;
    return this.start + index;
  }

  owns(selector: FormatSelector): boolean {
    return selector >= this.start && selector < this.start + this.capacity;
  }

  resolve(selector: FormatSelector): MemberFormatter<W> | undefined {
    if (!this.owns(selector)) return undefined;
    return this.slots[selector - this.start];
  }
}

// Process-wide registry
// ==============================

const GLOBAL_CAPACITY = DOMAIN_SELECTOR_START - GLOBAL_SELECTOR_START;

/** Created on first registration, read freely afterwards. */
let globalFormatters: FormatterRegistry<Numeric> | undefined;

/**
 * Register a formatter usable with every domain.
 *
 * @returns The selector id to pass to `format`, `parse` and friends.
 *
 * @example
 * ```ts
 * const Reversed = registerFormatter((member) => [...member.name].reverse().join(''));
 * colors.format(1, Reversed); // 'deR'
 * ```
 */
export function registerFormatter(formatter: MemberFormatter<Numeric>): FormatSelector {
  if (!globalFormatters) {
    globalFormatters = new FormatterRegistry<Numeric>(GLOBAL_SELECTOR_START, GLOBAL_CAPACITY);
  }
  return globalFormatters.register(formatter);
}

/**
 * @internal
 */
export function resolveGlobalFormatter(selector: FormatSelector): MemberFormatter<Numeric> | undefined {
  return globalFormatters?.resolve(selector);
}
