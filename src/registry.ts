import { createDomain, isBigIntDefinition, type ValueDomain } from './domain';
import { DomainAlreadyDefinedError } from './errors';
import type { DomainDefinition, Numeric } from './types';

/**
 * Handle to a registered domain. The domain is built on the first `get()`.
 */
export interface DomainRef<W extends Numeric> {
  readonly id: string;
  readonly isBuilt: boolean;
  get(): ValueDomain<W>;
}

export type AnyValueDomain = ValueDomain<number> | ValueDomain<bigint>;

/**
 * Builds its domain at most once. A build that throws leaves the ref unbuilt,
 * so the next `get()` raises the same error again.
 * @internal
 */
class LazyDomainRef<W extends Numeric> implements DomainRef<W> {
  private domain: ValueDomain<W> | undefined;

  constructor(
    readonly id: string,
    private readonly build: () => ValueDomain<W>,
  ) {}

  get isBuilt(): boolean {
    return this.domain !== undefined;
  }

  get(): ValueDomain<W> {
    if (!this.domain) {
      this.domain = this.build();
    }
    return this.domain;
  }
}

/**
 * Keyed store of lazily built domains.
 *
 * The registry owns every domain it builds; hosts keep the id (or the ref
 * returned by `define`), never a pointer from the domain back to its host.
 *
 * @example
 * ```ts
 * const registry = new DomainRegistry();
 * const status = registry.define('status', {
 *   name: 'Status',
 *   kind: 'uint8',
 *   members: [
 *     { name: 'Open', value: 0 },
 *     { name: 'Closed', value: 1 },
 *   ],
 * });
 *
 * status.get().format(1); // 'Closed'
 * registry.get('status') === status.get(); // true
 * ```
 */
export class DomainRegistry {
  private readonly refs = new Map<string, DomainRef<number> | DomainRef<bigint>>();

  /**
   * Record a definition under `id`. Nothing is built until first use.
   * @throws DomainAlreadyDefinedError if `id` is taken.
   */
  define(id: string, definition: DomainDefinition<number>): DomainRef<number>;
  define(id: string, definition: DomainDefinition<bigint>): DomainRef<bigint>;
  define(
    id: string,
    definition: DomainDefinition<number> | DomainDefinition<bigint>,
  ): DomainRef<number> | DomainRef<bigint> {
    if (this.refs.has(id)) {
      throw new DomainAlreadyDefinedError(id);
    }

    let ref: DomainRef<number> | DomainRef<bigint>;
    if (isBigIntDefinition(definition)) {
      const wide = definition;
      ref = new LazyDomainRef(id, () => createDomain(wide));
    }
    else {
      const narrow = definition;
      ref = new LazyDomainRef(id, () => createDomain(narrow));
    }

    this.refs.set(id, ref);
    return ref;
  }

  /**
   * Domain registered under `id`, building it on first access.
   * Returns `undefined` for an unknown id.
   */
  get(id: string): AnyValueDomain | undefined {
    return this.refs.get(id)?.get();
  }

  has(id: string): boolean {
    return this.refs.has(id);
  }

  ids(): string[] {
    return Array.from(this.refs.keys());
  }
}

// Process-wide registry
// ==============================

export const defaultRegistry = new DomainRegistry();

/**
 * Define a domain in the default registry.
 */
export function defineDomain(id: string, definition: DomainDefinition<number>): DomainRef<number>;
export function defineDomain(id: string, definition: DomainDefinition<bigint>): DomainRef<bigint>;
export function defineDomain(
  id: string,
  definition: DomainDefinition<number> | DomainDefinition<bigint>,
): DomainRef<number> | DomainRef<bigint> {
  if (isBigIntDefinition(definition)) {
    return defaultRegistry.define(id, definition);
  }
  return defaultRegistry.define(id, definition);
}

export function getDomain(id: string): AnyValueDomain | undefined {
  return defaultRegistry.get(id);
}
