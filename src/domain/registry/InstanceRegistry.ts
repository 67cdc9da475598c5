/**
 * @solo-inject/core - Instance Registry
 *
 * Process-wide store of one live instance per type.
 * Entries are created lazily by the resolver and only ever removed all at once.
 */

import { ServiceType, isStrictSubtype } from './types';

/**
 * Registry statistics
 */
export interface RegistryStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Registry contract used by the resolver
 */
export interface IInstanceRegistry {
  get<T>(type: ServiceType<T>): T | undefined;
  put<T>(type: ServiceType<T>, instance: T): void;
  has(type: ServiceType): boolean;
  clear(): void;
  types(): ServiceType[];
  findInstanceOfSubtype<T>(type: ServiceType<T>): RegistryMatch<T> | undefined;
  readonly size: number;
}

/**
 * A registry entry found while scanning for a compatible instance
 */
export interface RegistryMatch<T> {
  /** Key the instance is registered under */
  type: ServiceType;

  /** The registered instance */
  instance: T;

  /** Every registered type that qualified, in insertion order */
  candidates: ServiceType[];
}

/**
 * InstanceRegistry - type identity to singleton instance
 *
 * Iteration order is insertion order, which is the order in which
 * instances were first created.
 *
 * @example
 * ```typescript
 * const registry = new InstanceRegistry();
 *
 * registry.put(ConfigService, config);
 * registry.get(ConfigService); // config
 *
 * registry.clear();
 * registry.get(ConfigService); // undefined
 * ```
 */
export class InstanceRegistry implements IInstanceRegistry {
  private instances: Map<ServiceType, unknown> = new Map();
  private hits = 0;
  private misses = 0;

  /**
   * Get the instance registered exactly under `type`. Lookup is by key only.
   */
  get<T>(type: ServiceType<T>): T | undefined {
    if (!this.instances.has(type)) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    return this.read(type);
  }

  /**
   * Store or overwrite the entry for `type`
   */
  put<T>(type: ServiceType<T>, instance: T): void {
    this.instances.set(type, instance);
  }

  has(type: ServiceType): boolean {
    return this.instances.has(type);
  }

  /**
   * Remove all entries
   */
  clear(): void {
    this.instances.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Registered types in insertion order
   */
  types(): ServiceType[] {
    return Array.from(this.instances.keys());
  }

  /**
   * Registered entries in insertion order
   */
  entries(): Array<[ServiceType, unknown]> {
    return Array.from(this.instances.entries());
  }

  /**
   * First registered instance whose key is a strict subtype of `type`
   */
  findInstanceOfSubtype<T>(type: ServiceType<T>): RegistryMatch<T> | undefined {
    let match: { type: ServiceType; instance: T } | undefined;
    const candidates: ServiceType[] = [];

    for (const [registered, instance] of this.instances) {
      if (!isStrictSubtype(registered, type) || !(instance instanceof type)) {
        continue;
      }
      candidates.push(registered);
      match ??= { type: registered, instance };
    }

    return match ? { ...match, candidates } : undefined;
  }

  /**
   * Stored value for a key known to be present. `put` is the only writer and
   * ties each value to its key's instance type; a constructor may return an
   * object that is not `instanceof` its class.
   */
  private read<T>(type: ServiceType<T>): T {
    return this.instances.get(type) as T;
  }

  get size(): number {
    return this.instances.size;
  }

  stats(): RegistryStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.instances.size,
    };
  }
}

/**
 * Create an empty registry
 */
export function createInstanceRegistry(): InstanceRegistry {
  return new InstanceRegistry();
}
