/**
 * @solo-inject/core - Type Catalog
 *
 * The set of types the resolver knows about. JavaScript cannot enumerate the
 * subclasses of a class, so every injectable type registers itself here when
 * it is marked, and implementer lookups scan this list.
 */

import { Constructor, ServiceType, isStrictSubtype } from '../../domain/registry/types';
import { isConcrete } from './metadata';

/**
 * TypeCatalog - ordered universe of marked types
 *
 * Order is marking order, which for decorated classes is declaration order.
 */
export class TypeCatalog {
  private readonly known: Set<ServiceType> = new Set();

  /**
   * Add a type. Registering a type twice keeps its first position.
   */
  register(type: ServiceType): void {
    this.known.add(type);
  }

  has(type: ServiceType): boolean {
    return this.known.has(type);
  }

  types(): ServiceType[] {
    return Array.from(this.known);
  }

  /**
   * Strict subtypes of `base`, abstract or not.
   *
   * @param preferred - types listed ahead of the catalog, e.g. the types
   *   already present in a registry
   */
  subtypesOf(base: ServiceType, preferred: readonly ServiceType[] = []): ServiceType[] {
    const seen = new Set<ServiceType>();
    const subtypes: ServiceType[] = [];

    for (const type of [...preferred, ...this.known]) {
      if (seen.has(type)) continue;
      seen.add(type);

      if (isStrictSubtype(type, base)) {
        subtypes.push(type);
      }
    }

    return subtypes;
  }

  /**
   * Concrete strict subtypes of `base`, in the same order as `subtypesOf`
   */
  implementersOf(base: ServiceType, preferred: readonly ServiceType[] = []): Constructor[] {
    return this.subtypesOf(base, preferred).filter((type): type is Constructor => isConcrete(type));
  }
}

/**
 * Catalog shared by the decorators and the default injector. It holds every
 * marked class for the life of the process; `reset()` does not clear it.
 */
export const globalTypeCatalog = new TypeCatalog();
