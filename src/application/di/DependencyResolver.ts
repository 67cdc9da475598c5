/**
 * @solo-inject/core - Dependency Resolver
 *
 * Singleton construction, constructor injection and the type resolution
 * policy.
 */

import { Constructor, ServiceType, typeName } from '../../domain/registry/types';
import { IInstanceRegistry, InstanceRegistry } from '../../domain/registry/InstanceRegistry';
import {
  DependencyResolutionError,
  UnresolvableAbstractTypeError,
  buildDependencyGraph,
} from '../../domain/exceptions/exceptions';
import { DEFAULT_INJECTION_CONFIG } from '../../infrastructure/config/InjectionConfig';
import {
  ILogger,
  consoleLogger,
  withMinimumLevel,
  withPrefix,
} from '../../infrastructure/logging/logger';
import { ConstructorDescriptor, describeConstructor } from './ConstructorDescriptor';
import { markInjectable } from './decorators';
import { InjectableOptions, isAbstract, isConcrete, isInjectable } from './metadata';
import { TypeCatalog, globalTypeCatalog } from './TypeCatalog';
import { IInjector, InjectorOptions, SuppliedArguments } from './IDependencyInjection';

function hasSuppliedArguments(supplied: SuppliedArguments): boolean {
  return (supplied.positional?.length ?? 0) > 0 || Object.keys(supplied.named ?? {}).length > 0;
}

/**
 * DependencyResolver - default {@link IInjector} implementation
 *
 * @remarks
 * **Resolution order for a required type P:**
 *
 * 1. an instance registered exactly under P
 * 2. a registered instance of a strict subclass of P, first in registry
 *    insertion order
 * 3. the first concrete subclass of P: registry types first (insertion
 *    order), then the type catalog (marking order); it is constructed and
 *    registered under its own type
 * 4. P is marked abstract or has subclasses, yet none is concrete:
 *    {@link UnresolvableAbstractTypeError}
 * 5. P itself, constructed and registered
 *
 * When steps 2 or 3 find several candidates, the first one wins and a
 * warning lists them all. Callers should not depend on which one wins.
 *
 * **Concurrency:** resolution never yields, so the check-create-store
 * sequence for a type cannot interleave with another request on the same
 * thread.
 *
 * @example
 * ```typescript
 * const injector = new DependencyResolver({ logLevel: 'debug' });
 *
 * const users = injector.construct(UserService);
 * injector.construct(UserService) === users; // true
 *
 * injector.reset();
 * injector.construct(UserService) === users; // false
 * ```
 */
export class DependencyResolver implements IInjector {
  readonly name: string;
  readonly registry: IInstanceRegistry;
  private readonly catalog: TypeCatalog;
  private readonly logger: ILogger;

  /** Names of the types currently being built, outermost first */
  private readonly path: string[] = [];

  constructor(options: InjectorOptions = {}) {
    this.name = options.name ?? DEFAULT_INJECTION_CONFIG.name;
    this.registry = options.registry ?? new InstanceRegistry();
    this.catalog = options.catalog ?? globalTypeCatalog;
    this.logger = withPrefix(
      withMinimumLevel(
        options.logger ?? consoleLogger,
        options.logLevel ?? DEFAULT_INJECTION_CONFIG.logLevel,
      ),
      this.name,
    );
  }

  /**
   * True while a construction is in progress
   */
  get resolving(): boolean {
    return this.path.length > 0;
  }

  markInjectable(type: ServiceType, options: InjectableOptions = {}): void {
    markInjectable(type, options, this.catalog);
  }

  construct<T>(type: Constructor<T>, supplied: SuppliedArguments = {}): T {
    if (isAbstract(type)) {
      if (hasSuppliedArguments(supplied)) {
        throw this.unresolvable(type);
      }
      return this.resolve(type);
    }

    return this.getOrCreate(type, supplied);
  }

  resolve<T>(type: ServiceType<T>): T {
    const cached = this.registry.get(type);
    if (cached !== undefined) {
      return cached;
    }

    const reused = this.registry.findInstanceOfSubtype(type);
    if (reused) {
      this.warnIfAmbiguous(type, reused.candidates);
      return reused.instance;
    }

    const registered = this.registry.types();
    const implementers = this.catalog.implementersOf(type, registered);
    const [implementer] = implementers;

    if (implementer !== undefined) {
      this.warnIfAmbiguous(type, implementers);
      const instance = this.getOrCreate(implementer);
      if (instance instanceof type) {
        return instance;
      }
      throw new DependencyResolutionError(
        `${typeName(implementer)} did not produce an instance of ${typeName(type)}`,
        buildDependencyGraph(this.path, typeName(type)),
      );
    }

    if (!isConcrete(type) || this.catalog.subtypesOf(type, registered).length > 0) {
      throw this.unresolvable(type);
    }

    return this.getOrCreate(type);
  }

  reset(): void {
    if (this.resolving) {
      throw new DependencyResolutionError(
        'Cannot reset the instance registry while a resolution is in progress',
        buildDependencyGraph(this.path.slice(0, -1), this.path[this.path.length - 1] ?? ''),
      );
    }

    const released = this.registry.size;
    this.registry.clear();
    this.logger.info(`Registry reset, ${released} instance(s) released`);
  }

  /**
   * Singleton construction: return the registered instance of `type`, or
   * build it once and register it. Supplied values fill their parameters
   * and are never registered themselves; once an instance exists they are
   * ignored.
   */
  private getOrCreate<T>(type: Constructor<T>, supplied: SuppliedArguments = {}): T {
    // `new` always yields an object, so undefined means no entry
    const existing = this.registry.get(type);
    if (existing !== undefined) {
      if (hasSuppliedArguments(supplied)) {
        this.logger.debug(
          `Supplied arguments for ${typeName(type)} ignored; returning the registered instance`,
        );
      }
      return existing;
    }

    if (!isInjectable(type)) {
      this.markInjectable(type);
    }

    const instance = this.build(type, supplied);
    this.registry.put(type, instance);
    this.logger.debug(`Created ${typeName(type)}`);
    return instance;
  }

  /**
   * Fill the argument list and invoke the constructor once
   */
  private build<T>(type: Constructor<T>, supplied: SuppliedArguments): T {
    this.path.push(typeName(type));
    try {
      const args = this.collectArguments(describeConstructor(type), supplied);
      return new type(...args);
    } finally {
      this.path.pop();
    }
  }

  private collectArguments(
    descriptor: ConstructorDescriptor,
    supplied: SuppliedArguments,
  ): unknown[] {
    const positional = supplied.positional ?? [];
    const named = supplied.named ?? {};
    const args: unknown[] = [...positional];

    for (const [name, value] of Object.entries(named)) {
      const parameter = descriptor.parameters.find((candidate) => candidate.name === name);

      if (!parameter) {
        throw new DependencyResolutionError(
          `${typeName(descriptor.type)} has no constructor parameter named '${name}'`,
          buildDependencyGraph(this.path.slice(0, -1), typeName(descriptor.type)),
        );
      }
      if (parameter.index < positional.length) {
        throw new DependencyResolutionError(
          `Constructor parameter '${name}' of ${typeName(descriptor.type)} was supplied both positionally and by name`,
          buildDependencyGraph(this.path.slice(0, -1), typeName(descriptor.type)),
        );
      }
      args[parameter.index] = value;
    }

    for (const parameter of descriptor.parameters) {
      if (parameter.index < positional.length || Object.hasOwn(named, parameter.name)) {
        continue;
      }
      if (parameter.type === undefined) {
        continue;
      }
      args[parameter.index] = this.resolve(parameter.type);
    }

    return args;
  }

  private warnIfAmbiguous(type: ServiceType, candidates: readonly ServiceType[]): void {
    if (candidates.length < 2) return;

    this.logger.warn(
      `Multiple implementations of ${typeName(type)} are available ` +
        `(${candidates.map(typeName).join(', ')}); using ${typeName(candidates[0])}`,
    );
  }

  private unresolvable(type: ServiceType): UnresolvableAbstractTypeError {
    const name = typeName(type);
    return new UnresolvableAbstractTypeError(
      name,
      buildDependencyGraph(this.path, `${name} (ABSTRACT)`),
    );
  }
}
