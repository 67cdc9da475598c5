/**
 * @fileoverview Dependency Injection Interfaces
 *
 * @packageDocumentation
 * @module @solo-inject/core/application/di
 *
 * ## Resolution model
 *
 * Every injectable class has at most one live instance, held in a
 * process-wide {@link IInstanceRegistry}. Constructing a class through the
 * injector fills each constructor parameter the caller did not supply with an
 * instance of the parameter's declared type:
 *
 * ```
 * construct(GroupService)
 *   ↓
 * GroupService(people: PersonService)
 *   ↓
 * resolve(PersonService)
 *   1. registry hit under PersonService         → reuse
 *   2. registry hit under a subclass            → reuse
 *   3. known concrete subclass                  → construct it
 *   4. abstract, no concrete subclass           → UnresolvableAbstractTypeError
 *   5. otherwise                                → construct PersonService
 *   ↓
 * new GroupService(personService)  → registered under GroupService
 * ```
 *
 * ## Lifecycle
 *
 * - **init**: the default injector starts with an empty registry the first
 *   time it is used.
 * - **reset**: `reset()` drops every instance; references held by callers
 *   are detached and the next `construct()` builds fresh instances. The
 *   catalog of marked types is kept.
 * - There is no teardown and no per-instance eviction.
 *
 * ## Supplied arguments
 *
 * Values passed to `construct()` are used verbatim and never registered.
 * The instance built from them becomes the canonical one for its type:
 *
 * ```typescript
 * const service = construct(UserService, {
 *   named: { database: new MockDatabase() },
 * });
 * construct(UserService) === service; // true
 * ```
 *
 * @version 1.0.0
 */

import { Constructor, ServiceType } from '../../domain/registry/types';
import { IInstanceRegistry } from '../../domain/registry/InstanceRegistry';
import { ILogger, LogLevel } from '../../infrastructure/logging/logger';
import { InjectableOptions } from './metadata';
import { TypeCatalog } from './TypeCatalog';

/**
 * Arguments a caller provides instead of letting them be injected.
 *
 * @remarks
 * Both forms may be combined. Positional values fill the leading parameters;
 * named values are matched by constructor parameter name. Every parameter
 * left over is injected.
 *
 * @example Mixed mode
 * ```typescript
 * @Injectable()
 * class ReportService {
 *   constructor(readonly database: Database, readonly clock: Clock) {}
 * }
 *
 * // clock is injected
 * construct(ReportService, { positional: [fakeDatabase] });
 *
 * // database is injected
 * construct(ReportService, { named: { clock: frozenClock } });
 * ```
 */
export interface SuppliedArguments {
  /** Values for the leading parameters, in declaration order */
  positional?: readonly unknown[];

  /** Values keyed by constructor parameter name */
  named?: Readonly<Record<string, unknown>>;
}

/**
 * Injector configuration
 */
export interface InjectorOptions {
  /** Name used to prefix log messages */
  name?: string;

  /** Logger receiving resolution events */
  logger?: ILogger;

  /** Lowest level passed to the logger */
  logLevel?: LogLevel;

  /** Registry holding the singletons; a new empty one by default */
  registry?: IInstanceRegistry;

  /** Universe of known types; the shared catalog by default */
  catalog?: TypeCatalog;
}

/**
 * The injector contract.
 *
 * @remarks
 * All operations are synchronous and run to completion before returning.
 */
export interface IInjector {
  /**
   * Registry holding one instance per resolved type
   */
  readonly registry: IInstanceRegistry;

  /**
   * Mark a type injectable and add it to this injector's catalog. Idempotent.
   */
  markInjectable(type: ServiceType, options?: InjectableOptions): void;

  /**
   * Construct `type`, injecting every constructor parameter not supplied.
   *
   * @remarks
   * Returns the canonical instance, creating and registering it on first
   * use. Supplied values fill their parameters on that first construction
   * and are ignored afterwards; they are never registered themselves. An
   * abstract type is resolved to its implementation and takes no supplied
   * values.
   *
   * @throws {UnresolvableAbstractTypeError} when an abstract parameter type
   *   has no concrete implementation
   * @throws whatever a constructor throws, unchanged
   */
  construct<T>(type: Constructor<T>, supplied?: SuppliedArguments): T;

  /**
   * Produce an instance assignable to `type` following the resolution order.
   */
  resolve<T>(type: ServiceType<T>): T;

  /**
   * Drop every registered instance.
   *
   * @throws {DependencyResolutionError} when called during a resolution
   */
  reset(): void;
}
