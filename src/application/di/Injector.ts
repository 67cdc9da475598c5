/**
 * @solo-inject/core - Process-wide injector
 *
 * The default injector owns the process-wide instance registry. It is created
 * with an empty registry on first use, cleared by `reset()`, and never torn
 * down.
 */

import { Constructor, ServiceType } from '../../domain/registry/types';
import { loadInjectionConfig } from '../../infrastructure/config/InjectionConfig';
import { DependencyResolver } from './DependencyResolver';
import { InjectorOptions, SuppliedArguments } from './IDependencyInjection';

let defaultInjector: DependencyResolver | undefined;

/**
 * Create an injector with its own registry.
 *
 * @example
 * ```typescript
 * const injector = createInjector({ logger: myLogger, logLevel: 'debug' });
 * const app = injector.construct(App);
 * ```
 */
export function createInjector(options: InjectorOptions = {}): DependencyResolver {
  return new DependencyResolver(options);
}

/**
 * The process-wide injector, configured from the environment
 */
export function getDefaultInjector(): DependencyResolver {
  defaultInjector ??= createInjector(loadInjectionConfig());
  return defaultInjector;
}

/**
 * Construct `type` through the process-wide injector.
 *
 * @example
 * ```typescript
 * const groups = construct(GroupService, { named: { people: stubPeople } });
 * construct(GroupService) === groups; // true; stubPeople is not registered
 * construct(PeopleService) === stubPeople; // false
 * ```
 */
export function construct<T>(type: Constructor<T>, supplied?: SuppliedArguments): T {
  return getDefaultInjector().construct(type, supplied);
}

/**
 * Resolve `type`, which may be abstract, through the process-wide injector
 */
export function resolve<T>(type: ServiceType<T>): T {
  return getDefaultInjector().resolve(type);
}

/**
 * Clear the process-wide registry. Intended for test isolation; run it
 * between tests, never during a resolution.
 *
 * @remarks
 * Only instances are dropped. Marked types stay in {@link globalTypeCatalog}
 * for the life of the process, including classes declared inside a test.
 * Tests that declare implementers of a shared abstract type can keep them out
 * of the global catalog with `createInjector({ catalog: new TypeCatalog() })`.
 */
export function reset(): void {
  getDefaultInjector().reset();
}
