/**
 * @module @solo-inject/core/application/di
 * @description Singleton dependency injection: decorators, resolver and the
 * process-wide injector
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IInjector,
  InjectorOptions,
  SuppliedArguments,
} from './IDependencyInjection';

export type { InjectableOptions } from './metadata';

export type { ConstructorDescriptor, ParameterDescriptor } from './ConstructorDescriptor';

// ============================================================================
// Decorators
// ============================================================================

export { Injectable, Abstract, Inject, markInjectable } from './decorators';

export { isInjectable, isAbstract, isConcrete, METADATA_KEYS } from './metadata';

// ============================================================================
// Resolution
// ============================================================================

export { DependencyResolver } from './DependencyResolver';

export { TypeCatalog, globalTypeCatalog } from './TypeCatalog';

export { describeConstructor, parseParameterNames } from './ConstructorDescriptor';

// ============================================================================
// Process-wide injector
// ============================================================================

export {
  construct,
  resolve,
  reset,
  createInjector,
  getDefaultInjector,
} from './Injector';
