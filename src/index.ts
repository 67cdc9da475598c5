/**
 * @fileoverview @solo-inject/core - Singleton dependency injection
 * @description
 * Mark a class injectable, construct it through the injector, and every
 * constructor parameter you do not supply is filled with the one shared
 * instance of its declared type.
 *
 * ```typescript
 * import { Injectable, construct, reset } from '@solo-inject/core';
 *
 * @Injectable()
 * class PersonService {}
 *
 * @Injectable()
 * class GroupService {
 *   constructor(readonly people: PersonService) {}
 * }
 *
 * const groups = construct(GroupService);
 * groups.people === construct(PersonService); // true
 *
 * reset(); // between tests
 * ```
 *
 * Requires `experimentalDecorators` and `emitDecoratorMetadata`.
 *
 * @packageDocumentation
 * @module @solo-inject/core
 * @version 1.0.0
 */

// Must load before any decorated class is evaluated
import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS (Registry & Errors)
// ============================================================================

export {
  InstanceRegistry,
  createInstanceRegistry,
  isServiceType,
  isStrictSubtype,
  typeName,
} from './domain/registry';

export type {
  IInstanceRegistry,
  RegistryMatch,
  RegistryStats,
  Constructor,
  AbstractConstructor,
  ServiceType,
} from './domain/registry';

export {
  DependencyResolutionError,
  UnresolvableAbstractTypeError,
  buildDependencyGraph,
} from './domain/exceptions';

// ============================================================================
// APPLICATION LAYER EXPORTS (Decorators & Resolution)
// ============================================================================

export {
  Injectable,
  Abstract,
  Inject,
  markInjectable,
  isInjectable,
  isAbstract,
  isConcrete,
  METADATA_KEYS,
  DependencyResolver,
  TypeCatalog,
  globalTypeCatalog,
  describeConstructor,
  parseParameterNames,
  construct,
  resolve,
  reset,
  createInjector,
  getDefaultInjector,
} from './application/di';

export type {
  IInjector,
  InjectorOptions,
  SuppliedArguments,
  InjectableOptions,
  ConstructorDescriptor,
  ParameterDescriptor,
} from './application/di';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS (Logging & Config)
// ============================================================================

export {
  consoleLogger,
  silentLogger,
  withMinimumLevel,
  withPrefix,
  isLogLevel,
  LOG_LEVELS,
  loadInjectionConfig,
  DEFAULT_INJECTION_CONFIG,
} from './infrastructure';

export type { ILogger, LogLevel, InjectionConfig } from './infrastructure';

// ==================== Version ====================
export const VERSION = '1.0.0';
