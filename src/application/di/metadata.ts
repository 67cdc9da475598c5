/**
 * @solo-inject/core - Injection metadata
 *
 * Reads and writes the reflect-metadata entries that mark a class injectable
 * and describe its constructor parameters.
 */

import 'reflect-metadata';

import { Constructor, ServiceType, isServiceType } from '../../domain/registry/types';

export const METADATA_KEYS = {
  /** Options given to `@Injectable()` / `markInjectable()` */
  injectable: 'injectable:options',

  /** Explicit parameter types given with `@Inject()` */
  parameterTypes: 'injectable:parameters',

  /** Emitted by the compiler under `emitDecoratorMetadata` */
  designParameterTypes: 'design:paramtypes',
} as const;

/**
 * Options for marking a class injectable
 */
export interface InjectableOptions {
  /**
   * The class is a contract. It is never instantiated itself; a concrete
   * injectable subclass is resolved in its place.
   */
  abstract?: boolean;
}

function readOwnOptions(type: ServiceType): InjectableOptions | undefined {
  const value: unknown = Reflect.getOwnMetadata(METADATA_KEYS.injectable, type);
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return { abstract: 'abstract' in value && value.abstract === true };
}

/**
 * Record injectable options on the class itself. Marking twice keeps the
 * abstract flag once set.
 */
export function defineInjectable(type: ServiceType, options: InjectableOptions = {}): void {
  const existing = readOwnOptions(type);
  const merged: InjectableOptions = {
    abstract: existing?.abstract === true || options.abstract === true,
  };
  Reflect.defineMetadata(METADATA_KEYS.injectable, merged, type);
}

/**
 * Options the class was marked with. Subclasses do not inherit them.
 */
export function getInjectableOptions(type: ServiceType): InjectableOptions | undefined {
  return readOwnOptions(type);
}

export function isInjectable(type: ServiceType): boolean {
  return readOwnOptions(type) !== undefined;
}

export function isAbstract(type: ServiceType): boolean {
  return readOwnOptions(type)?.abstract === true;
}

/**
 * Store an explicit type for one constructor parameter
 */
export function defineParameterType(target: ServiceType, index: number, type: ServiceType): void {
  const existing: unknown = Reflect.getOwnMetadata(METADATA_KEYS.parameterTypes, target);
  const types: Array<ServiceType | undefined> = Array.isArray(existing)
    ? existing.map((entry: unknown) => (isServiceType(entry) ? entry : undefined))
    : [];
  types[index] = type;
  Reflect.defineMetadata(METADATA_KEYS.parameterTypes, types, target);
}

function readTypeList(key: string, type: ServiceType): Array<ServiceType | undefined> | undefined {
  const value: unknown = Reflect.getOwnMetadata(key, type);
  if (!Array.isArray(value)) {
    return undefined;
  }
  return Array.from(value, (entry: unknown) => (isServiceType(entry) ? entry : undefined));
}

/**
 * Types given with `@Inject()`, indexed by parameter position
 */
export function getExplicitParameterTypes(type: ServiceType): Array<ServiceType | undefined> {
  return readTypeList(METADATA_KEYS.parameterTypes, type) ?? [];
}

/**
 * Compiler-emitted parameter types of the class's own constructor.
 * Undefined when the class was not decorated or declares no constructor.
 */
export function getDesignParameterTypes(type: ServiceType): Array<ServiceType | undefined> | undefined {
  return readTypeList(METADATA_KEYS.designParameterTypes, type);
}

/**
 * A class that is not marked abstract may be instantiated
 */
export function isConcrete<T>(type: ServiceType<T>): type is Constructor<T> {
  return !isAbstract(type);
}
