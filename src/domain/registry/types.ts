/**
 * @solo-inject/core - Type identity
 *
 * Classes are the unit of registration: the constructor function object is
 * the registry key for the instances it produces.
 */

/**
 * A concrete, instantiable class.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * A class declared `abstract`. It has a prototype but cannot be `new`ed.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Any class that may appear as a declared constructor parameter type.
 * Concrete constructors are assignable to it.
 */
export type ServiceType<T = unknown> = AbstractConstructor<T>;

/**
 * Narrow a metadata value to a class reference.
 */
export function isServiceType(value: unknown): value is ServiceType {
  return typeof value === 'function';
}

/**
 * True when `candidate` extends `base` somewhere along its prototype chain and
 * is not `base` itself.
 */
export function isStrictSubtype(candidate: ServiceType, base: ServiceType): boolean {
  return candidate !== base && candidate.prototype instanceof base;
}

/**
 * Display name for messages and dependency graphs.
 */
export function typeName(type: ServiceType): string {
  return type.name || '<anonymous>';
}
