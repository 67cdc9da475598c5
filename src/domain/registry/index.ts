/**
 * @solo-inject/core - Registry Module
 *
 * Type identity and the instance registry
 */

export { InstanceRegistry, createInstanceRegistry } from './InstanceRegistry';

export type {
  IInstanceRegistry,
  RegistryMatch,
  RegistryStats,
} from './InstanceRegistry';

export { isServiceType, isStrictSubtype, typeName } from './types';

export type { Constructor, AbstractConstructor, ServiceType } from './types';
