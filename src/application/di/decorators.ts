/**
 * @solo-inject/core - Decorators
 *
 * `@Injectable()` marks a class for singleton treatment and constructor
 * injection, `@Abstract()` marks a contract that is resolved to a concrete
 * subclass, and `@Inject()` names the type of a constructor parameter when
 * the compiler cannot.
 *
 * Requires `experimentalDecorators` and `emitDecoratorMetadata`.
 */

import { ServiceType, isServiceType } from '../../domain/registry/types';
import { InjectableOptions, defineInjectable, defineParameterType } from './metadata';
import { TypeCatalog, globalTypeCatalog } from './TypeCatalog';

/**
 * Mark `type` as injectable and add it to the catalog. Idempotent.
 *
 * @example
 * ```typescript
 * class Clock {}
 * markInjectable(Clock);
 * construct(Clock) === construct(Clock); // true
 * ```
 */
export function markInjectable(
  type: ServiceType,
  options: InjectableOptions = {},
  catalog: TypeCatalog = globalTypeCatalog,
): void {
  defineInjectable(type, options);
  catalog.register(type);
}

/**
 * Class decorator form of {@link markInjectable}.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class GroupService {
 *   constructor(private readonly people: PersonService) {}
 * }
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    if (isServiceType(target)) {
      markInjectable(target, options);
    }
  };
}

/**
 * Mark a class as an abstract contract.
 *
 * @example
 * ```typescript
 * @Abstract()
 * abstract class Database {
 *   abstract getUser(id: number): User;
 * }
 *
 * @Injectable()
 * class BQDatabase extends Database { ... }
 *
 * // A parameter typed `Database` receives the BQDatabase singleton
 * ```
 */
export function Abstract(): ClassDecorator {
  return Injectable({ abstract: true });
}

/**
 * Declare the type injected into one constructor parameter.
 *
 * @remarks
 * Needed when the annotation does not survive compilation as a class
 * reference, e.g. a type-only import or a union that should resolve to one
 * of its members.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class ReportService {
 *   constructor(@Inject(Database) private readonly db: Database | undefined) {}
 * }
 * ```
 */
export function Inject(type: ServiceType): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    // constructor parameters only; method parameters are never injected
    if (propertyKey === undefined && isServiceType(target)) {
      defineParameterType(target, parameterIndex, type);
    }
  };
}
