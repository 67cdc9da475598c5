/**
 * @solo-inject/core - Resolution Exceptions
 *
 * Errors raised by the resolver itself. A constructor that throws while being
 * built is not wrapped: its error reaches the caller unchanged.
 */

/**
 * Render a resolution path as an indented tree.
 *
 * @example
 * ```typescript
 * buildDependencyGraph(['UserController', 'UserService'], 'Database (ABSTRACT)');
 * // └─ UserController
 * //   └─ UserService
 * //     └─ Database (ABSTRACT)
 * ```
 */
export function buildDependencyGraph(path: readonly string[], current: string): string {
  let graph = '';
  for (let i = 0; i < path.length; i++) {
    graph += `${'  '.repeat(i)}└─ ${path[i]}\n`;
  }
  graph += `${'  '.repeat(path.length)}└─ ${current}\n`;
  return graph;
}

/**
 * Error thrown when the resolver cannot produce an instance or cannot place
 * the arguments it was given.
 *
 * @remarks
 * `dependencyGraph` shows the chain of constructions that were in flight
 * when the failure happened, ending with the offending type:
 *
 * ```
 * └─ ReportService
 *   └─ UserService
 *     └─ Database (ABSTRACT)
 * ```
 */
export class DependencyResolutionError extends Error {
  /**
   * A string representation of the resolution path leading to the failure.
   */
  public readonly dependencyGraph: string;

  constructor(message: string, dependencyGraph: string = '') {
    super(message);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a required type is abstract and no concrete implementation of
 * it has been marked injectable.
 *
 * @example
 * ```typescript
 * @Abstract()
 * abstract class Database {}
 *
 * @Injectable()
 * class UserService {
 *   constructor(readonly database: Database) {}
 * }
 *
 * construct(UserService);
 * // UnresolvableAbstractTypeError: Cannot resolve abstract type 'Database':
 * // no concrete implementation is known
 * ```
 */
export class UnresolvableAbstractTypeError extends DependencyResolutionError {
  constructor(
    public readonly typeName: string,
    dependencyGraph: string = '',
  ) {
    super(
      `Cannot resolve abstract type '${typeName}': no concrete implementation is known`,
      dependencyGraph,
    );
    this.name = 'UnresolvableAbstractTypeError';
  }
}
