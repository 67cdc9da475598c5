/**
 * @solo-inject/core - Exception Module
 *
 * Errors raised during dependency resolution
 */

export {
  DependencyResolutionError,
  UnresolvableAbstractTypeError,
  buildDependencyGraph,
} from './exceptions';
