/**
 * @module @solo-inject/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Instance Registry
// ============================================================================

export * from './registry';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
