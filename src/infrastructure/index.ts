/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Cross-cutting concerns used by the resolver:
 *
 * - **Logging**: leveled logger interface and console implementation
 * - **Config**: environment-derived settings for the default injector
 *
 * @packageDocumentation
 * @module @solo-inject/core/infrastructure
 */

export * from './logging';

export * from './config';
