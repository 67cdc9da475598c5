/**
 * @fileoverview Unit tests for the Instance Registry
 *
 * Covers lookup by exact type, overwrite, clearing and the subtype scan used
 * by the resolver.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { InstanceRegistry, createInstanceRegistry } from '../../../src';

// ============================================================================
// Test Types
// ============================================================================

class Storage {}

class DiskStorage extends Storage {}

class MemoryStorage extends Storage {}

class Clock {}

// ============================================================================
// Test Suite
// ============================================================================

describe('InstanceRegistry', () => {
  let registry: InstanceRegistry;

  beforeEach(() => {
    registry = createInstanceRegistry();
  });

  describe('get / put', () => {
    it('should return undefined for an unregistered type', () => {
      expect(registry.get(Clock)).toBeUndefined();
    });

    it('should return the instance stored under the exact type', () => {
      const clock = new Clock();
      registry.put(Clock, clock);

      expect(registry.get(Clock)).toBe(clock);
    });

    it('should not answer a lookup for the parent type', () => {
      registry.put(DiskStorage, new DiskStorage());

      expect(registry.get(Storage)).toBeUndefined();
    });

    it('should return a stored value that is not an instance of its key', () => {
      const handle = new Proxy({}, {});
      registry.put(Clock, handle);

      expect(registry.get(Clock)).toBe(handle);
      expect(registry.stats().hits).toBe(1);
    });

    it('should overwrite an existing entry', () => {
      const first = new Clock();
      const second = new Clock();

      registry.put(Clock, first);
      registry.put(Clock, second);

      expect(registry.get(Clock)).toBe(second);
      expect(registry.size).toBe(1);
    });
  });

  describe('clear', () => {
    it('should be safe on an empty registry', () => {
      expect(() => registry.clear()).not.toThrow();
      expect(registry.size).toBe(0);
    });

    it('should remove every entry', () => {
      registry.put(Clock, new Clock());
      registry.put(DiskStorage, new DiskStorage());

      registry.clear();

      expect(registry.size).toBe(0);
      expect(registry.has(Clock)).toBe(false);
      expect(registry.types()).toEqual([]);
    });
  });

  describe('ordering', () => {
    it('should list types in insertion order', () => {
      registry.put(MemoryStorage, new MemoryStorage());
      registry.put(Clock, new Clock());
      registry.put(DiskStorage, new DiskStorage());

      expect(registry.types()).toEqual([MemoryStorage, Clock, DiskStorage]);
    });

    it('should keep the original position when an entry is overwritten', () => {
      registry.put(Clock, new Clock());
      registry.put(DiskStorage, new DiskStorage());
      registry.put(Clock, new Clock());

      expect(registry.types()).toEqual([Clock, DiskStorage]);
    });
  });

  describe('findInstanceOfSubtype', () => {
    it('should return undefined when no subtype is registered', () => {
      registry.put(Storage, new Storage());
      registry.put(Clock, new Clock());

      expect(registry.findInstanceOfSubtype(Storage)).toBeUndefined();
    });

    it('should return the first subtype in insertion order with all candidates', () => {
      const memory = new MemoryStorage();
      registry.put(MemoryStorage, memory);
      registry.put(Clock, new Clock());
      registry.put(DiskStorage, new DiskStorage());

      const match = registry.findInstanceOfSubtype(Storage);

      expect(match?.type).toBe(MemoryStorage);
      expect(match?.instance).toBe(memory);
      expect(match?.candidates).toEqual([MemoryStorage, DiskStorage]);
    });
  });

  describe('stats', () => {
    it('should count hits and misses', () => {
      registry.get(Clock);
      registry.put(Clock, new Clock());
      registry.get(Clock);

      expect(registry.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
    });

    it('should reset counters on clear', () => {
      registry.get(Clock);
      registry.clear();

      expect(registry.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
    });
  });
});
