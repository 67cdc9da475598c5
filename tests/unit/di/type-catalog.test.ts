/**
 * @fileoverview Unit tests for the Type Catalog
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { TypeCatalog, markInjectable, isInjectable, isAbstract } from '../../../src';

// ============================================================================
// Test Types
// ============================================================================

abstract class Notifier {
  abstract send(message: string): string;
}

abstract class QueuedNotifier extends Notifier {}

class EmailNotifier extends Notifier {
  send(message: string): string {
    return `email:${message}`;
  }
}

class SmsNotifier extends QueuedNotifier {
  send(message: string): string {
    return `sms:${message}`;
  }
}

class Unrelated {}

// ============================================================================
// Test Suite
// ============================================================================

describe('TypeCatalog', () => {
  let catalog: TypeCatalog;

  beforeEach(() => {
    catalog = new TypeCatalog();
    markInjectable(Notifier, { abstract: true }, catalog);
    markInjectable(QueuedNotifier, { abstract: true }, catalog);
    markInjectable(SmsNotifier, {}, catalog);
    markInjectable(Unrelated, {}, catalog);
    markInjectable(EmailNotifier, {}, catalog);
  });

  it('should keep marking order', () => {
    expect(catalog.types()).toEqual([Notifier, QueuedNotifier, SmsNotifier, Unrelated, EmailNotifier]);
  });

  it('should keep the first position when a type is marked again', () => {
    markInjectable(Notifier, {}, catalog);

    expect(catalog.types()[0]).toBe(Notifier);
    expect(catalog.types()).toHaveLength(5);
  });

  it('should keep the abstract flag when a type is marked again without it', () => {
    markInjectable(Notifier, {}, catalog);

    expect(isInjectable(Notifier)).toBe(true);
    expect(isAbstract(Notifier)).toBe(true);
  });

  it('should list strict subtypes including abstract ones', () => {
    expect(catalog.subtypesOf(Notifier)).toEqual([QueuedNotifier, SmsNotifier, EmailNotifier]);
  });

  it('should exclude the type itself', () => {
    expect(catalog.subtypesOf(SmsNotifier)).toEqual([]);
  });

  it('should list concrete implementers only', () => {
    expect(catalog.implementersOf(Notifier)).toEqual([SmsNotifier, EmailNotifier]);
  });

  it('should place preferred types first without duplicates', () => {
    expect(catalog.implementersOf(Notifier, [EmailNotifier, Unrelated])).toEqual([
      EmailNotifier,
      SmsNotifier,
    ]);
  });

  it('should include preferred types the catalog has never seen', () => {
    class PushNotifier extends Notifier {
      send(message: string): string {
        return `push:${message}`;
      }
    }

    expect(catalog.implementersOf(Notifier, [PushNotifier])).toEqual([
      PushNotifier,
      SmsNotifier,
      EmailNotifier,
    ]);
    expect(catalog.has(PushNotifier)).toBe(false);
  });
});
