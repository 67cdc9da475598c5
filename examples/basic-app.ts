/**
 * @solo-inject/core v1.0.0 - Basic Example
 *
 * Demonstrates:
 * - Constructor injection by declared parameter type
 * - Singleton identity across construction calls
 * - Supplying a stand-in dependency by parameter name
 * - Resolving an abstract contract to its implementation
 */

import 'reflect-metadata';

import {
  Abstract,
  Injectable,
  ILogger,
  consoleLogger,
  createInjector,
  withPrefix,
} from '../src/index';

const log: ILogger = withPrefix(consoleLogger, 'example');

// ==================== Services ====================

@Injectable()
export class PersonService {
  constructor() {
    log.info('PersonService initialized');
  }

  getPersonName(): string {
    return 'John Doe';
  }
}

@Injectable()
export class GroupService {
  constructor(readonly personService: PersonService) {
    log.info('GroupService initialized');
  }

  getGroupWithPerson(): string {
    return `Group with ${this.personService.getPersonName()}`;
  }
}

class StubPersonService extends PersonService {
  getPersonName(): string {
    return 'Jane Stub';
  }
}

// ==================== Contract & Implementation ====================

@Abstract()
export abstract class Greeter {
  abstract greet(name: string): string;
}

@Injectable()
export class FriendlyGreeter extends Greeter {
  greet(name: string): string {
    return `Hello, ${name}!`;
  }
}

// ==================== Main Application ====================

export function main(): void {
  const injector = createInjector({ name: 'basic-app', logLevel: 'debug' });

  // PersonService is injected automatically
  const groups = injector.construct(GroupService);
  log.info(groups.getGroupWithPerson());

  // Same singleton on every call
  const again = injector.construct(GroupService);
  log.info(`Same group service: ${again === groups}`);

  const people = injector.construct(PersonService);
  log.info(`Same person service: ${people === groups.personService}`);

  // Abstract contracts resolve to their implementation
  log.info(injector.resolve(Greeter).greet('injector'));

  injector.reset();
  log.info(`New group service after reset: ${injector.construct(GroupService) !== groups}`);

  // A stand-in dependency is used verbatim and never registered
  injector.reset();
  const stubbed = injector.construct(GroupService, {
    named: { personService: new StubPersonService() },
  });
  log.info(stubbed.getGroupWithPerson());
  log.info(`Stubbed group service is canonical: ${injector.construct(GroupService) === stubbed}`);
  log.info(`Stub registered: ${injector.registry.has(PersonService)}`);
}

if (require.main === module) {
  main();
}
