/**
 * @fileoverview Integration test for the basic example services
 */

import 'reflect-metadata';

import { construct, resolve } from '../../../src';
import {
  FriendlyGreeter,
  Greeter,
  GroupService,
  PersonService,
} from '../../../examples/basic-app';

describe('Basic App', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should inject PersonService into GroupService', () => {
    const groups = construct(GroupService);

    expect(groups.personService).toBeInstanceOf(PersonService);
    expect(groups.getGroupWithPerson()).toBe('Group with John Doe');
  });

  it('should share one PersonService across constructions', () => {
    const groups = construct(GroupService);

    expect(construct(GroupService)).toBe(groups);
    expect(construct(PersonService)).toBe(groups.personService);
  });

  it('should initialize each service once', () => {
    construct(GroupService);
    construct(GroupService);
    construct(PersonService);

    expect(console.info).toHaveBeenCalledTimes(2);
    expect(console.info).toHaveBeenNthCalledWith(1, '[INFO] [example] PersonService initialized');
    expect(console.info).toHaveBeenNthCalledWith(2, '[INFO] [example] GroupService initialized');
  });

  it('should resolve the greeter contract', () => {
    const greeter = resolve(Greeter);

    expect(greeter).toBeInstanceOf(FriendlyGreeter);
    expect(greeter.greet('team')).toBe('Hello, team!');
  });
});
