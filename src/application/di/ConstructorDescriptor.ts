/**
 * @solo-inject/core - Constructor Descriptor
 *
 * Builds the `(name, declared type)` list for a class's constructor once and
 * caches it. Types come from `@Inject()` or from the compiler's
 * `design:paramtypes` metadata; names are read from the class source so that
 * callers can supply arguments by parameter name.
 */

import { ServiceType, isServiceType } from '../../domain/registry/types';
import { getDesignParameterTypes, getExplicitParameterTypes } from './metadata';

/**
 * One constructor parameter
 */
export interface ParameterDescriptor {
  /** Position in the constructor signature */
  index: number;

  /** Parameter name, or `param<index>` when it cannot be read */
  name: string;

  /** Declared type; absent when nothing can be injected */
  type?: ServiceType;
}

/**
 * Constructor parameters of one class, in declaration order
 */
export interface ConstructorDescriptor {
  type: ServiceType;
  parameters: readonly ParameterDescriptor[];
}

/**
 * Types the compiler emits for annotations that are not classes:
 * interfaces, unions, primitives, functions, arrays and promises.
 */
const UNINJECTABLE_TYPES: ReadonlySet<unknown> = new Set<unknown>([
  Object,
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
  Function,
  Array,
  Promise,
  RegExp,
  Date,
  Map,
  Set,
]);

const IDENTIFIER = /^[A-Za-z_$][\w$]*/;

function isIdentifierChar(char: string | undefined): boolean {
  return char !== undefined && /[\w$]/.test(char);
}

/** Tokens after which a `/` begins a regular expression rather than a division */
const REGEX_PRECEDING_PUNCTUATORS = new Set('(,=:[!&|?{};+-*%<>~^');

const REGEX_PRECEDING_KEYWORDS = new Set([
  'return',
  'typeof',
  'instanceof',
  'in',
  'of',
  'new',
  'delete',
  'void',
  'throw',
  'case',
  'do',
  'else',
  'yield',
  'await',
]);

/**
 * True when an expression may begin at `index`
 */
function startsExpression(source: string, index: number): boolean {
  let i = index - 1;
  while (i >= 0 && /\s/.test(source[i])) i--;
  if (i < 0) {
    return true;
  }

  if (REGEX_PRECEDING_PUNCTUATORS.has(source[i])) {
    return true;
  }

  const word = /[\w$]+$/.exec(source.slice(0, i + 1));
  return word !== null && REGEX_PRECEDING_KEYWORDS.has(word[0]);
}

/**
 * Index just past a regular expression literal starting at `start`, or
 * `start` when the slash does not open one.
 */
function skipRegExp(source: string, start: number): number {
  if (!startsExpression(source, start)) {
    return start;
  }

  let inClass = false;
  let i = start + 1;

  while (i < source.length) {
    const char = source[i];
    if (char === '\\') {
      i += 2;
      continue;
    }
    if (char === '\n') {
      return start;
    }

    if (inClass) {
      if (char === ']') inClass = false;
    } else if (char === '[') {
      inClass = true;
    } else if (char === '/') {
      i++;
      while (isIdentifierChar(source[i])) i++;
      return i;
    }
    i++;
  }

  return start;
}

/**
 * Index just past a string, template literal, regular expression or comment
 * starting at `start`, or `start` itself when none starts there.
 */
function skipNonCode(source: string, start: number): number {
  const char = source[start];

  if (char === '/' && source[start + 1] === '/') {
    const end = source.indexOf('\n', start);
    return end === -1 ? source.length : end + 1;
  }

  if (char === '/' && source[start + 1] === '*') {
    const end = source.indexOf('*/', start + 2);
    return end === -1 ? source.length : end + 2;
  }

  if (char === '/') {
    return skipRegExp(source, start);
  }

  if (char === '"' || char === "'" || char === '`') {
    let i = start + 1;
    while (i < source.length && source[i] !== char) {
      i += source[i] === '\\' ? 2 : 1;
    }
    return i + 1;
  }

  return start;
}

/**
 * Given the index of an opening parenthesis, return the text up to its
 * matching closing parenthesis.
 */
function readParenthesized(source: string, open: number): string | undefined {
  let depth = 0;
  let i = open;

  while (i < source.length) {
    const skipped = skipNonCode(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }

    const char = source[i];
    if (char === '(') depth++;
    if (char === ')') {
      depth--;
      if (depth === 0) {
        return source.slice(open + 1, i);
      }
    }
    i++;
  }

  return undefined;
}

/**
 * Outcome of scanning a class body for its own constructor
 */
type ConstructorScan =
  | { kind: 'absent' }
  | { kind: 'unreadable' }
  | { kind: 'found'; list: string };

/**
 * Find the parameter list of the constructor declared directly in a class
 * body.
 */
function findClassConstructorParameters(source: string): ConstructorScan {
  let braces = 0;
  let nesting = 0;
  let i = 0;

  while (i < source.length) {
    const skipped = skipNonCode(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }

    const char = source[i];
    if (char === '(' || char === '[') nesting++;
    else if (char === ')' || char === ']') nesting--;
    else if (char === '{') braces++;
    else if (char === '}') braces--;
    else if (
      braces === 1 &&
      nesting === 0 &&
      source.startsWith('constructor', i) &&
      !isIdentifierChar(source[i - 1]) &&
      source[i - 1] !== '.' &&
      !isIdentifierChar(source[i + 'constructor'.length])
    ) {
      const open = source.slice(i + 'constructor'.length).search(/\S/);
      const openIndex = i + 'constructor'.length + open;
      if (open !== -1 && source[openIndex] === '(') {
        const list = readParenthesized(source, openIndex);
        return list === undefined ? { kind: 'unreadable' } : { kind: 'found', list };
      }
    }
    i++;
  }

  return { kind: 'absent' };
}

/**
 * Split a parameter list on its top-level commas
 */
function splitParameters(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  let i = 0;

  while (i < list.length) {
    const skipped = skipNonCode(list, i);
    if (skipped !== i) {
      const chunk = list.slice(i, skipped);
      // comments are dropped, literals kept
      if (!chunk.startsWith('//') && !chunk.startsWith('/*')) current += chunk;
      i = skipped;
      continue;
    }

    const char = list[i];
    if (char === '(' || char === '[' || char === '{') depth++;
    if (char === ')' || char === ']' || char === '}') depth--;

    if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
    i++;
  }

  if (current.trim() !== '') {
    parts.push(current);
  }

  return parts;
}

/**
 * Read constructor parameter names from a class or function source text.
 *
 * Returns `undefined` for a class without its own constructor, so the caller
 * can fall back to the parent class, and an empty list when the constructor
 * is there but its parameter list cannot be read. Destructured parameters
 * have no name and yield `undefined` at their position.
 *
 * @example
 * ```typescript
 * parseParameterNames('class A { constructor(db, logger = console) {} }');
 * // ['db', 'logger']
 * ```
 */
export function parseParameterNames(source: string): Array<string | undefined> | undefined {
  const trimmed = source.trimStart();
  let list: string | undefined;

  if (trimmed.startsWith('class')) {
    const scan = findClassConstructorParameters(trimmed);
    if (scan.kind === 'unreadable') {
      return [];
    }
    list = scan.kind === 'found' ? scan.list : undefined;
  } else {
    const open = trimmed.indexOf('(');
    list = open === -1 ? undefined : readParenthesized(trimmed, open);
  }

  if (list === undefined) {
    return undefined;
  }

  return splitParameters(list).map((part) => {
    const parameter = part.trim().replace(/^\.\.\./, '');
    return IDENTIFIER.exec(parameter)?.[0];
  });
}

function parentOf(type: ServiceType): ServiceType | undefined {
  const parent: unknown = Object.getPrototypeOf(type);
  return isServiceType(parent) && parent !== Function.prototype ? parent : undefined;
}

function declaredType(candidate: ServiceType | undefined): ServiceType | undefined {
  return candidate === undefined || UNINJECTABLE_TYPES.has(candidate) ? undefined : candidate;
}

const cache = new WeakMap<ServiceType, ConstructorDescriptor>();

/**
 * Describe the constructor of `type`.
 *
 * @remarks
 * A class that declares no constructor of its own inherits its parent's
 * parameter list, as `new` does at run time. Compiler metadata on the class
 * itself also counts as an own constructor; parameters whose names cannot be
 * read are named `param<index>`.
 */
export function describeConstructor(type: ServiceType): ConstructorDescriptor {
  const cached = cache.get(type);
  if (cached) {
    return cached;
  }

  const names = parseParameterNames(Function.prototype.toString.call(type));
  const ownDesignTypes = getDesignParameterTypes(type);
  const explicitTypes = getExplicitParameterTypes(type);
  const ownsConstructor =
    names !== undefined || ownDesignTypes !== undefined || explicitTypes.length > 0;
  const parent = parentOf(type);

  let descriptor: ConstructorDescriptor;

  if (!ownsConstructor && parent !== undefined) {
    descriptor = { type, parameters: describeConstructor(parent).parameters };
  } else {
    const designTypes = ownDesignTypes ?? [];
    const count = Math.max(names?.length ?? 0, designTypes.length, explicitTypes.length);

    const parameters: ParameterDescriptor[] = [];
    for (let index = 0; index < count; index++) {
      parameters.push({
        index,
        name: names?.[index] ?? `param${index}`,
        type: explicitTypes[index] ?? declaredType(designTypes[index]),
      });
    }
    descriptor = { type, parameters };
  }

  cache.set(type, descriptor);
  return descriptor;
}
