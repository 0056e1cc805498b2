/**
 * Runtime type hierarchy helpers.
 *
 * A value's type is identified by its prototype object, so `class Reply extends Message`
 * gives the ancestry `Reply.prototype → Message.prototype → Object.prototype`.
 * Primitives are boxed first, so `'idle'` walks `String.prototype → Object.prototype`.
 */

/**
 * A class (or any constructor) whose instances share `prototype`.
 */
export type TypeRef<T> = abstract new (...args: never[]) => T;

/**
 * Yields the prototypes of `value` from the most specific to `Object.prototype`.
 * Absent values have no ancestry.
 */
export function* ancestry(value: unknown): Generator<object> {
  if (value === undefined || value === null) {
    return;
  }
  let proto: object | null = Object.getPrototypeOf(Object(value));
  while (proto !== null) {
    yield proto;
    proto = Object.getPrototypeOf(proto);
  }
}

/**
 * Walks the ancestry of `value` and returns the first non-undefined result of `lookup`.
 */
export function searchInHierarchy<T>(value: unknown, lookup: (proto: object) => T | undefined): T | undefined {
  for (const proto of ancestry(value)) {
    const found = lookup(proto);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

export function prototypeOf<T>(type: TypeRef<T>): object {
  return type.prototype;
}

export function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export function typeName(value: unknown): string {
  if (isAbsent(value)) {
    return String(value);
  }
  const proto: object | null = Object.getPrototypeOf(Object(value));
  if (proto === null) {
    return 'null-prototype object';
  }
  const ctor: unknown = Reflect.get(proto, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'anonymous';
}

export function describeState(state: unknown): string {
  if (typeof state === 'string') {
    return `"${state}"`;
  }
  if (typeof state === 'object' && state !== null) {
    return typeName(state);
  }
  return String(state);
}
