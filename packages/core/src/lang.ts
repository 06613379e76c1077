// @vessel/core/lang.js
// Marker functions only. The compiler replaces every call before the program runs.

import type { CaptureList } from "./types.js";

function marker(name: string): never {
  throw new Error(`@vessel/core: '${name}' is a compile-time marker (not callable at runtime).`);
}

/**
 * A closure literal conforming to `P`. The body is an arrow or function
 * expression, an object of `get`/`set` accessors, or a class expression.
 */
export function anon<P>(body: object): P;
export function anon<P>(captures: CaptureList, body: object): P;
export function anon<P>(_first: object, _second?: object): P {
  return marker("anon");
}

// Capture by copy into a mutable field.
export function mutable<T>(_value: T): T {
  return marker("mutable");
}

// Shared-storage capture; always rejected.
export function byRef<T>(_value: T): T {
  return marker("byRef");
}

// Attach an attribute to the field a capture becomes.
export function tagged<T>(_attribute: string, _value: T): T {
  return marker("tagged");
}

// Default implementations for a protocol's requirements.
export function extend<P>(members: Partial<P> & ThisType<P>): void {
  void members;
  marker("extend");
}
