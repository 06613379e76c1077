// @vessel/core/types.js
// Marker types only. The compiler reads them syntactically; at run time they are their argument.

// Receiver markers for the optional `this` parameter of a requirement.
export type ref<T> = T;
export type mutref<T> = T;
export type meta<T> = T;

// Return type marker for a requirement that may throw.
export type throws<R> = R;

// The synthesized conforming type, as seen from a requirement or a literal body.
export type Self = { readonly __vessel_self: unique symbol };

// Protocols the compiler derives for any synthesized struct.
export interface Equatable {
  equals(other: Self): boolean;
}

export interface Hashable extends Equatable {
  readonly hashValue: number;
}

// Values accepted as a capture list: `{ x }`, `{ name: expr }`, `{ self: this }`.
export type CaptureList = { readonly [name: string]: unknown };
