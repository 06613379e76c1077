export { anon, byRef, extend, mutable, tagged } from "./lang.js";
export type { CaptureList, Equatable, Hashable, meta, mutref, ref, Self, throws } from "./types.js";
