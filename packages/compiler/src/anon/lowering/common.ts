import type { RequirementKind, TypeRef } from "../ir.js";

export const DEFAULT_ANON_PREFIX = "__Anon_";

const reservedIdentifiers = new Set<string>(["self", "Self"]);

export function normalizePath(p: string): string {
  return p.replaceAll("\\", "/");
}

export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isReservedIdentifier(name: string): boolean {
  return reservedIdentifiers.has(name);
}

export function escapeIdentifier(name: string): string {
  return isReservedIdentifier(name) ? `\`${name}\`` : name;
}

// Field holding the enclosing scope's `self` inside a synthesized struct.
export const OUTER_SELF_FIELD = escapeIdentifier("self");

export function isValidNamePrefix(prefix: string): boolean {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(prefix);
}

export function anonStructName(prefix: string, ordinal: number): string {
  return `${prefix}${ordinal}`;
}

export function requirementFamily(kind: RequirementKind): "method" | "property" | "subscript" {
  switch (kind) {
    case "method":
    case "static-method":
      return "method";
    case "readonly-property":
    case "mutable-property":
      return "property";
    case "readonly-subscript":
    case "mutable-subscript":
      return "subscript";
  }
}

export function requirementKey(kind: RequirementKind, name: string): string {
  const scope = kind === "static-method" ? "static" : "instance";
  return `${scope}:${requirementFamily(kind)}:${name}`;
}

export function protocolSetKey(protocols: readonly string[]): string {
  return [...new Set(protocols)].sort(compareText).join("&");
}

export function typeRefEq(a: TypeRef, b: TypeRef): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind !== "named" || b.kind !== "named") return true;
  if (a.name !== b.name || a.args.length !== b.args.length) return false;
  return a.args.every((arg, i) => {
    const other = b.args[i];
    return other !== undefined && typeRefEq(arg, other);
  });
}
