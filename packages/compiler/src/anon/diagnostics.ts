import type { Span } from "./ir.js";

export const COMPILER_DIAGNOSTIC_CODES = Object.freeze([
  "VSL0001",
  "VSL0002",
  "VSL1001",
  "VSL1002",
  "VSL1101",
  "VSL1102",
  "VSL1103",
  "VSL1104",
  "VSL2001",
  "VSL2002",
  "VSL2003",
  "VSL2004",
  "VSL2005",
  "VSL2006",
  "VSL3001",
  "VSL3002",
  "VSL3003",
  "VSL3004",
  "VSL4001",
  "VSL4002",
  "VSL4003",
  "VSL5001",
  "VSL5002",
] as const);

export type CompilerDiagnosticCode = (typeof COMPILER_DIAGNOSTIC_CODES)[number];

export type CompilerDiagnosticDomain =
  | "host-and-syntax"
  | "protocols-and-applicability"
  | "captures"
  | "mutation"
  | "shape"
  | "other";

export type RejectionReason =
  | "not-single-requirement"
  | "ambiguous-literal-shape"
  | "body-shape-mismatch"
  | "parameter-arity-mismatch"
  | "unfulfilled-requirement"
  | "unknown-protocol"
  | "by-reference-capture-attempted"
  | "capture-name-collision"
  | "capture-type-unknown"
  | "unresolved-self"
  | "mutating-via-body-disallowed"
  | "stored-property-in-multi-declaration-body"
  | "immutable-capture-assignment"
  | "capture-list-on-metatype-path"
  | "metatype-capture";

export const REJECTION_CODES = Object.freeze({
  "not-single-requirement": "VSL2001",
  "ambiguous-literal-shape": "VSL2002",
  "body-shape-mismatch": "VSL2003",
  "parameter-arity-mismatch": "VSL2004",
  "unfulfilled-requirement": "VSL2005",
  "unknown-protocol": "VSL2006",
  "by-reference-capture-attempted": "VSL3001",
  "capture-name-collision": "VSL3002",
  "capture-type-unknown": "VSL3003",
  "unresolved-self": "VSL3004",
  "mutating-via-body-disallowed": "VSL4001",
  "stored-property-in-multi-declaration-body": "VSL4002",
  "immutable-capture-assignment": "VSL4003",
  "capture-list-on-metatype-path": "VSL5001",
  "metatype-capture": "VSL5002",
} satisfies Record<RejectionReason, CompilerDiagnosticCode>);

const knownCodes = new Set<string>(COMPILER_DIAGNOSTIC_CODES);

export function isCompilerDiagnosticCode(code: string): code is CompilerDiagnosticCode {
  return knownCodes.has(code);
}

export function assertCompilerDiagnosticCode(code: string): asserts code is CompilerDiagnosticCode {
  if (!isCompilerDiagnosticCode(code)) {
    throw new Error(`Unknown compiler diagnostic code '${code}'. Register it in COMPILER_DIAGNOSTIC_CODES.`);
  }
}

export function compilerDiagnosticDomain(code: string): CompilerDiagnosticDomain {
  if (!isCompilerDiagnosticCode(code)) return "other";
  switch (code[3]) {
    case "0":
    case "1":
      return "host-and-syntax";
    case "2":
      return "protocols-and-applicability";
    case "3":
      return "captures";
    case "4":
      return "mutation";
    case "5":
      return "shape";
    default:
      return "other";
  }
}

export type CompileIssue = {
  readonly code: string;
  readonly message: string;
  readonly span?: Span;
};

export class CompileError extends Error {
  readonly code: CompilerDiagnosticCode;
  readonly span?: Span;

  constructor(code: string, message: string, span?: Span) {
    assertCompilerDiagnosticCode(code);
    super(message);
    this.code = code;
    this.span = span;
    this.name = "CompileError";
  }

  toIssue(): CompileIssue {
    return { code: this.code, message: this.message, span: this.span };
  }
}

export function fail(code: string, message: string, span?: Span): never {
  throw new CompileError(code, message, span);
}

export function failWith(reason: RejectionReason, message: string, span?: Span): never {
  throw new CompileError(REJECTION_CODES[reason], message, span);
}
