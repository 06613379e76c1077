export type { CompileIssue, CompilerDiagnosticCode, CompilerDiagnosticDomain, RejectionReason } from "./anon/diagnostics.js";
export {
  COMPILER_DIAGNOSTIC_CODES,
  CompileError,
  compilerDiagnosticDomain,
  isCompilerDiagnosticCode,
  REJECTION_CODES,
} from "./anon/diagnostics.js";
export type { HostIssue, LiteralReport, LowerHostOptions, LowerHostOutput } from "./anon/host.js";
export { LOWERED_PROGRAM_HEADER, lowerHostProgram } from "./anon/host.js";
export type {
  CaptureItem,
  ClosureLiteral,
  ExpectedTypeContext,
  Expr,
  LiteralBody,
  MemberDecl,
  ProtocolDecl,
  ProtocolExtension,
  RequirementDecl,
  Span,
  Stmt,
  TypeRef,
} from "./anon/ir.js";
export type {
  LiteralInput,
  LiteralOutcome,
  LoweredLiteral,
  LoweringSession,
  LoweringSessionOptions,
} from "./anon/lower.js";
export { createLoweringSession, lowerClosureLiteral, lowerClosureLiterals } from "./anon/lower.js";
export { DEFAULT_DERIVABLE_PROTOCOLS } from "./anon/lowering/builtin-protocols.js";
export { DEFAULT_ANON_PREFIX, isValidNamePrefix } from "./anon/lowering/common.js";
export { createLexicalScope, type EnclosingScope } from "./anon/lowering/scope.js";
export type {
  CaptureDescriptor,
  LoweringPath,
  Resolution,
  SelfBinding,
  SynthesizedStructType,
} from "./anon/passes/contracts.js";
export { writeExpr, writeLoweredProgram, writeStmts, writeStruct } from "./anon/write.js";
