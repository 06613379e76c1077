import type { ClosureLiteral, ExpectedTypeContext, Expr, ProtocolDecl, ProtocolExtension } from "./ir.js";
import { expectedProtocols } from "./ir.js";
import { CompileError, failWith, type CompileIssue } from "./diagnostics.js";
import { DEFAULT_DERIVABLE_PROTOCOLS } from "./lowering/builtin-protocols.js";
import { DEFAULT_ANON_PREFIX } from "./lowering/common.js";
import type { EnclosingScope } from "./lowering/scope.js";
import { resolveApplicability } from "./passes/applicability.js";
import { collectCaptures } from "./passes/captures.js";
import type {
  Acceptance,
  CaptureDescriptor,
  ClosureLiteralContext,
  SelfBinding,
  SynthesizedStructType,
} from "./passes/contracts.js";
import { emitInstantiation } from "./passes/instantiation.js";
import {
  createProtocolTable,
  derivableProtocolRules,
  missingProtocols,
  RequirementCache,
  requirementSetFor,
  type ProtocolTable,
  type SynthesisRules,
} from "./passes/requirements.js";
import { bindSelf } from "./passes/self-binding.js";
import { DeclarationRegistry, registerStruct, synthesizeStruct } from "./passes/synthesis.js";

export type LoweringSessionOptions = {
  readonly protocols: readonly ProtocolDecl[];
  readonly extensions?: readonly ProtocolExtension[];
  readonly namePrefix?: string;
  readonly derivableProtocols?: readonly string[];
  readonly synthesis?: SynthesisRules;
};

export type LiteralInput = {
  readonly literal: ClosureLiteral;
  readonly expected: ExpectedTypeContext;
  readonly scope: EnclosingScope;
};

export type LoweredLiteral = {
  readonly literalId: string;
  readonly struct: SynthesizedStructType;
  readonly captures: readonly CaptureDescriptor[];
  readonly resolution: Acceptance;
  readonly binding: SelfBinding;
  readonly replacement: Expr;
};

export type LiteralOutcome =
  | { readonly kind: "lowered"; readonly literalId: string; readonly value: LoweredLiteral }
  | { readonly kind: "rejected"; readonly literalId: string; readonly issue: CompileIssue };

/** Everything shared by the literals of one compilation unit. */
export type LoweringSession = {
  readonly table: ProtocolTable;
  readonly cache: RequirementCache;
  readonly rules: SynthesisRules;
  readonly registry: DeclarationRegistry;
};

export function createLoweringSession(opts: LoweringSessionOptions): LoweringSession {
  return Object.freeze({
    table: createProtocolTable(opts.protocols, opts.extensions ?? []),
    cache: new RequirementCache(),
    rules: opts.synthesis ?? derivableProtocolRules(opts.derivableProtocols ?? DEFAULT_DERIVABLE_PROTOCOLS),
    registry: new DeclarationRegistry(opts.namePrefix ?? DEFAULT_ANON_PREFIX),
  });
}

function lowerOrThrow(session: LoweringSession, input: LiteralInput): LoweredLiteral {
  const { literal, expected, scope } = input;
  const protocols = expectedProtocols(expected);
  const missing = missingProtocols(session.table, protocols);
  if (missing.length > 0) {
    failWith("unknown-protocol", `Unknown protocol(s): ${missing.join(", ")}.`, literal.span);
  }
  const requirements = requirementSetFor(session.table, session.cache, protocols, session.rules);
  const captures = collectCaptures(literal, scope);
  const ctx: ClosureLiteralContext = {
    literal,
    captures,
    params: literal.params,
    bodyKind: literal.body.kind,
    hasCaptureList: literal.captureList !== undefined,
    expectation: expected.kind === "metatype" ? "metatype" : "value",
    conformances: protocols,
    requirements,
  };

  const resolution = resolveApplicability(ctx);
  if (resolution.kind === "reject") {
    const { reason, message, span } = resolution.rejection;
    failWith(reason, message, span ?? literal.span);
  }

  const shape = synthesizeStruct(ctx, resolution);
  const bound = bindSelf(shape, { enclosingType: scope.selfType });
  const struct = registerStruct(session.registry, bound.shape);
  return {
    literalId: literal.id,
    struct,
    captures,
    resolution,
    binding: bound.binding,
    replacement: emitInstantiation(struct, captures),
  };
}

/**
 * Lowers one literal. Static failures come back as a rejected outcome; any
 * other exception is a compiler bug and propagates.
 */
export function lowerClosureLiteral(session: LoweringSession, input: LiteralInput): LiteralOutcome {
  try {
    return { kind: "lowered", literalId: input.literal.id, value: lowerOrThrow(session, input) };
  } catch (error) {
    if (error instanceof CompileError) {
      return { kind: "rejected", literalId: input.literal.id, issue: error.toIssue() };
    }
    throw error;
  }
}

export function lowerClosureLiterals(
  session: LoweringSession,
  inputs: readonly LiteralInput[]
): readonly LiteralOutcome[] {
  return inputs.map((input) => lowerClosureLiteral(session, input));
}
