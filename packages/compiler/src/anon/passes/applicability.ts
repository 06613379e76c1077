import type { RejectionReason } from "../diagnostics.js";
import { typeRefEq } from "../lowering/common.js";
import { SINGLE_RESIDUAL_PATHS, witnessStrategy } from "../lowering/rules.js";
import type {
  CaptureDescriptor,
  ClosureLiteralContext,
  Coverage,
  CoveredRequirement,
  LoweringPath,
  Requirement,
  Resolution,
} from "./contracts.js";

function captureCovers(req: Requirement, captures: readonly CaptureDescriptor[]): boolean {
  if (witnessStrategy(req.kind, "capture") !== "bind-capture") return false;
  return captures.some(
    (c) =>
      c.name === req.name &&
      typeRefEq(c.declaredType, req.signature.result) &&
      (req.kind !== "mutable-property" || c.mutability === "mutable")
  );
}

function coverageOf(req: Requirement, captures: readonly CaptureDescriptor[]): Coverage {
  if (captureCovers(req, captures)) return "capture";
  if (req.hasDefaultImplementation) return "default";
  if (req.isCompilerSynthesizable) return "synthesized";
  return "uncovered";
}

export function classifyCoverage(ctx: ClosureLiteralContext): readonly CoveredRequirement[] {
  return ctx.requirements.requirements.map((requirement) => {
    const coverage = coverageOf(requirement, ctx.captures);
    return { requirement, coverage, strategy: witnessStrategy(requirement.kind, coverage) };
  });
}

function label(req: Requirement): string {
  return `'${req.protocol}.${req.name}'`;
}

/**
 * Decides whether a literal lowers, and through which path. Total over its
 * inputs: every combination ends in exactly one accept or reject, and an
 * ambiguous shape is rejected rather than guessed.
 */
export function resolveApplicability(ctx: ClosureLiteralContext): Resolution {
  const span = ctx.literal.span;
  const coverage = classifyCoverage(ctx);
  const residual = coverage.filter((c) => c.coverage === "uncovered");

  const reject = (reason: RejectionReason, message: string): Resolution => ({
    kind: "reject",
    rejection: { reason, message, span },
  });
  const accept = (path: LoweringPath, fulfilled?: CoveredRequirement): Resolution => ({
    kind: "accept",
    path,
    fulfilled,
    coverage,
    residual,
  });
  const residualNames = (): string => residual.map((c) => label(c.requirement)).join(", ");

  const checkStatementBody = (target: CoveredRequirement): Resolution | undefined => {
    if (ctx.bodyKind === "none") {
      return reject(
        "ambiguous-literal-shape",
        `The literal has no body but ${label(target.requirement)} needs one. Supply a body or a default implementation.`
      );
    }
    if (ctx.bodyKind !== "statement") {
      return reject(
        "body-shape-mismatch",
        `${label(target.requirement)} is fulfilled by a statement body, not a ${ctx.bodyKind} body.`
      );
    }
    return undefined;
  };

  const checkArity = (target: CoveredRequirement): Resolution | undefined => {
    const expected = target.requirement.signature.params.length;
    if (ctx.params.length === expected) return undefined;
    return reject(
      "parameter-arity-mismatch",
      `${label(target.requirement)} takes ${expected} parameter(s) but the literal declares ${ctx.params.length}.`
    );
  };

  if (ctx.expectation === "metatype") {
    const only = residual[0];
    if (residual.length !== 1 || !only || only.requirement.kind !== "static-method") {
      return reject(
        "not-single-requirement",
        `A type-producing literal must fulfil exactly one static requirement; uncovered: ${residualNames() || "none"}.`
      );
    }
    if (ctx.hasCaptureList) {
      return reject("capture-list-on-metatype-path", "A type-producing literal cannot have a capture list.");
    }
    const captured = ctx.captures[0];
    if (captured) {
      return reject(
        "metatype-capture",
        `A type-producing literal cannot capture '${captured.name}' from its enclosing scope.`
      );
    }
    return checkStatementBody(only) ?? checkArity(only) ?? accept("metatype", only);
  }

  if (residual.length === 0) {
    if (ctx.bodyKind !== "none") {
      return reject(
        "ambiguous-literal-shape",
        `Every requirement of ${ctx.requirements.protocols.join(" & ")} is already covered; the ${ctx.bodyKind} body has nothing to fulfil.`
      );
    }
    return accept("bodyless");
  }

  if (residual.length === 1) {
    const only = residual[0];
    if (!only) return reject("not-single-requirement", "No requirement left to fulfil.");
    const path = SINGLE_RESIDUAL_PATHS[only.strategy];
    switch (path) {
      case "single-requirement":
        return checkStatementBody(only) ?? checkArity(only) ?? accept(path, only);
      case "accessor":
        if (ctx.bodyKind === "none") {
          return reject(
            "ambiguous-literal-shape",
            `The literal has no body but ${label(only.requirement)} needs get and set accessors.`
          );
        }
        if (ctx.bodyKind !== "accessor" || !hasSetter(ctx)) {
          return reject(
            "body-shape-mismatch",
            `${label(only.requirement)} is mutable and needs an accessor body with both get and set.`
          );
        }
        return checkArity(only) ?? accept(path, only);
      default:
        return reject(
          "not-single-requirement",
          `${label(only.requirement)} cannot be fulfilled by a value-producing literal.`
        );
    }
  }

  if (ctx.bodyKind === "multi-declaration") return accept("multi-declaration");
  return reject(
    "not-single-requirement",
    `${ctx.requirements.protocols.join(" & ")} leaves ${residual.length} requirements uncovered (${residualNames()}); use a declaration body to fulfil them.`
  );
}

function hasSetter(ctx: ClosureLiteralContext): boolean {
  const body = ctx.literal.body;
  return body.kind === "accessor" && body.setter !== undefined;
}
