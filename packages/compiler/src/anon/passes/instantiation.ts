import type { Expr, Stmt } from "../ir.js";
import { identExpr } from "../ir.js";
import { rewriteBody, rewriteExpr } from "../lowering/walk.js";
import type { CaptureDescriptor, SynthesizedStructType } from "./contracts.js";

/**
 * The expression that stands where the literal was: a reference to the
 * type on the metatype path, otherwise a construction passing each
 * capture's initial value in field order.
 */
export function emitInstantiation(decl: SynthesizedStructType, captures: readonly CaptureDescriptor[]): Expr {
  if (decl.path === "metatype") return { kind: "type_ref", name: decl.name, span: decl.span };
  const initializers = new Map(captures.map((c) => [c.name, c.initializerExpression] as const));
  const args = decl.fields.map((field) => initializers.get(field.name) ?? identExpr(field.name));
  return { kind: "construct", typeName: decl.name, typeArgs: [], args, span: decl.span };
}

function replacer(literalId: string, replacement: Expr, onHit: () => void) {
  return (expr: Expr): Expr | undefined => {
    if (expr.kind !== "closure" || expr.literal.id !== literalId) return undefined;
    onHit();
    return replacement;
  };
}

export function replaceClosureLiteral(
  expr: Expr,
  literalId: string,
  replacement: Expr
): { readonly expr: Expr; readonly replaced: number } {
  let replaced = 0;
  const out = rewriteExpr(expr, replacer(literalId, replacement, () => replaced++));
  return { expr: out, replaced };
}

export function replaceClosureLiteralInBody(
  stmts: readonly Stmt[],
  literalId: string,
  replacement: Expr
): { readonly stmts: readonly Stmt[]; readonly replaced: number } {
  let replaced = 0;
  const out = rewriteBody(stmts, [], replacer(literalId, replacement, () => replaced++));
  return { stmts: out, replaced };
}
