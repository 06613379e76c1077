import type { Expr, TypeRef } from "../ir.js";
import { namedType } from "../ir.js";
import { typeRefEq } from "./common.js";

export type OuterBinding = {
  readonly type: TypeRef;
};

/**
 * What the capture collector may ask about the code around a literal.
 * `lookup` answers only for names bound outside the literal that a value
 * copy can be taken from; globals are not bindings.
 */
export type EnclosingScope = {
  readonly lookup: (name: string) => OuterBinding | undefined;
  readonly selfType?: TypeRef;
  readonly typeOf: (expr: Expr) => TypeRef | undefined;
};

const booleanType = namedType("boolean");
const numberType = namedType("number");
const stringType = namedType("string");

export type LexicalScopeOptions = {
  readonly bindings: Iterable<readonly [string, TypeRef]>;
  readonly selfType?: TypeRef;
};

/** Scope over a fixed table of bindings, typing simple expressions structurally. */
export function createLexicalScope(opts: LexicalScopeOptions): EnclosingScope {
  const bindings = new Map<string, OuterBinding>();
  for (const [name, type] of opts.bindings) bindings.set(name, { type });
  const selfType = opts.selfType;

  const typeOf = (expr: Expr): TypeRef | undefined => {
    switch (expr.kind) {
      case "number":
        return numberType;
      case "string":
        return stringType;
      case "bool":
        return booleanType;
      case "ident":
        return bindings.get(expr.name)?.type;
      case "self":
        return selfType;
      case "construct":
        return namedType(expr.typeName, expr.typeArgs);
      case "unary":
        return expr.op === "!" ? booleanType : numberType;
      case "binary":
        switch (expr.op) {
          case "==":
          case "!=":
          case "<":
          case "<=":
          case ">":
          case ">=":
          case "&&":
          case "||":
            return booleanType;
          case "+": {
            const left = typeOf(expr.left);
            const right = typeOf(expr.right);
            if ((left && typeRefEq(left, stringType)) || (right && typeRefEq(right, stringType))) return stringType;
            return left && right ? numberType : undefined;
          }
          default:
            return numberType;
        }
      default:
        return undefined;
    }
  };

  return Object.freeze({
    lookup: (name: string) => bindings.get(name),
    selfType,
    typeOf,
  });
}
