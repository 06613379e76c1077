import ts from "typescript";

import type { AssignOp, BinaryOp, Expr, Param, Span, Stmt, TypedParam } from "../ir.js";
import { isThisParam, lowerTypeNode } from "./type-lowering.js";

export const BODY_SYNTAX_CODE = "VSL1101";

export type ExprLoweringDeps = {
  readonly failAt: (node: ts.Node, code: string, message: string) => never;
  readonly spanFromNode: (node: ts.Node) => Span;
  readonly isLiteralMarker: (call: ts.CallExpression) => boolean;
};

export type FunctionBodyLike =
  | ts.ArrowFunction
  | ts.FunctionExpression
  | ts.MethodDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

const binaryOps = new Map<ts.SyntaxKind, BinaryOp>([
  [ts.SyntaxKind.PlusToken, "+"],
  [ts.SyntaxKind.MinusToken, "-"],
  [ts.SyntaxKind.AsteriskToken, "*"],
  [ts.SyntaxKind.SlashToken, "/"],
  [ts.SyntaxKind.PercentToken, "%"],
  [ts.SyntaxKind.EqualsEqualsEqualsToken, "=="],
  [ts.SyntaxKind.EqualsEqualsToken, "=="],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, "!="],
  [ts.SyntaxKind.ExclamationEqualsToken, "!="],
  [ts.SyntaxKind.LessThanToken, "<"],
  [ts.SyntaxKind.LessThanEqualsToken, "<="],
  [ts.SyntaxKind.GreaterThanToken, ">"],
  [ts.SyntaxKind.GreaterThanEqualsToken, ">="],
  [ts.SyntaxKind.AmpersandAmpersandToken, "&&"],
  [ts.SyntaxKind.BarBarToken, "||"],
]);

const assignOps = new Map<ts.SyntaxKind, AssignOp>([
  [ts.SyntaxKind.EqualsToken, "="],
  [ts.SyntaxKind.PlusEqualsToken, "+="],
  [ts.SyntaxKind.MinusEqualsToken, "-="],
  [ts.SyntaxKind.AsteriskEqualsToken, "*="],
  [ts.SyntaxKind.SlashEqualsToken, "/="],
  [ts.SyntaxKind.PercentEqualsToken, "%="],
]);

function propertyKey(name: ts.PropertyName, deps: ExprLoweringDeps): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  deps.failAt(name, BODY_SYNTAX_CODE, "Computed keys are not supported in a literal body.");
}

export function lowerExpr(expr: ts.Expression, deps: ExprLoweringDeps): Expr {
  const span = deps.spanFromNode(expr);

  if (ts.isParenthesizedExpression(expr)) return lowerExpr(expr.expression, deps);
  if (ts.isAsExpression(expr) || ts.isSatisfiesExpression(expr) || ts.isNonNullExpression(expr)) {
    return lowerExpr(expr.expression, deps);
  }
  if (ts.isPropertyAccessChain(expr) || ts.isElementAccessChain(expr) || ts.isCallChain(expr)) {
    deps.failAt(expr, BODY_SYNTAX_CODE, "Optional chaining (`?.`) is not supported in a literal body.");
  }

  if (expr.kind === ts.SyntaxKind.ThisKeyword) return { kind: "self", span };
  if (ts.isIdentifier(expr)) {
    return expr.text === "Self" ? { kind: "self_type", span } : { kind: "ident", name: expr.text, span };
  }
  if (ts.isNumericLiteral(expr)) return { kind: "number", text: expr.text, span };
  if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) return { kind: "string", value: expr.text, span };
  if (expr.kind === ts.SyntaxKind.TrueKeyword) return { kind: "bool", value: true, span };
  if (expr.kind === ts.SyntaxKind.FalseKeyword) return { kind: "bool", value: false, span };

  if (ts.isPrefixUnaryExpression(expr)) {
    const operand = lowerExpr(expr.operand, deps);
    switch (expr.operator) {
      case ts.SyntaxKind.ExclamationToken:
        return { kind: "unary", op: "!", operand, span };
      case ts.SyntaxKind.MinusToken:
        return { kind: "unary", op: "-", operand, span };
      case ts.SyntaxKind.PlusToken:
        return { kind: "unary", op: "+", operand, span };
      default:
        deps.failAt(expr, BODY_SYNTAX_CODE, "Increment and decrement are only supported as statements.");
    }
  }
  if (ts.isPostfixUnaryExpression(expr)) {
    deps.failAt(expr, BODY_SYNTAX_CODE, "Increment and decrement are only supported as statements.");
  }

  if (ts.isBinaryExpression(expr)) {
    const kind = expr.operatorToken.kind;
    if (assignOps.has(kind)) {
      deps.failAt(expr, BODY_SYNTAX_CODE, "Assignments are only supported as statements.");
    }
    const op = binaryOps.get(kind);
    if (!op) {
      deps.failAt(expr.operatorToken, BODY_SYNTAX_CODE, `Unsupported operator '${expr.operatorToken.getText()}'.`);
    }
    return { kind: "binary", op, left: lowerExpr(expr.left, deps), right: lowerExpr(expr.right, deps), span };
  }

  if (ts.isPropertyAccessExpression(expr)) {
    return { kind: "member", object: lowerExpr(expr.expression, deps), name: expr.name.text, span };
  }
  if (ts.isElementAccessExpression(expr)) {
    return { kind: "index", object: lowerExpr(expr.expression, deps), index: lowerExpr(expr.argumentExpression, deps), span };
  }

  if (ts.isCallExpression(expr)) {
    if (deps.isLiteralMarker(expr)) {
      deps.failAt(expr, BODY_SYNTAX_CODE, "Closure literals cannot be nested inside another literal body.");
    }
    return { kind: "call", callee: lowerExpr(expr.expression, deps), args: lowerArgs(expr.arguments, deps), span };
  }
  if (ts.isNewExpression(expr)) {
    if (!ts.isIdentifier(expr.expression)) {
      deps.failAt(expr.expression, BODY_SYNTAX_CODE, "`new` is only supported on a named type.");
    }
    const typeArgs = (expr.typeArguments ?? []).map((arg) => lowerTypeNode(arg, BODY_SYNTAX_CODE, deps));
    return { kind: "construct", typeName: expr.expression.text, typeArgs, args: lowerArgs(expr.arguments ?? [], deps), span };
  }

  if (ts.isArrayLiteralExpression(expr)) {
    return { kind: "array", elements: lowerArgs(expr.elements, deps), span };
  }
  if (ts.isObjectLiteralExpression(expr)) {
    const entries = expr.properties.map((prop) => {
      if (ts.isShorthandPropertyAssignment(prop)) {
        return { key: prop.name.text, value: lowerExpr(prop.name, deps) };
      }
      if (ts.isPropertyAssignment(prop)) {
        return { key: propertyKey(prop.name, deps), value: lowerExpr(prop.initializer, deps) };
      }
      deps.failAt(prop, BODY_SYNTAX_CODE, "Only plain properties are supported in object literals inside a literal body.");
    });
    return { kind: "record", entries, span };
  }

  deps.failAt(expr, BODY_SYNTAX_CODE, `Unsupported expression in a literal body: ${ts.SyntaxKind[expr.kind]}.`);
}

function lowerArgs(args: readonly ts.Expression[], deps: ExprLoweringDeps): Expr[] {
  return args.map((arg) => {
    if (ts.isSpreadElement(arg)) deps.failAt(arg, BODY_SYNTAX_CODE, "Spread arguments are not supported in a literal body.");
    return lowerExpr(arg, deps);
  });
}

function blockOf(st: ts.Statement): readonly ts.Statement[] {
  return ts.isBlock(st) ? st.statements : [st];
}

function lowerExprStmt(st: ts.ExpressionStatement, deps: ExprLoweringDeps): Stmt {
  const expr = st.expression;
  const span = deps.spanFromNode(st);
  if (ts.isBinaryExpression(expr)) {
    const op = assignOps.get(expr.operatorToken.kind);
    if (op) return { kind: "assign", op, target: lowerExpr(expr.left, deps), value: lowerExpr(expr.right, deps), span };
  }
  if (ts.isPrefixUnaryExpression(expr) || ts.isPostfixUnaryExpression(expr)) {
    if (expr.operator === ts.SyntaxKind.PlusPlusToken || expr.operator === ts.SyntaxKind.MinusMinusToken) {
      return {
        kind: "assign",
        op: expr.operator === ts.SyntaxKind.PlusPlusToken ? "+=" : "-=",
        target: lowerExpr(expr.operand, deps),
        value: { kind: "number", text: "1" },
        span,
      };
    }
  }
  return { kind: "expr", expr: lowerExpr(expr, deps), span };
}

function lowerVariableStatement(st: ts.VariableStatement, deps: ExprLoweringDeps): Stmt[] {
  const list = st.declarationList;
  const isConst = (list.flags & ts.NodeFlags.Const) !== 0;
  const isLet = (list.flags & ts.NodeFlags.Let) !== 0;
  if (!isConst && !isLet) deps.failAt(st, BODY_SYNTAX_CODE, "`var` is not supported in a literal body; use const or let.");
  return list.declarations.map((decl): Stmt => {
    if (!ts.isIdentifier(decl.name)) {
      deps.failAt(decl.name, BODY_SYNTAX_CODE, "Destructuring declarations are not supported in a literal body.");
    }
    if (!decl.initializer) {
      deps.failAt(decl, BODY_SYNTAX_CODE, `Local '${decl.name.text}' must be initialized.`);
    }
    const type = decl.type ? lowerTypeNode(decl.type, BODY_SYNTAX_CODE, deps) : undefined;
    const init = lowerExpr(decl.initializer, deps);
    const span = deps.spanFromNode(decl);
    return type
      ? { kind: "let", name: decl.name.text, mutable: isLet, type, init, span }
      : { kind: "let", name: decl.name.text, mutable: isLet, init, span };
  });
}

function lowerStmt(st: ts.Statement, deps: ExprLoweringDeps): Stmt[] {
  const span = deps.spanFromNode(st);
  if (ts.isVariableStatement(st)) return lowerVariableStatement(st, deps);
  if (ts.isExpressionStatement(st)) return [lowerExprStmt(st, deps)];
  if (ts.isReturnStatement(st)) {
    return [st.expression ? { kind: "return", expr: lowerExpr(st.expression, deps), span } : { kind: "return", span }];
  }
  if (ts.isIfStatement(st)) {
    const cond = lowerExpr(st.expression, deps);
    const then = lowerStmts(blockOf(st.thenStatement), deps);
    if (!st.elseStatement) return [{ kind: "if", cond, then, span }];
    return [{ kind: "if", cond, then, else: lowerStmts(blockOf(st.elseStatement), deps), span }];
  }
  if (ts.isWhileStatement(st)) {
    return [{ kind: "while", cond: lowerExpr(st.expression, deps), body: lowerStmts(blockOf(st.statement), deps), span }];
  }
  if (ts.isThrowStatement(st)) return [{ kind: "throw", expr: lowerExpr(st.expression, deps), span }];
  if (ts.isBlock(st)) return lowerStmts(st.statements, deps);
  if (ts.isEmptyStatement(st)) return [];
  deps.failAt(st, BODY_SYNTAX_CODE, `Unsupported statement in a literal body: ${ts.SyntaxKind[st.kind]}.`);
}

export function lowerStmts(stmts: readonly ts.Statement[], deps: ExprLoweringDeps): Stmt[] {
  return stmts.flatMap((st) => lowerStmt(st, deps));
}

/** A concise arrow body becomes a single return. */
export function lowerFunctionBody(fn: FunctionBodyLike, deps: ExprLoweringDeps): Stmt[] {
  const body = fn.body;
  if (!body) deps.failAt(fn, BODY_SYNTAX_CODE, "Literal members must have a body.");
  if (ts.isBlock(body)) return lowerStmts(body.statements, deps);
  return [{ kind: "return", expr: lowerExpr(body, deps), span: deps.spanFromNode(body) }];
}

function plainParams(
  params: readonly ts.ParameterDeclaration[],
  code: string,
  deps: ExprLoweringDeps
): ts.ParameterDeclaration[] {
  const rest = isThisParam(params[0]) ? params.slice(1) : [...params];
  for (const p of rest) {
    if (!ts.isIdentifier(p.name)) {
      deps.failAt(p.name, code, "Destructuring parameters are not supported.");
    }
    if (p.dotDotDotToken || p.questionToken || p.initializer) {
      deps.failAt(p, code, "Rest, optional and defaulted parameters are not supported.");
    }
  }
  return rest;
}

function paramName(p: ts.ParameterDeclaration): string {
  return ts.isIdentifier(p.name) ? p.name.text : "";
}

export function lowerParams(params: readonly ts.ParameterDeclaration[], deps: ExprLoweringDeps): Param[] {
  return plainParams(params, BODY_SYNTAX_CODE, deps).map((p): Param => {
    const span = deps.spanFromNode(p);
    return p.type
      ? { name: paramName(p), type: lowerTypeNode(p.type, BODY_SYNTAX_CODE, deps), span }
      : { name: paramName(p), span };
  });
}

export function lowerTypedParams(
  params: readonly ts.ParameterDeclaration[],
  owner: string,
  code: string,
  deps: ExprLoweringDeps
): TypedParam[] {
  return plainParams(params, code, deps).map((p): TypedParam => {
    if (!p.type) deps.failAt(p, code, `${owner}: parameter '${paramName(p)}' needs a type annotation.`);
    return { name: paramName(p), type: lowerTypeNode(p.type, code, deps), span: deps.spanFromNode(p) };
  });
}
