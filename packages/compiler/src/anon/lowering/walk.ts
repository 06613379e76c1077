import type { Expr, Stmt } from "../ir.js";

export type IdentExpr = Extract<Expr, { kind: "ident" }>;
export type AssignStmt = Extract<Stmt, { kind: "assign" }>;

/**
 * Block-structured set of names bound inside a body: parameters at the
 * outermost frame, `let` bindings in the frame of the block declaring them.
 */
export class LocalScope {
  readonly #frames: Set<string>[];

  constructor(initial: Iterable<string> = []) {
    this.#frames = [new Set(initial)];
  }

  has(name: string): boolean {
    return this.#frames.some((frame) => frame.has(name));
  }

  declare(name: string): void {
    this.#frames[this.#frames.length - 1]?.add(name);
  }

  within<T>(fn: () => T): T {
    this.#frames.push(new Set());
    try {
      return fn();
    } finally {
      this.#frames.pop();
    }
  }
}

export type BodyVisitor = {
  readonly ident?: (expr: IdentExpr, scope: LocalScope) => void;
  readonly self?: (expr: Expr) => void;
  readonly selfType?: (expr: Expr) => void;
  readonly assign?: (stmt: AssignStmt, root: string | undefined, scope: LocalScope) => void;
};

export function assignmentRoot(target: Expr): string | undefined {
  switch (target.kind) {
    case "ident":
      return target.name;
    case "member":
      return assignmentRoot(target.object);
    case "index":
      return assignmentRoot(target.object);
    default:
      return undefined;
  }
}

function visitExpr(expr: Expr, scope: LocalScope, visitor: BodyVisitor): void {
  switch (expr.kind) {
    case "ident":
      visitor.ident?.(expr, scope);
      return;
    case "self":
      visitor.self?.(expr);
      return;
    case "self_type":
      visitor.selfType?.(expr);
      return;
    case "type_ref":
    case "number":
    case "string":
    case "bool":
      return;
    case "unary":
      visitExpr(expr.operand, scope, visitor);
      return;
    case "binary":
      visitExpr(expr.left, scope, visitor);
      visitExpr(expr.right, scope, visitor);
      return;
    case "member":
      visitExpr(expr.object, scope, visitor);
      return;
    case "index":
      visitExpr(expr.object, scope, visitor);
      visitExpr(expr.index, scope, visitor);
      return;
    case "call":
      visitExpr(expr.callee, scope, visitor);
      for (const arg of expr.args) visitExpr(arg, scope, visitor);
      return;
    case "construct":
      for (const arg of expr.args) visitExpr(arg, scope, visitor);
      return;
    case "array":
      for (const el of expr.elements) visitExpr(el, scope, visitor);
      return;
    case "record":
      for (const entry of expr.entries) visitExpr(entry.value, scope, visitor);
      return;
    case "closure":
      // Nested literals are lowered as their own units.
      return;
  }
}

function visitStmts(stmts: readonly Stmt[], scope: LocalScope, visitor: BodyVisitor): void {
  for (const st of stmts) visitStmt(st, scope, visitor);
}

function visitStmt(st: Stmt, scope: LocalScope, visitor: BodyVisitor): void {
  switch (st.kind) {
    case "let":
      visitExpr(st.init, scope, visitor);
      scope.declare(st.name);
      return;
    case "assign":
      visitor.assign?.(st, assignmentRoot(st.target), scope);
      visitExpr(st.target, scope, visitor);
      visitExpr(st.value, scope, visitor);
      return;
    case "expr":
      visitExpr(st.expr, scope, visitor);
      return;
    case "return":
      if (st.expr) visitExpr(st.expr, scope, visitor);
      return;
    case "if":
      visitExpr(st.cond, scope, visitor);
      scope.within(() => visitStmts(st.then, scope, visitor));
      if (st.else) {
        const elseBody = st.else;
        scope.within(() => visitStmts(elseBody, scope, visitor));
      }
      return;
    case "while":
      visitExpr(st.cond, scope, visitor);
      scope.within(() => visitStmts(st.body, scope, visitor));
      return;
    case "throw":
      visitExpr(st.expr, scope, visitor);
      return;
  }
}

export function walkBody(stmts: readonly Stmt[], params: Iterable<string>, visitor: BodyVisitor): void {
  visitStmts(stmts, new LocalScope(params), visitor);
}

export function walkExpr(expr: Expr, visitor: BodyVisitor): void {
  visitExpr(expr, new LocalScope(), visitor);
}

/**
 * Pre-order rewrite. `fn` returns a replacement for a node (children of the
 * replacement are not revisited) or `undefined` to descend.
 */
export type ExprRewriter = (expr: Expr, scope: LocalScope) => Expr | undefined;

function mapExpr(expr: Expr, scope: LocalScope, fn: ExprRewriter): Expr {
  const replaced = fn(expr, scope);
  if (replaced) return replaced;
  switch (expr.kind) {
    case "ident":
    case "self":
    case "self_type":
    case "type_ref":
    case "number":
    case "string":
    case "bool":
    case "closure":
      return expr;
    case "unary":
      return { ...expr, operand: mapExpr(expr.operand, scope, fn) };
    case "binary":
      return { ...expr, left: mapExpr(expr.left, scope, fn), right: mapExpr(expr.right, scope, fn) };
    case "member":
      return { ...expr, object: mapExpr(expr.object, scope, fn) };
    case "index":
      return { ...expr, object: mapExpr(expr.object, scope, fn), index: mapExpr(expr.index, scope, fn) };
    case "call":
      return { ...expr, callee: mapExpr(expr.callee, scope, fn), args: expr.args.map((a) => mapExpr(a, scope, fn)) };
    case "construct":
      return { ...expr, args: expr.args.map((a) => mapExpr(a, scope, fn)) };
    case "array":
      return { ...expr, elements: expr.elements.map((el) => mapExpr(el, scope, fn)) };
    case "record":
      return {
        ...expr,
        entries: expr.entries.map((entry) => ({ key: entry.key, value: mapExpr(entry.value, scope, fn) })),
      };
  }
}

function mapStmts(stmts: readonly Stmt[], scope: LocalScope, fn: ExprRewriter): readonly Stmt[] {
  return stmts.map((st) => mapStmt(st, scope, fn));
}

function mapStmt(st: Stmt, scope: LocalScope, fn: ExprRewriter): Stmt {
  switch (st.kind) {
    case "let": {
      const init = mapExpr(st.init, scope, fn);
      scope.declare(st.name);
      return { ...st, init };
    }
    case "assign":
      return { ...st, target: mapExpr(st.target, scope, fn), value: mapExpr(st.value, scope, fn) };
    case "expr":
      return { ...st, expr: mapExpr(st.expr, scope, fn) };
    case "return":
      return st.expr ? { ...st, expr: mapExpr(st.expr, scope, fn) } : st;
    case "if": {
      const cond = mapExpr(st.cond, scope, fn);
      const then = scope.within(() => mapStmts(st.then, scope, fn));
      const elseBody = st.else;
      if (!elseBody) return { ...st, cond, then };
      return { ...st, cond, then, else: scope.within(() => mapStmts(elseBody, scope, fn)) };
    }
    case "while": {
      const cond = mapExpr(st.cond, scope, fn);
      return { ...st, cond, body: scope.within(() => mapStmts(st.body, scope, fn)) };
    }
    case "throw":
      return { ...st, expr: mapExpr(st.expr, scope, fn) };
  }
}

export function rewriteBody(stmts: readonly Stmt[], params: Iterable<string>, fn: ExprRewriter): readonly Stmt[] {
  return mapStmts(stmts, new LocalScope(params), fn);
}

export function rewriteExpr(expr: Expr, fn: ExprRewriter): Expr {
  return mapExpr(expr, new LocalScope(), fn);
}
