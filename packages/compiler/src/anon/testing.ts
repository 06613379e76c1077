import type {
  CaptureItem,
  ClosureLiteral,
  Expr,
  LiteralBody,
  MemberDecl,
  Param,
  ProtocolDecl,
  RequirementDecl,
  RequirementKind,
  Stmt,
  TypedParam,
  TypeRef,
} from "./ir.js";
import { identExpr, namedType, voidType } from "./ir.js";
import { DEFAULT_DERIVABLE_PROTOCOLS } from "./lowering/builtin-protocols.js";
import type { CaptureDescriptor, ClosureLiteralContext } from "./passes/contracts.js";
import { analyzeRequirements, derivableProtocolRules, type ProtocolTable } from "./passes/requirements.js";

// Small IR builders shared by the pass tests.

export const t = {
  bool: namedType("boolean"),
  num: namedType("number"),
  str: namedType("string"),
  void: voidType(),
  named: (name: string, args: readonly TypeRef[] = []): TypeRef => namedType(name, args),
  self: { kind: "self" } as const satisfies TypeRef,
};

export const e = {
  id: (name: string): Expr => identExpr(name),
  self: (): Expr => ({ kind: "self" }),
  selfType: (): Expr => ({ kind: "self_type" }),
  num: (text: string): Expr => ({ kind: "number", text }),
  str: (value: string): Expr => ({ kind: "string", value }),
  bool: (value: boolean): Expr => ({ kind: "bool", value }),
  eq: (left: Expr, right: Expr): Expr => ({ kind: "binary", op: "==", left, right }),
  add: (left: Expr, right: Expr): Expr => ({ kind: "binary", op: "+", left, right }),
  member: (object: Expr, name: string): Expr => ({ kind: "member", object, name }),
  index: (object: Expr, index: Expr): Expr => ({ kind: "index", object, index }),
  call: (callee: Expr, ...args: Expr[]): Expr => ({ kind: "call", callee, args }),
  record: (): Expr => ({ kind: "record", entries: [] }),
};

export const s = {
  ret: (expr?: Expr): Stmt => (expr ? { kind: "return", expr } : { kind: "return" }),
  expr: (expr: Expr): Stmt => ({ kind: "expr", expr }),
  assign: (target: Expr, value: Expr): Stmt => ({ kind: "assign", op: "=", target, value }),
  let: (name: string, init: Expr): Stmt => ({ kind: "let", name, mutable: false, init }),
};

export function req(
  kind: RequirementKind,
  name: string,
  opts: {
    readonly params?: readonly TypedParam[];
    readonly result?: TypeRef;
    readonly mutating?: boolean;
    readonly throws?: boolean;
  } = {}
): RequirementDecl {
  return {
    kind,
    name,
    signature: {
      params: opts.params ?? [],
      result: opts.result ?? voidType(),
      mutating: opts.mutating ?? false,
      throws: opts.throws ?? false,
    },
  };
}

export function param(name: string, type: TypeRef): TypedParam {
  return { name, type };
}

export function protocol(
  name: string,
  requirements: readonly RequirementDecl[],
  inherits: readonly string[] = []
): ProtocolDecl {
  return { name, inherits, requirements };
}

export function method(
  name: string,
  body: readonly Stmt[],
  opts: {
    readonly params?: readonly TypedParam[];
    readonly ret?: TypeRef;
    readonly isStatic?: boolean;
    readonly mutating?: boolean;
  } = {}
): MemberDecl {
  return {
    kind: "method",
    name,
    isStatic: opts.isStatic ?? false,
    mutating: opts.mutating ?? false,
    throws: false,
    params: opts.params ?? [],
    ret: opts.ret ?? voidType(),
    body,
  };
}

export function capture(
  name: string,
  opts: {
    readonly init?: Expr;
    readonly type?: TypeRef;
    readonly inferredType?: TypeRef;
    readonly mutable?: boolean;
    readonly byReference?: boolean;
    readonly attributes?: readonly string[];
  } = {}
): CaptureItem {
  return {
    name,
    init: opts.init,
    type: opts.type,
    inferredType: opts.inferredType,
    mutable: opts.mutable ?? false,
    byReference: opts.byReference ?? false,
    attributes: opts.attributes ?? [],
  };
}

let nextLiteral = 0;

export function literal(
  body: LiteralBody,
  opts: { readonly id?: string; readonly params?: readonly Param[]; readonly captureList?: readonly CaptureItem[] } = {}
): ClosureLiteral {
  nextLiteral++;
  return {
    id: opts.id ?? `test.ts:${nextLiteral}`,
    captureList: opts.captureList,
    params: opts.params ?? [],
    body,
  };
}

export function statementBody(...stmts: Stmt[]): LiteralBody {
  return { kind: "statement", stmts };
}

export function descriptor(name: string, type: TypeRef, mutable = false): CaptureDescriptor {
  return {
    name,
    declaredType: type,
    mutability: mutable ? "mutable" : "immutable",
    initializerExpression: identExpr(name),
    attributes: [],
    sourceKind: "explicit-in-capture-list",
  };
}

export function contextFor(
  table: ProtocolTable,
  protocols: readonly string[],
  lit: ClosureLiteral,
  opts: { readonly captures?: readonly CaptureDescriptor[]; readonly metatype?: boolean } = {}
): ClosureLiteralContext {
  return {
    literal: lit,
    captures: opts.captures ?? [],
    params: lit.params,
    bodyKind: lit.body.kind,
    hasCaptureList: lit.captureList !== undefined,
    expectation: opts.metatype ? "metatype" : "value",
    conformances: protocols,
    requirements: analyzeRequirements(table, protocols, derivableProtocolRules(DEFAULT_DERIVABLE_PROTOCOLS)),
  };
}
