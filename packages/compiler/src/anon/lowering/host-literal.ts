import ts from "typescript";

import type {
  Accessor,
  CaptureItem,
  ClosureLiteral,
  ExpectedTypeContext,
  LiteralBody,
  MemberDecl,
  Param,
  TypeRef,
} from "../ir.js";
import { voidType } from "../ir.js";
import {
  BODY_SYNTAX_CODE,
  lowerExpr,
  lowerFunctionBody,
  lowerParams,
  lowerTypedParams,
  type ExprLoweringDeps,
} from "./expr-lowering.js";
import { markerOf, type MarkerBindings } from "./markers.js";
import { lowerTypeNode, receiverFromThisParam, typeRefFromChecker, unwrapThrows } from "./type-lowering.js";

const CAPTURE_SYNTAX_CODE = "VSL1102";
const MISSING_EXPECTED_CODE = "VSL1103";
const LITERAL_FORM_CODE = "VSL1104";

export type HostLiteralDeps = ExprLoweringDeps & {
  readonly checker: ts.TypeChecker;
  readonly markers: MarkerBindings;
};

type ParsedBody = {
  readonly body: LiteralBody;
  readonly params: readonly Param[];
};

function propertyName(name: ts.PropertyName, code: string, deps: ExprLoweringDeps): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  deps.failAt(name, code, "Only plain names are supported here.");
}

function hasModifier(node: ts.HasModifiers, kind: ts.SyntaxKind): boolean {
  return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

function parseCaptureValue(
  name: string,
  value: ts.Expression,
  deps: HostLiteralDeps
): Omit<CaptureItem, "name" | "span"> {
  let expr = value;
  let type: TypeRef | undefined;
  let mutable = false;
  let byReference = false;
  const attributes: string[] = [];

  for (;;) {
    if (ts.isParenthesizedExpression(expr)) {
      expr = expr.expression;
      continue;
    }
    if (ts.isAsExpression(expr)) {
      type ??= lowerTypeNode(expr.type, CAPTURE_SYNTAX_CODE, deps);
      expr = expr.expression;
      continue;
    }
    if (!ts.isCallExpression(expr)) break;
    const marker = markerOf(deps.markers, expr.expression);
    if (marker === "mutable" || marker === "byRef") {
      const [inner, ...extra] = expr.arguments;
      if (!inner || extra.length > 0) {
        deps.failAt(expr, CAPTURE_SYNTAX_CODE, `Capture '${name}': ${marker}(...) takes exactly one value.`);
      }
      const [typeArg] = expr.typeArguments ?? [];
      if (typeArg) type ??= lowerTypeNode(typeArg, CAPTURE_SYNTAX_CODE, deps);
      if (marker === "mutable") mutable = true;
      else byReference = true;
      expr = inner;
      continue;
    }
    if (marker === "tagged") {
      const [attr, inner, ...extra] = expr.arguments;
      if (!attr || !inner || extra.length > 0 || !ts.isStringLiteral(attr)) {
        deps.failAt(expr, CAPTURE_SYNTAX_CODE, `Capture '${name}': tagged("Attribute", value) takes an attribute name and a value.`);
      }
      attributes.push(attr.text);
      expr = inner;
      continue;
    }
    break;
  }

  const inferredType = typeRefFromChecker(deps.checker, deps.checker.getTypeAtLocation(expr));
  return { init: lowerExpr(expr, deps), type, inferredType, mutable, byReference, attributes };
}

export function parseCaptureList(list: ts.ObjectLiteralExpression, deps: HostLiteralDeps): readonly CaptureItem[] {
  return list.properties.map((prop): CaptureItem => {
    const span = deps.spanFromNode(prop);
    if (ts.isShorthandPropertyAssignment(prop)) {
      const value = deps.checker.getShorthandAssignmentValueSymbol(prop);
      const inferredType = value
        ? typeRefFromChecker(deps.checker, deps.checker.getTypeOfSymbolAtLocation(value, prop))
        : undefined;
      return { name: prop.name.text, inferredType, mutable: false, byReference: false, attributes: [], span };
    }
    if (ts.isPropertyAssignment(prop)) {
      const name = propertyName(prop.name, CAPTURE_SYNTAX_CODE, deps);
      return { name, ...parseCaptureValue(name, prop.initializer, deps), span };
    }
    deps.failAt(prop, CAPTURE_SYNTAX_CODE, "Capture lists take `name` or `name: value` entries only.");
  });
}

function parseAccessorBody(obj: ts.ObjectLiteralExpression, deps: HostLiteralDeps): ParsedBody {
  let getter: ts.MethodDeclaration | undefined;
  let setter: ts.MethodDeclaration | undefined;
  for (const prop of obj.properties) {
    const name = ts.isMethodDeclaration(prop) ? propertyName(prop.name, BODY_SYNTAX_CODE, deps) : undefined;
    if (ts.isMethodDeclaration(prop) && name === "get" && !getter) getter = prop;
    else if (ts.isMethodDeclaration(prop) && name === "set" && !setter) setter = prop;
    else deps.failAt(prop, BODY_SYNTAX_CODE, "An accessor body has one get(...) method and at most one set(...) method.");
  }
  if (!getter) deps.failAt(obj, BODY_SYNTAX_CODE, "An accessor body needs a get(...) method.");

  const params = lowerParams(getter.parameters, deps);
  const getterBody = lowerFunctionBody(getter, deps);
  if (!setter) return { body: { kind: "accessor", getter: getterBody }, params };

  const setterParams = lowerParams(setter.parameters, deps);
  const value = setterParams.at(-1);
  if (!value || setterParams.length !== params.length + 1) {
    deps.failAt(setter, BODY_SYNTAX_CODE, "set(...) takes the getter's keys followed by the new value.");
  }
  const accessor: Accessor = { valueName: value.name, body: lowerFunctionBody(setter, deps), span: deps.spanFromNode(setter) };
  return { body: { kind: "accessor", getter: getterBody, setter: accessor }, params };
}

type PropertyMember = Extract<MemberDecl, { kind: "property" }>;

function classMember(member: ts.ClassElement, deps: HostLiteralDeps): MemberDecl {
  const span = deps.spanFromNode(member);
  if (ts.isMethodDeclaration(member)) {
    const name = propertyName(member.name, BODY_SYNTAX_CODE, deps);
    const receiver = receiverFromThisParam(member.parameters[0]);
    const ret = member.type ? unwrapThrows(member.type) : undefined;
    return {
      kind: "method",
      name,
      isStatic: hasModifier(member, ts.SyntaxKind.StaticKeyword),
      mutating: receiver === "mutref",
      throws: ret?.throws ?? false,
      params: lowerTypedParams(member.parameters, `Member '${name}'`, BODY_SYNTAX_CODE, deps),
      ret: ret ? lowerTypeNode(ret.result, BODY_SYNTAX_CODE, deps) : voidType(),
      body: lowerFunctionBody(member, deps),
      span,
    };
  }
  if (ts.isGetAccessorDeclaration(member)) {
    const name = propertyName(member.name, BODY_SYNTAX_CODE, deps);
    if (!member.type) deps.failAt(member, BODY_SYNTAX_CODE, `Getter '${name}' needs a return type annotation.`);
    return {
      kind: "property",
      name,
      type: lowerTypeNode(member.type, BODY_SYNTAX_CODE, deps),
      getter: lowerFunctionBody(member, deps),
      span,
    };
  }
  if (ts.isSetAccessorDeclaration(member)) {
    const name = propertyName(member.name, BODY_SYNTAX_CODE, deps);
    const [value] = lowerTypedParams(member.parameters, `Setter '${name}'`, BODY_SYNTAX_CODE, deps);
    if (!value) deps.failAt(member, BODY_SYNTAX_CODE, `Setter '${name}' needs a value parameter.`);
    return {
      kind: "property",
      name,
      type: value.type,
      getter: [],
      setter: { valueName: value.name, body: lowerFunctionBody(member, deps), span },
      span,
    };
  }
  if (ts.isPropertyDeclaration(member)) {
    const name = propertyName(member.name, BODY_SYNTAX_CODE, deps);
    const stored = { kind: "stored" as const, name, mutable: !hasModifier(member, ts.SyntaxKind.ReadonlyKeyword), span };
    const type = member.type ? lowerTypeNode(member.type, BODY_SYNTAX_CODE, deps) : undefined;
    const init = member.initializer ? lowerExpr(member.initializer, deps) : undefined;
    return { ...stored, ...(type ? { type } : {}), ...(init ? { init } : {}) };
  }
  deps.failAt(member, BODY_SYNTAX_CODE, "Declaration bodies take methods, accessors and properties only.");
}

function parseDeclarationBody(cls: ts.ClassExpression, deps: HostLiteralDeps): ParsedBody {
  if (cls.heritageClauses || cls.typeParameters) {
    deps.failAt(cls, BODY_SYNTAX_CODE, "A declaration body cannot extend, implement or take type parameters.");
  }
  const members: MemberDecl[] = [];
  const propertyAt = new Map<string, number>();
  for (const element of cls.members) {
    const member = classMember(element, deps);
    if (member.kind === "property") {
      const at = propertyAt.get(member.name);
      const existing = at === undefined ? undefined : members[at];
      if (at !== undefined && existing?.kind === "property") {
        members[at] = pairAccessors(existing, member);
        continue;
      }
      propertyAt.set(member.name, members.length);
    }
    members.push(member);
  }
  for (const member of members) {
    if (member.kind === "property" && member.getter.length === 0) {
      deps.failAt(cls, BODY_SYNTAX_CODE, `Property '${member.name}' has a setter but no getter.`);
    }
  }
  return { body: { kind: "multi-declaration", members }, params: [] };
}

function pairAccessors(first: PropertyMember, second: PropertyMember): PropertyMember {
  const fromGetter = first.getter.length > 0 ? first : second;
  const setter = first.setter ?? second.setter;
  const merged = { ...first, type: fromGetter.type, getter: fromGetter.getter };
  return setter ? { ...merged, setter } : merged;
}

function parseBody(node: ts.Expression, deps: HostLiteralDeps): ParsedBody {
  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
    if (node.typeParameters || node.asteriskToken || hasModifier(node, ts.SyntaxKind.AsyncKeyword)) {
      deps.failAt(node, BODY_SYNTAX_CODE, "Literal bodies cannot be generic, async or generators.");
    }
    return {
      body: { kind: "statement", stmts: lowerFunctionBody(node, deps) },
      params: lowerParams(node.parameters, deps),
    };
  }
  if (ts.isObjectLiteralExpression(node)) return parseAccessorBody(node, deps);
  if (ts.isClassExpression(node)) return parseDeclarationBody(node, deps);
  deps.failAt(node, LITERAL_FORM_CODE, "A literal body is a function, a get/set object or a class expression.");
}

function isAccessorObject(node: ts.ObjectLiteralExpression): boolean {
  return node.properties.some((p) => ts.isMethodDeclaration(p));
}

/** Reads `anon(body)`, `anon(captures)` and `anon(captures, body)`. */
export function parseClosureLiteral(call: ts.CallExpression, literalId: string, deps: HostLiteralDeps): ClosureLiteral {
  const span = deps.spanFromNode(call);
  const args = call.arguments;
  const [first, second, ...extra] = args;
  if (!first || extra.length > 0) {
    deps.failAt(call, LITERAL_FORM_CODE, "anon(...) takes a body, a capture list, or a capture list and a body.");
  }

  if (!second) {
    if (ts.isObjectLiteralExpression(first) && !isAccessorObject(first)) {
      return { id: literalId, captureList: parseCaptureList(first, deps), params: [], body: { kind: "none" }, span };
    }
    const parsed = parseBody(first, deps);
    return { id: literalId, params: parsed.params, body: parsed.body, span };
  }

  if (!ts.isObjectLiteralExpression(first) || isAccessorObject(first)) {
    deps.failAt(first, LITERAL_FORM_CODE, "The first of two arguments to anon(...) must be a capture list.");
  }
  const captureList = parseCaptureList(first, deps);
  const parsed = parseBody(second, deps);
  return { id: literalId, captureList, params: parsed.params, body: parsed.body, span };
}

function typeParametersInScope(node: ts.Node): Map<string, ts.TypeParameterDeclaration> {
  const out = new Map<string, ts.TypeParameterDeclaration>();
  for (let cur: ts.Node | undefined = node; cur; cur = cur.parent) {
    if (ts.isFunctionLike(cur) || ts.isClassLike(cur) || ts.isInterfaceDeclaration(cur) || ts.isTypeAliasDeclaration(cur)) {
      for (const tp of cur.typeParameters ?? []) {
        if (!out.has(tp.name.text)) out.set(tp.name.text, tp);
      }
    }
  }
  return out;
}

function protocolNames(typeNode: ts.TypeNode, deps: ExprLoweringDeps): readonly string[] {
  if (ts.isParenthesizedTypeNode(typeNode)) return protocolNames(typeNode.type, deps);
  if (ts.isIntersectionTypeNode(typeNode)) return typeNode.types.flatMap((t) => protocolNames(t, deps));
  if (ts.isTypeReferenceNode(typeNode) && ts.isIdentifier(typeNode.typeName) && !typeNode.typeArguments) {
    return [typeNode.typeName.text];
  }
  deps.failAt(typeNode, MISSING_EXPECTED_CODE, `Expected type '${typeNode.getText()}' is not a protocol or a composition of protocols.`);
}

export function expectedContextFromTypeNode(
  typeNode: ts.TypeNode,
  typeParams: ReadonlyMap<string, ts.TypeParameterDeclaration>,
  deps: ExprLoweringDeps
): ExpectedTypeContext {
  if (ts.isParenthesizedTypeNode(typeNode)) return expectedContextFromTypeNode(typeNode.type, typeParams, deps);
  if (ts.isTypeReferenceNode(typeNode) && ts.isIdentifier(typeNode.typeName)) {
    const name = typeNode.typeName.text;
    const [inner, ...extra] = typeNode.typeArguments ?? [];
    if (name === "meta" && inner && extra.length === 0) return { kind: "metatype", protocols: protocolNames(inner, deps) };
    const param = typeParams.get(name);
    if (param) {
      if (!param.constraint) {
        deps.failAt(typeNode, MISSING_EXPECTED_CODE, `Type parameter '${name}' has no protocol bound to conform to.`);
      }
      return { kind: "generic", parameter: name, bounds: protocolNames(param.constraint, deps) };
    }
  }
  return { kind: "existential", protocols: protocolNames(typeNode, deps) };
}

function calleeDeclaration(checker: ts.TypeChecker, callee: ts.Expression): ts.SignatureDeclaration | undefined {
  const target = ts.isPropertyAccessExpression(callee) ? callee.name : callee;
  const sym0 = checker.getSymbolAtLocation(target);
  const sym = sym0 && (sym0.flags & ts.SymbolFlags.Alias) !== 0 ? checker.getAliasedSymbol(sym0) : sym0;
  for (const decl of sym?.declarations ?? []) {
    if (ts.isFunctionLike(decl)) return decl;
    if (ts.isVariableDeclaration(decl) && decl.initializer && ts.isFunctionLike(decl.initializer)) return decl.initializer;
  }
  return undefined;
}

function enclosingFunction(node: ts.Node): ts.SignatureDeclaration | undefined {
  for (let cur = node.parent; cur; cur = cur.parent) {
    if (ts.isFunctionLike(cur)) return cur;
  }
  return undefined;
}

function mergedTypeParams(
  decl: ts.SignatureDeclaration,
  outer: ReadonlyMap<string, ts.TypeParameterDeclaration>
): ReadonlyMap<string, ts.TypeParameterDeclaration> {
  const out = new Map(outer);
  for (const [name, tp] of typeParametersInScope(decl)) out.set(name, tp);
  return out;
}

/**
 * Works out the protocol context a literal must conform to: an explicit type
 * argument, the annotated variable or field it initializes, the parameter it
 * is passed to, or the return type of the function it is returned from.
 */
export function expectedTypeFor(call: ts.CallExpression, deps: HostLiteralDeps): ExpectedTypeContext {
  const inScope = typeParametersInScope(call);
  const [explicit] = call.typeArguments ?? [];
  if (explicit) return expectedContextFromTypeNode(explicit, inScope, deps);

  let node: ts.Node = call;
  while (
    ts.isParenthesizedExpression(node.parent) ||
    ts.isAsExpression(node.parent) ||
    ts.isSatisfiesExpression(node.parent)
  ) {
    node = node.parent;
  }
  const parent = node.parent;

  if ((ts.isVariableDeclaration(parent) || ts.isPropertyDeclaration(parent)) && parent.initializer === node && parent.type) {
    return expectedContextFromTypeNode(parent.type, inScope, deps);
  }
  if ((ts.isCallExpression(parent) || ts.isNewExpression(parent)) && parent.expression !== node) {
    const index = (parent.arguments ?? []).findIndex((arg) => arg === node);
    const decl = calleeDeclaration(deps.checker, parent.expression);
    const params = decl?.parameters.filter((p) => !(ts.isIdentifier(p.name) && p.name.text === "this")) ?? [];
    const typeNode = params[index]?.type;
    if (decl && typeNode) return expectedContextFromTypeNode(typeNode, mergedTypeParams(decl, inScope), deps);
  }
  if (ts.isReturnStatement(parent)) {
    const fn = enclosingFunction(parent);
    if (fn?.type) return expectedContextFromTypeNode(fn.type, inScope, deps);
  }
  if (ts.isArrowFunction(parent) && parent.body === node && parent.type) {
    return expectedContextFromTypeNode(parent.type, inScope, deps);
  }

  deps.failAt(
    call,
    MISSING_EXPECTED_CODE,
    "Cannot tell which protocol this literal conforms to. Annotate its target or pass the protocol explicitly: anon<P>(...)."
  );
}
