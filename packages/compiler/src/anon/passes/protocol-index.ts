import ts from "typescript";

import type { MemberDecl, ProtocolDecl, ProtocolExtension, RequirementDecl, TypeRef } from "../ir.js";
import { namedType, voidType } from "../ir.js";
import { CompileError, type CompileIssue } from "../diagnostics.js";
import { lowerFunctionBody, lowerParams, lowerTypedParams, type ExprLoweringDeps } from "../lowering/expr-lowering.js";
import { markerOf, type MarkerBindings } from "../lowering/markers.js";
import { isThisParam, lowerTypeNode, receiverFromThisParam, tryLowerTypeNode, unwrapThrows } from "../lowering/type-lowering.js";
import { frozenList } from "./contracts.js";

const PROTOCOL_SYNTAX_CODE = "VSL1001";
const EXTENSION_SYNTAX_CODE = "VSL1002";

export type ProtocolIndex = {
  readonly interfacesByName: ReadonlyMap<string, readonly ts.InterfaceDeclaration[]>;
  readonly extensionCalls: readonly ts.CallExpression[];
};

type ProtocolIndexPassDeps = ExprLoweringDeps & {
  readonly markersFor: (sf: ts.SourceFile) => MarkerBindings;
};

export function createProtocolIndexPass(
  userSourceFiles: readonly ts.SourceFile[],
  deps: ProtocolIndexPassDeps
): ProtocolIndex {
  const interfacesByName = new Map<string, ts.InterfaceDeclaration[]>();
  const extensionCalls: ts.CallExpression[] = [];
  for (const sf of userSourceFiles) {
    const markers = deps.markersFor(sf);
    for (const st of sf.statements) {
      if (ts.isInterfaceDeclaration(st)) {
        const existing = interfacesByName.get(st.name.text) ?? [];
        existing.push(st);
        interfacesByName.set(st.name.text, existing);
        continue;
      }
      if (ts.isExpressionStatement(st) && ts.isCallExpression(st.expression)) {
        if (markerOf(markers, st.expression.expression) === "extend") extensionCalls.push(st.expression);
      }
    }
  }
  return Object.freeze({
    interfacesByName: new Map(interfacesByName),
    extensionCalls: frozenList(extensionCalls),
  });
}

function memberName(owner: string, name: ts.PropertyName, deps: ExprLoweringDeps, code: string): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  deps.failAt(name, code, `${owner}: members must have plain names.`);
}

function requiredType(node: ts.Node, typeNode: ts.TypeNode | undefined, owner: string, deps: ExprLoweringDeps): TypeRef {
  if (!typeNode) deps.failAt(node, PROTOCOL_SYNTAX_CODE, `${owner}: a type annotation is required.`);
  return lowerTypeNode(typeNode, PROTOCOL_SYNTAX_CODE, deps);
}

function parseRequirement(decl: ts.InterfaceDeclaration, member: ts.TypeElement, deps: ExprLoweringDeps): RequirementDecl {
  const protocol = decl.name.text;
  const span = deps.spanFromNode(member);
  if (member.questionToken) {
    deps.failAt(member, PROTOCOL_SYNTAX_CODE, `Protocol '${protocol}': optional requirements are not supported.`);
  }

  if (ts.isMethodSignature(member)) {
    const name = memberName(`Protocol '${protocol}'`, member.name, deps, PROTOCOL_SYNTAX_CODE);
    const owner = `Protocol '${protocol}' method '${name}'`;
    if (member.typeParameters) deps.failAt(member, PROTOCOL_SYNTAX_CODE, `${owner}: generic requirements are not supported.`);
    const [first] = member.parameters;
    const receiver = receiverFromThisParam(first);
    if (isThisParam(first) && !receiver) {
      deps.failAt(member, PROTOCOL_SYNTAX_CODE, `${owner}: the receiver must be ref<this>, mutref<this> or meta<this>.`);
    }
    if (!member.type) deps.failAt(member, PROTOCOL_SYNTAX_CODE, `${owner}: a return type annotation is required.`);
    const { result, throws } = unwrapThrows(member.type);
    return {
      kind: receiver === "meta" ? "static-method" : "method",
      name,
      signature: {
        params: lowerTypedParams(member.parameters, owner, PROTOCOL_SYNTAX_CODE, deps),
        result: lowerTypeNode(result, PROTOCOL_SYNTAX_CODE, deps),
        mutating: receiver === "mutref",
        throws,
      },
      span,
    };
  }

  if (ts.isPropertySignature(member)) {
    const name = memberName(`Protocol '${protocol}'`, member.name, deps, PROTOCOL_SYNTAX_CODE);
    const readonly = member.modifiers?.some((m) => m.kind === ts.SyntaxKind.ReadonlyKeyword) ?? false;
    return {
      kind: readonly ? "readonly-property" : "mutable-property",
      name,
      signature: {
        params: [],
        result: requiredType(member, member.type, `Protocol '${protocol}' property '${name}'`, deps),
        mutating: false,
        throws: false,
      },
      span,
    };
  }

  if (ts.isIndexSignatureDeclaration(member)) {
    const readonly = member.modifiers?.some((m) => m.kind === ts.SyntaxKind.ReadonlyKeyword) ?? false;
    const owner = `Protocol '${protocol}' subscript`;
    return {
      kind: readonly ? "readonly-subscript" : "mutable-subscript",
      name: "subscript",
      signature: {
        params: lowerTypedParams(member.parameters, owner, PROTOCOL_SYNTAX_CODE, deps),
        result: requiredType(member, member.type, owner, deps),
        mutating: false,
        throws: false,
      },
      span,
    };
  }

  deps.failAt(
    member,
    PROTOCOL_SYNTAX_CODE,
    `Protocol '${protocol}': only methods, properties and index signatures can be requirements.`
  );
}

function parseProtocol(decl: ts.InterfaceDeclaration, deps: ExprLoweringDeps): ProtocolDecl {
  const name = decl.name.text;
  if (decl.typeParameters) {
    deps.failAt(decl, PROTOCOL_SYNTAX_CODE, `Protocol '${name}': generic protocols are not supported.`);
  }
  const inherits: string[] = [];
  for (const clause of decl.heritageClauses ?? []) {
    for (const ref of clause.types) {
      if (!ts.isIdentifier(ref.expression) || ref.typeArguments) {
        deps.failAt(ref, PROTOCOL_SYNTAX_CODE, `Protocol '${name}' may only extend other protocols by name.`);
      }
      inherits.push(ref.expression.text);
    }
  }
  return {
    name,
    inherits,
    requirements: decl.members.map((m) => parseRequirement(decl, m, deps)),
    span: deps.spanFromNode(decl),
  };
}

export type ParsedProtocols = {
  readonly protocols: readonly ProtocolDecl[];
  /** Protocols whose declaration failed to parse, with the first issue each one raised. */
  readonly broken: ReadonlyMap<string, CompileIssue>;
};

/**
 * Parses the interfaces reachable from `roots` through `extends`. Interfaces
 * nothing refers to are ordinary host types and are left alone. A declaration
 * that fails to parse marks only its own protocol as broken.
 */
export function parseProtocolsPass(
  index: ProtocolIndex,
  roots: Iterable<string>,
  deps: ExprLoweringDeps
): ParsedProtocols {
  const out: ProtocolDecl[] = [];
  const broken = new Map<string, CompileIssue>();
  const seen = new Set<string>();
  const queue = [...roots];
  for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
    if (seen.has(name)) continue;
    seen.add(name);
    const [decl, duplicate] = index.interfacesByName.get(name) ?? [];
    if (!decl) continue;
    if (duplicate) {
      const issue = new CompileError(
        PROTOCOL_SYNTAX_CODE,
        `Protocol '${name}' is declared more than once.`,
        deps.spanFromNode(duplicate)
      ).toIssue();
      broken.set(name, issue);
      continue;
    }
    try {
      const protocol = parseProtocol(decl, deps);
      out.push(protocol);
      queue.push(...protocol.inherits);
    } catch (error) {
      if (!(error instanceof CompileError)) throw error;
      broken.set(name, error.toIssue());
    }
  }
  return Object.freeze({ protocols: frozenList(out), broken });
}

/** The issue of the first broken protocol `names` reach through `extends`, if any. */
export function brokenProtocolIssue(parsed: ParsedProtocols, names: readonly string[]): CompileIssue | undefined {
  const byName = new Map(parsed.protocols.map((p) => [p.name, p] as const));
  const seen = new Set<string>();
  const queue = [...names];
  for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
    if (seen.has(name)) continue;
    seen.add(name);
    const issue = parsed.broken.get(name);
    if (issue) return issue;
    queue.push(...(byName.get(name)?.inherits ?? []));
  }
  return undefined;
}

type PropertyMember = Extract<MemberDecl, { kind: "property" }>;

function extensionMember(protocol: string, prop: ts.ObjectLiteralElementLike, deps: ExprLoweringDeps): MemberDecl {
  const owner = `Extension of '${protocol}'`;
  if (ts.isMethodDeclaration(prop)) {
    const receiver = receiverFromThisParam(prop.parameters[0]);
    const ret = prop.type ? unwrapThrows(prop.type) : undefined;
    return {
      kind: "method",
      name: memberName(owner, prop.name, deps, EXTENSION_SYNTAX_CODE),
      isStatic: receiver === "meta",
      mutating: receiver === "mutref",
      throws: ret?.throws ?? false,
      params: lowerParams(prop.parameters, deps).map((p) => ({ ...p, type: p.type ?? namedType("unknown") })),
      ret: ret ? tryLowerTypeNode(ret.result) ?? namedType("unknown") : voidType(),
      body: lowerFunctionBody(prop, deps),
      span: deps.spanFromNode(prop),
    };
  }
  if (ts.isGetAccessorDeclaration(prop)) {
    return {
      kind: "property",
      name: memberName(owner, prop.name, deps, EXTENSION_SYNTAX_CODE),
      type: (prop.type && tryLowerTypeNode(prop.type)) ?? namedType("unknown"),
      getter: lowerFunctionBody(prop, deps),
      span: deps.spanFromNode(prop),
    };
  }
  if (ts.isSetAccessorDeclaration(prop)) {
    const [value] = lowerParams(prop.parameters, deps);
    return {
      kind: "property",
      name: memberName(owner, prop.name, deps, EXTENSION_SYNTAX_CODE),
      type: value?.type ?? namedType("unknown"),
      getter: [],
      setter: { valueName: value?.name ?? "newValue", body: lowerFunctionBody(prop, deps) },
      span: deps.spanFromNode(prop),
    };
  }
  deps.failAt(prop, EXTENSION_SYNTAX_CODE, `${owner}: only methods and accessors can supply defaults.`);
}

// A get/set pair written as two accessors is one property.
function mergeAccessors(first: PropertyMember, second: PropertyMember): PropertyMember {
  const fromGetter = first.getter.length > 0 ? first : second;
  const setter = first.setter ?? second.setter;
  const merged = { ...first, type: fromGetter.type, getter: fromGetter.getter };
  return setter ? { ...merged, setter } : merged;
}

function parseExtension(call: ts.CallExpression, deps: ExprLoweringDeps): ProtocolExtension {
  const [protocolNode] = call.typeArguments ?? [];
  if (
    !protocolNode ||
    !ts.isTypeReferenceNode(protocolNode) ||
    !ts.isIdentifier(protocolNode.typeName) ||
    protocolNode.typeArguments
  ) {
    deps.failAt(call, EXTENSION_SYNTAX_CODE, "extend<P>(...) needs the protocol name as its type argument.");
  }
  const protocol = protocolNode.typeName.text;
  const [body, ...extra] = call.arguments;
  if (!body || extra.length > 0 || !ts.isObjectLiteralExpression(body)) {
    deps.failAt(call, EXTENSION_SYNTAX_CODE, `Extension of '${protocol}' takes a single object literal of members.`);
  }

  const members: MemberDecl[] = [];
  const propertyIndex = new Map<string, number>();
  for (const prop of body.properties) {
    const member = extensionMember(protocol, prop, deps);
    if (member.kind === "property") {
      const at = propertyIndex.get(member.name);
      const existing = at === undefined ? undefined : members[at];
      if (at !== undefined && existing?.kind === "property") {
        members[at] = mergeAccessors(existing, member);
        continue;
      }
      propertyIndex.set(member.name, members.length);
    }
    members.push(member);
  }
  return { protocol, members, span: deps.spanFromNode(call) };
}

export function parseExtensionsPass(index: ProtocolIndex, deps: ExprLoweringDeps): readonly ProtocolExtension[] {
  return frozenList(index.extensionCalls.map((call) => parseExtension(call, deps)));
}
