import ts from "typescript";

import type { TypeRef } from "../ir.js";
import { namedType, voidType } from "../ir.js";

export type TypeLoweringDeps = {
  readonly failAt: (node: ts.Node, code: string, message: string) => never;
};

export type ReceiverKind = "ref" | "mutref" | "meta";

function entityNameToSegments(name: ts.EntityName): readonly string[] {
  if (ts.isIdentifier(name)) return [name.text];
  return [...entityNameToSegments(name.left), name.right.text];
}

const keywordTypes = new Map<ts.SyntaxKind, string>([
  [ts.SyntaxKind.NumberKeyword, "number"],
  [ts.SyntaxKind.StringKeyword, "string"],
  [ts.SyntaxKind.BooleanKeyword, "boolean"],
  [ts.SyntaxKind.BigIntKeyword, "bigint"],
  [ts.SyntaxKind.UnknownKeyword, "unknown"],
  [ts.SyntaxKind.AnyKeyword, "unknown"],
  [ts.SyntaxKind.NeverKeyword, "never"],
  [ts.SyntaxKind.ObjectKeyword, "object"],
]);

/** Lowers a type annotation, or returns undefined when it has no counterpart in the lowered IR. */
export function tryLowerTypeNode(typeNode: ts.TypeNode): TypeRef | undefined {
  if (typeNode.kind === ts.SyntaxKind.VoidKeyword) return voidType();
  const keyword = keywordTypes.get(typeNode.kind);
  if (keyword) return namedType(keyword);
  if (ts.isThisTypeNode(typeNode)) return { kind: "self" };
  if (ts.isParenthesizedTypeNode(typeNode)) return tryLowerTypeNode(typeNode.type);
  if (ts.isArrayTypeNode(typeNode)) {
    const element = tryLowerTypeNode(typeNode.elementType);
    return element ? namedType("Array", [element]) : undefined;
  }
  if (ts.isTypeReferenceNode(typeNode)) {
    const segments = entityNameToSegments(typeNode.typeName);
    const name = segments.join(".");
    if (name === "Self") return { kind: "self" };
    const args: TypeRef[] = [];
    for (const arg of typeNode.typeArguments ?? []) {
      const lowered = tryLowerTypeNode(arg);
      if (!lowered) return undefined;
      args.push(lowered);
    }
    return namedType(name, args);
  }
  return undefined;
}

export function lowerTypeNode(typeNode: ts.TypeNode, code: string, deps: TypeLoweringDeps): TypeRef {
  const lowered = tryLowerTypeNode(typeNode);
  if (!lowered) deps.failAt(typeNode, code, `Unsupported type annotation: ${typeNode.getText()}`);
  return lowered;
}

/** `ref<this>`, `mutref<this>` and `meta<this>` on a leading `this` parameter. */
export function receiverFromThisParam(param: ts.ParameterDeclaration | undefined): ReceiverKind | undefined {
  if (!param || !ts.isIdentifier(param.name) || param.name.text !== "this") return undefined;
  const typeNode = param.type;
  if (!typeNode || !ts.isTypeReferenceNode(typeNode) || !ts.isIdentifier(typeNode.typeName)) return undefined;
  const name = typeNode.typeName.text;
  if (name === "ref" || name === "mutref" || name === "meta") return name;
  return undefined;
}

export function isThisParam(param: ts.ParameterDeclaration | undefined): boolean {
  return param !== undefined && ts.isIdentifier(param.name) && param.name.text === "this";
}

/** Splits `throws<R>` into its result type. */
export function unwrapThrows(typeNode: ts.TypeNode): { readonly result: ts.TypeNode; readonly throws: boolean } {
  if (ts.isTypeReferenceNode(typeNode) && ts.isIdentifier(typeNode.typeName) && typeNode.typeName.text === "throws") {
    const [inner] = typeNode.typeArguments ?? [];
    if (inner) return { result: inner, throws: true };
  }
  return { result: typeNode, throws: false };
}

function isObjectType(type: ts.Type): type is ts.ObjectType {
  return (type.flags & ts.TypeFlags.Object) !== 0;
}

function isTypeReference(type: ts.Type): type is ts.TypeReference {
  return isObjectType(type) && (type.objectFlags & ts.ObjectFlags.Reference) !== 0;
}

/**
 * Reads a checker type back into the IR. Literal types widen to their
 * primitive; anything unnamed comes back as undefined.
 */
export function typeRefFromChecker(checker: ts.TypeChecker, type: ts.Type): TypeRef | undefined {
  if (type.flags & ts.TypeFlags.NumberLike) return namedType("number");
  if (type.flags & ts.TypeFlags.StringLike) return namedType("string");
  if (type.flags & ts.TypeFlags.BooleanLike) return namedType("boolean");
  if (type.flags & ts.TypeFlags.BigIntLike) return namedType("bigint");
  if (type.flags & ts.TypeFlags.VoidLike) return voidType();
  const symbol = type.aliasSymbol ?? type.getSymbol();
  if (!symbol) return undefined;
  const typeArgs = type.aliasSymbol ? type.aliasTypeArguments ?? [] : isTypeReference(type) ? checker.getTypeArguments(type) : [];
  const args: TypeRef[] = [];
  for (const arg of typeArgs) {
    const lowered = typeRefFromChecker(checker, arg);
    if (!lowered) return undefined;
    args.push(lowered);
  }
  return namedType(symbol.getName(), args);
}
