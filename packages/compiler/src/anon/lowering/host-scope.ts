import ts from "typescript";

import type { TypeRef } from "../ir.js";
import { namedType } from "../ir.js";
import { createLexicalScope, type EnclosingScope } from "./scope.js";
import { tryLowerTypeNode, typeRefFromChecker } from "./type-lowering.js";

function isFunctionScope(node: ts.Node): node is ts.FunctionLikeDeclaration {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

function hasFunctionAncestor(node: ts.Node): boolean {
  for (let cur = node.parent; cur; cur = cur.parent) {
    if (isFunctionScope(cur)) return true;
  }
  return false;
}

function declaredNames(list: ts.VariableDeclarationList): readonly ts.VariableDeclaration[] {
  return list.declarations.filter((d) => ts.isIdentifier(d.name));
}

function bindingType(checker: ts.TypeChecker, decl: ts.VariableDeclaration | ts.ParameterDeclaration): TypeRef {
  const annotated = decl.type ? tryLowerTypeNode(decl.type) : undefined;
  if (annotated) return annotated;
  const type = checker.getTypeAtLocation(decl.name);
  return typeRefFromChecker(checker, type) ?? namedType(checker.typeToString(type));
}

function enclosingClassName(member: ts.Node): string | undefined {
  const owner = member.parent;
  if ((ts.isClassDeclaration(owner) || ts.isClassExpression(owner)) && owner.name) return owner.name.text;
  return undefined;
}

/**
 * Scope seen by the literal at `site`: parameters and locals of the enclosing
 * functions declared before it, nearest first. Module-level declarations are
 * globals and stay out. `self` is the class of the nearest enclosing method,
 * unless a plain function rebinds `this` first.
 */
export function createHostScope(checker: ts.TypeChecker, site: ts.Node): EnclosingScope {
  const bindings = new Map<string, TypeRef>();
  const bind = (decl: ts.VariableDeclaration | ts.ParameterDeclaration): void => {
    if (!ts.isIdentifier(decl.name) || decl.name.text === "this") return;
    if (bindings.has(decl.name.text)) return;
    bindings.set(decl.name.text, bindingType(checker, decl));
  };

  let selfType: TypeRef | undefined;
  let selfSettled = false;
  const siteStart = site.getStart();

  for (let cur: ts.Node | undefined = site.parent; cur && !ts.isSourceFile(cur); cur = cur.parent) {
    if (ts.isBlock(cur) && hasFunctionAncestor(cur)) {
      for (const st of cur.statements) {
        if (st.getEnd() > siteStart) break;
        if (ts.isVariableStatement(st)) declaredNames(st.declarationList).forEach(bind);
      }
    }
    if (
      (ts.isForStatement(cur) || ts.isForOfStatement(cur) || ts.isForInStatement(cur)) &&
      cur.initializer &&
      ts.isVariableDeclarationList(cur.initializer)
    ) {
      declaredNames(cur.initializer).forEach(bind);
    }
    if (isFunctionScope(cur)) {
      cur.parameters.forEach(bind);
      if (selfSettled || ts.isArrowFunction(cur)) continue;
      selfSettled = true;
      const className = ts.isFunctionDeclaration(cur) || ts.isFunctionExpression(cur) ? undefined : enclosingClassName(cur);
      if (className) selfType = namedType(className);
    }
  }

  return createLexicalScope({ bindings, selfType });
}
