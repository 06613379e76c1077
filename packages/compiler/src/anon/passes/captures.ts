import type { CaptureItem, ClosureLiteral, Expr, MemberDecl, Span, Stmt, TypeRef } from "../ir.js";
import { identExpr, selfExpr } from "../ir.js";
import { failWith } from "../diagnostics.js";
import { escapeIdentifier, OUTER_SELF_FIELD } from "../lowering/common.js";
import type { EnclosingScope } from "../lowering/scope.js";
import { walkBody } from "../lowering/walk.js";
import { frozenList, type CaptureDescriptor } from "./contracts.js";

type BodyUnit = {
  readonly stmts: readonly Stmt[];
  readonly params: readonly string[];
};

// Closure-style regions see the enclosing `self`; struct-style members see their own.
type ScannedBodies = {
  readonly closureStyle: readonly BodyUnit[];
  readonly structStyle: readonly BodyUnit[];
  readonly memberNames: readonly string[];
};

function memberUnits(member: MemberDecl): readonly BodyUnit[] {
  switch (member.kind) {
    case "method":
      return [{ stmts: member.body, params: member.params.map((p) => p.name) }];
    case "property": {
      const units: BodyUnit[] = [{ stmts: member.getter, params: [] }];
      if (member.setter) units.push({ stmts: member.setter.body, params: [member.setter.valueName] });
      return units;
    }
    case "subscript": {
      const keys = member.params.map((p) => p.name);
      const units: BodyUnit[] = [{ stmts: member.getter, params: keys }];
      if (member.setter) units.push({ stmts: member.setter.body, params: [...keys, member.setter.valueName] });
      return units;
    }
    case "stored":
      return [];
  }
}

function memberName(member: MemberDecl): string | undefined {
  return member.kind === "subscript" ? undefined : member.name;
}

function scanBodies(literal: ClosureLiteral): ScannedBodies {
  const params = literal.params.map((p) => p.name);
  const body = literal.body;
  switch (body.kind) {
    case "none":
      return { closureStyle: [], structStyle: [], memberNames: [] };
    case "statement":
      return { closureStyle: [{ stmts: body.stmts, params }], structStyle: [], memberNames: [] };
    case "accessor": {
      const units: BodyUnit[] = [{ stmts: body.getter, params }];
      if (body.setter) units.push({ stmts: body.setter.body, params: [...params, body.setter.valueName] });
      return { closureStyle: units, structStyle: [], memberNames: [] };
    }
    case "multi-declaration":
      return {
        closureStyle: [],
        structStyle: body.members.flatMap(memberUnits),
        memberNames: body.members.flatMap((m) => {
          const name = memberName(m);
          return name === undefined ? [] : [name];
        }),
      };
  }
}

function typeOfInitializer(init: Expr, scope: EnclosingScope): TypeRef | undefined {
  if (init.kind === "ident") return scope.lookup(init.name)?.type ?? scope.typeOf(init);
  if (init.kind === "self") return scope.selfType;
  return scope.typeOf(init);
}

function explicitDescriptor(item: CaptureItem, scope: EnclosingScope): CaptureDescriptor {
  if (item.byReference) {
    failWith(
      "by-reference-capture-attempted",
      `Capture '${item.name}' shares storage with the enclosing scope. Captures are copied by value; remove the by-reference marker.`,
      item.span
    );
  }
  const init = item.init ?? (item.name === "self" ? selfExpr() : identExpr(item.name));
  if (init.kind === "self" && scope.selfType === undefined) {
    failWith("unresolved-self", `Capture '${item.name}' refers to 'self' outside of any enclosing type.`, item.span);
  }
  const declaredType = item.type ?? typeOfInitializer(init, scope) ?? item.inferredType;
  if (!declaredType) {
    failWith(
      "capture-type-unknown",
      `Cannot determine the type of capture '${item.name}'. Add a type annotation to the captured value.`,
      item.span
    );
  }
  return {
    name: escapeIdentifier(item.name),
    declaredType,
    mutability: item.mutable ? "mutable" : "immutable",
    initializerExpression: init,
    attributes: frozenList(item.attributes),
    sourceKind: "explicit-in-capture-list",
    span: item.span,
  };
}

/**
 * Collects the stored values a literal copies from its enclosing scope:
 * capture-list items in order, then free variables and the enclosing `self`
 * in first-use order.
 */
export function collectCaptures(literal: ClosureLiteral, scope: EnclosingScope): readonly CaptureDescriptor[] {
  const bodies = scanBodies(literal);
  const descriptors: CaptureDescriptor[] = [];
  const taken = new Set<string>();
  const explicitNames = new Set<string>();
  const reserved = new Set<string>([...literal.params.map((p) => p.name), ...bodies.memberNames]);

  for (const item of literal.captureList ?? []) {
    const descriptor = explicitDescriptor(item, scope);
    if (taken.has(descriptor.name)) {
      failWith("capture-name-collision", `Capture '${item.name}' is listed more than once.`, item.span);
    }
    if (reserved.has(item.name)) {
      failWith(
        "capture-name-collision",
        `Capture '${item.name}' collides with a parameter or member of the same name.`,
        item.span
      );
    }
    taken.add(descriptor.name);
    explicitNames.add(item.name);
    descriptors.push(descriptor);
  }

  const addImplicit = (name: string, type: TypeRef, init: Expr, span: Span | undefined): void => {
    if (taken.has(name)) return;
    taken.add(name);
    descriptors.push({
      name,
      declaredType: type,
      mutability: "immutable",
      initializerExpression: init,
      attributes: [],
      sourceKind: "implicit-free-variable",
      span,
    });
  };

  const visitFree = (unit: BodyUnit, closureStyle: boolean): void => {
    walkBody(unit.stmts, unit.params, {
      ident: (expr, locals) => {
        if (locals.has(expr.name) || explicitNames.has(expr.name) || reserved.has(expr.name)) return;
        const binding = scope.lookup(expr.name);
        if (!binding) return;
        addImplicit(expr.name, binding.type, identExpr(expr.name), expr.span);
      },
      self: (expr) => {
        if (!closureStyle) return;
        if (scope.selfType === undefined) {
          failWith("unresolved-self", "'self' is used in a literal body outside of any enclosing type.", expr.span);
        }
        addImplicit(OUTER_SELF_FIELD, scope.selfType, selfExpr(), expr.span);
      },
    });
  };

  for (const unit of bodies.closureStyle) visitFree(unit, true);
  for (const unit of bodies.structStyle) visitFree(unit, false);

  return frozenList(descriptors);
}
