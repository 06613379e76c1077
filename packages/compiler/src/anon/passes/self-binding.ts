import type { Accessor, Expr, MemberDecl, Span, Stmt, TypeRef } from "../ir.js";
import { identExpr } from "../ir.js";
import { failWith } from "../diagnostics.js";
import { OUTER_SELF_FIELD } from "../lowering/common.js";
import { rewriteBody, type ExprRewriter } from "../lowering/walk.js";
import { frozenList, type BodyRegion, type RegionOrigin, type SelfBinding, type SelfBindingTag } from "./contracts.js";
import type { StructShape } from "./synthesis.js";

export type SelfBindingOptions = {
  readonly enclosingType?: TypeRef;
};

class RegionArena {
  readonly #regions: BodyRegion[] = [];

  add(label: string, origin: RegionOrigin, tag: SelfBindingTag): BodyRegion {
    const region = Object.freeze({ id: this.#regions.length, label, origin, tag });
    this.#regions.push(region);
    return region;
  }

  snapshot(): SelfBinding {
    return Object.freeze({ regions: frozenList(this.#regions) });
  }
}

function at(expr: Expr, span: Span | undefined): Expr {
  return span ? { ...expr, span } : expr;
}

function outerSelfRewriter(shape: StructShape, enclosingType: TypeRef | undefined): ExprRewriter {
  const hasOuterSelf = shape.fields.some((f) => f.name === OUTER_SELF_FIELD);
  return (expr, locals): Expr | undefined => {
    switch (expr.kind) {
      case "self":
        return at(identExpr(OUTER_SELF_FIELD), expr.span);
      case "self_type":
        if (enclosingType?.kind !== "named") {
          failWith("unresolved-self", "'Self' is used in a literal body outside of any enclosing type.", expr.span);
        }
        return at({ kind: "type_ref", name: enclosingType.name }, expr.span);
      case "ident":
        if (expr.name !== "self" || !hasOuterSelf || locals.has(expr.name)) return undefined;
        return at(identExpr(OUTER_SELF_FIELD), expr.span);
      default:
        return undefined;
    }
  };
}

function rewriteAccessor(setter: Accessor | undefined, keys: readonly string[], fn: ExprRewriter): Accessor | undefined {
  if (!setter) return undefined;
  return { ...setter, body: rewriteBody(setter.body, [...keys, setter.valueName], fn) };
}

function bindMember(member: MemberDecl, arena: RegionArena, tag: SelfBindingTag, fn: ExprRewriter | undefined): MemberDecl {
  const rewrite = (stmts: readonly Stmt[], params: readonly string[]): readonly Stmt[] =>
    fn ? rewriteBody(stmts, params, fn) : stmts;
  switch (member.kind) {
    case "method":
      arena.add(member.isStatic ? `static ${member.name}` : member.name, "literal", tag);
      return { ...member, body: rewrite(member.body, member.params.map((p) => p.name)) };
    case "property": {
      arena.add(`${member.name} getter`, "literal", tag);
      if (member.setter) arena.add(`${member.name} setter`, "literal", tag);
      const getter = rewrite(member.getter, []);
      const setter = fn ? rewriteAccessor(member.setter, [], fn) : member.setter;
      return setter ? { ...member, getter, setter } : { ...member, getter };
    }
    case "subscript": {
      const keys = member.params.map((p) => p.name);
      arena.add("subscript getter", "literal", tag);
      if (member.setter) arena.add("subscript setter", "literal", tag);
      const getter = rewrite(member.getter, keys);
      const setter = fn ? rewriteAccessor(member.setter, keys, fn) : member.setter;
      return setter ? { ...member, getter, setter } : { ...member, getter };
    }
    case "stored":
      return member;
  }
}

/**
 * Tags every body region of a synthesized struct with the meaning of
 * `self` inside it and rewrites literal-supplied closure-style bodies so
 * that `self` reads the captured outer value and `Self` names the enclosing
 * type. Declaration-body members, the static member of a type-producing
 * literal and adopted witnesses keep `self` bound to the synthesized type.
 */
export function bindSelf(
  shape: StructShape,
  opts: SelfBindingOptions = {}
): { readonly shape: StructShape; readonly binding: SelfBinding } {
  const arena = new RegionArena();
  // A type-producing literal has no outer value; its body already runs as the new type.
  const closureStyle = shape.path !== "multi-declaration" && shape.path !== "metatype";
  const tag: SelfBindingTag = closureStyle ? "captured-outer-self" : "synthesized-type-self";
  const fn = closureStyle ? outerSelfRewriter(shape, opts.enclosingType) : undefined;

  const members = shape.members.map((m) => bindMember(m, arena, tag, fn));
  for (const witness of shape.witnesses) {
    if (witness.source === "default" || witness.source === "synthesized") {
      arena.add(`${witness.source} ${witness.protocol} ${witness.requirement}`, "adopted", "synthesized-type-self");
    }
  }
  return {
    shape: { ...shape, members: frozenList(members) },
    binding: arena.snapshot(),
  };
}
