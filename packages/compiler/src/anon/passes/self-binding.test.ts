import { expect } from "chai";

import { CompileError } from "../diagnostics.js";
import type { Stmt } from "../ir.js";
import { e, method, s, t } from "../testing.js";
import type { StructShape } from "./synthesis.js";
import { bindSelf } from "./self-binding.js";

describe("@vessel/compiler passes/self-binding", () => {
  function shapeWith(path: StructShape["path"], body: readonly Stmt[], fields: readonly string[] = []): StructShape {
    return {
      literalId: "test.ts:1",
      path,
      conformances: ["Probe"],
      fields: fields.map((name) => ({ name, type: t.named("Widget"), mutable: false, visibility: "private", attributes: [] })),
      members: [method("probe", body, { ret: t.num })],
      witnesses: [
        { requirement: "instance:method:probe", protocol: "Probe", source: "literal-body" },
        { requirement: "instance:method:equals", protocol: "Equatable", source: "synthesized" },
      ],
    };
  }

  function bodyOf(shape: StructShape): readonly Stmt[] {
    const member = shape.members[0];
    return member?.kind === "method" ? member.body : [];
  }

  it("binds self in literal bodies to the captured outer value", () => {
    const shape = shapeWith("single-requirement", [s.ret(e.member(e.self(), "width"))], ["`self`"]);
    const bound = bindSelf(shape, { enclosingType: t.named("Widget") });
    expect(bodyOf(bound.shape)).to.deep.equal([s.ret(e.member(e.id("`self`"), "width"))]);
  });

  it("rewrites Self to the enclosing type", () => {
    const shape = shapeWith("single-requirement", [s.ret(e.call(e.member(e.selfType(), "zero")))]);
    const bound = bindSelf(shape, { enclosingType: t.named("Widget") });
    expect(bodyOf(bound.shape)).to.deep.equal([s.ret(e.call(e.member({ kind: "type_ref", name: "Widget" }, "zero")))]);
  });

  it("rejects Self in a literal body without an enclosing type", () => {
    const shape = shapeWith("single-requirement", [s.ret(e.selfType())]);
    expect(() => bindSelf(shape)).to.throw(CompileError).with.property("code", "VSL3004");
  });

  it("renames identifiers naming an explicit self capture unless shadowed", () => {
    const shape = shapeWith("single-requirement", [s.expr(e.id("self")), s.let("self", e.num("1")), s.ret(e.id("self"))], [
      "`self`",
    ]);
    const bound = bindSelf(shape, { enclosingType: t.named("Widget") });
    expect(bodyOf(bound.shape)).to.deep.equal([s.expr(e.id("`self`")), s.let("self", e.num("1")), s.ret(e.id("self"))]);
  });

  it("leaves declaration bodies and type-producing bodies bound to the new type", () => {
    for (const path of ["multi-declaration", "metatype"] as const) {
      const body = [s.ret(e.member(e.self(), "size"))];
      const bound = bindSelf(shapeWith(path, body));
      expect(bodyOf(bound.shape)).to.deep.equal(body);
      expect(bound.binding.regions[0]?.tag).to.equal("synthesized-type-self");
    }
  });

  it("records literal regions and adopted witnesses in an arena", () => {
    const bound = bindSelf(shapeWith("single-requirement", [s.ret(e.num("1"))]));
    expect(bound.binding.regions).to.deep.equal([
      { id: 0, label: "probe", origin: "literal", tag: "captured-outer-self" },
      { id: 1, label: "synthesized Equatable instance:method:equals", origin: "adopted", tag: "synthesized-type-self" },
    ]);
  });
});
