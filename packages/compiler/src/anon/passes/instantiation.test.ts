import { expect } from "chai";

import type { Expr } from "../ir.js";
import { descriptor, e, literal, s, statementBody, t } from "../testing.js";
import type { SynthesizedStructType } from "./contracts.js";
import { emitInstantiation, replaceClosureLiteral, replaceClosureLiteralInBody } from "./instantiation.js";

describe("@vessel/compiler passes/instantiation", () => {
  function decl(path: SynthesizedStructType["path"], fields: readonly string[]): SynthesizedStructType {
    return {
      name: "__Anon_7",
      literalId: "main.ts:40",
      path,
      conformances: ["Predicate"],
      fields: fields.map((name) => ({ name, type: t.num, mutable: false, visibility: "private", attributes: [] })),
      members: [],
      witnesses: [],
    };
  }

  it("constructs the struct with capture initializers in field order", () => {
    const captures = [
      { ...descriptor("y", t.num, true), initializerExpression: e.add(e.id("x"), e.num("1")) },
      descriptor("x", t.num),
    ];
    const replacement = emitInstantiation(decl("bodyless", ["x", "y"]), captures);
    expect(replacement.kind).to.equal("construct");
    if (replacement.kind !== "construct") return;
    expect(replacement.typeName).to.equal("__Anon_7");
    expect(replacement.args).to.deep.equal([e.id("x"), e.add(e.id("x"), e.num("1"))]);
  });

  it("refers to the type itself on the metatype path", () => {
    const replacement = emitInstantiation(decl("metatype", []), []);
    expect(replacement).to.deep.equal({ kind: "type_ref", name: "__Anon_7", span: undefined });
  });

  it("replaces the literal node by id inside a tree", () => {
    const target = literal(statementBody(s.ret(e.bool(true))), { id: "main.ts:40" });
    const other = literal(statementBody(s.ret(e.bool(false))), { id: "main.ts:90" });
    const tree: Expr = e.call(e.id("filter"), { kind: "closure", literal: target }, { kind: "closure", literal: other });
    const { expr, replaced } = replaceClosureLiteral(tree, "main.ts:40", { kind: "type_ref", name: "__Anon_7" });
    expect(replaced).to.equal(1);
    expect(expr).to.deep.equal(
      e.call(e.id("filter"), { kind: "type_ref", name: "__Anon_7" }, { kind: "closure", literal: other })
    );

    const body = replaceClosureLiteralInBody([s.let("p", { kind: "closure", literal: target })], "main.ts:40", e.id("p0"));
    expect(body.replaced).to.equal(1);
    expect(body.stmts).to.deep.equal([s.let("p", e.id("p0"))]);
  });
});
