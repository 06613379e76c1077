import { expect } from "chai";

import { CompileError } from "../diagnostics.js";
import { createLexicalScope } from "../lowering/scope.js";
import { capture, e, literal, method, s, statementBody, t } from "../testing.js";
import { collectCaptures } from "./captures.js";

describe("@vessel/compiler passes/captures", () => {
  const scope = createLexicalScope({
    bindings: [
      ["expected", t.str],
      ["x", t.num],
      ["limit", t.num],
      ["cache", t.named("Map", [t.str, t.num])],
    ],
    selfType: t.named("Widget"),
  });
  const topLevel = createLexicalScope({ bindings: [["x", t.num]] });

  function codeOf(fn: () => unknown): string | undefined {
    try {
      fn();
    } catch (error) {
      if (error instanceof CompileError) return error.code;
      throw error;
    }
    return undefined;
  }

  it("appends free variables in first-use order after explicit captures", () => {
    const lit = literal(statementBody(s.ret(e.add(e.id("limit"), e.eq(e.id("v"), e.id("expected"))))), {
      params: [{ name: "v" }],
      captureList: [capture("x")],
    });
    const captures = collectCaptures(lit, scope);
    expect(captures.map((c) => [c.name, c.sourceKind])).to.deep.equal([
      ["x", "explicit-in-capture-list"],
      ["limit", "implicit-free-variable"],
      ["expected", "implicit-free-variable"],
    ]);
    expect(captures[2]?.declaredType).to.deep.equal(t.str);
    expect(captures.every((c) => c.mutability === "immutable")).to.equal(true);
  });

  it("does not capture parameters, locals or unknown globals", () => {
    const lit = literal(
      statementBody(s.let("tmp", e.id("v")), s.ret(e.call(e.id("print"), e.id("tmp"), e.id("v")))),
      { params: [{ name: "v" }] }
    );
    expect(collectCaptures(lit, scope)).to.deep.equal([]);
  });

  it("evaluates capture initializers and attaches attributes verbatim", () => {
    const lit = literal(
      { kind: "none" },
      {
        captureList: [
          capture("x"),
          capture("y", { init: e.add(e.id("x"), e.num("1")), mutable: true, attributes: ["Clamped", "Logged"] }),
        ],
      }
    );
    const [x, y] = collectCaptures(lit, scope);
    expect(x?.initializerExpression).to.deep.equal(e.id("x"));
    expect(y?.mutability).to.equal("mutable");
    expect(y?.declaredType).to.deep.equal(t.num);
    expect(y?.attributes).to.deep.equal(["Clamped", "Logged"]);
  });

  it("captures the enclosing self under the escaped field name", () => {
    const lit = literal(statementBody(s.ret(e.member(e.self(), "width"))));
    const captures = collectCaptures(lit, scope);
    expect(captures.map((c) => c.name)).to.deep.equal(["`self`"]);
    expect(captures[0]?.initializerExpression).to.deep.equal(e.self());
    expect(captures[0]?.declaredType).to.deep.equal(t.named("Widget"));
  });

  it("reuses an explicit self capture instead of adding an implicit one", () => {
    const lit = literal(statementBody(s.ret(e.self())), { captureList: [capture("self")] });
    const captures = collectCaptures(lit, scope);
    expect(captures.map((c) => [c.name, c.sourceKind])).to.deep.equal([["`self`", "explicit-in-capture-list"]]);
  });

  it("leaves self alone in struct-style members", () => {
    const lit = literal({
      kind: "multi-declaration",
      members: [method("size", [s.ret(e.member(e.self(), "count"))], { ret: t.num })],
    });
    expect(collectCaptures(lit, topLevel)).to.deep.equal([]);
  });

  it("does not treat struct-style member names as free variables", () => {
    const withMember = createLexicalScope({ bindings: [["size", t.num]] });
    const lit = literal({
      kind: "multi-declaration",
      members: [method("size", [s.ret(e.num("1"))], { ret: t.num }), method("twice", [s.ret(e.id("size"))])],
    });
    expect(collectCaptures(lit, withMember)).to.deep.equal([]);
  });

  it("rejects by-reference captures", () => {
    const lit = literal({ kind: "none" }, { captureList: [capture("x", { byReference: true })] });
    expect(codeOf(() => collectCaptures(lit, scope))).to.equal("VSL3001");
  });

  it("rejects duplicate capture names and names shadowing parameters", () => {
    const dup = literal({ kind: "none" }, { captureList: [capture("x"), capture("x", { init: e.num("2") })] });
    expect(codeOf(() => collectCaptures(dup, scope))).to.equal("VSL3002");
    const shadow = literal(statementBody(s.ret(e.id("x"))), {
      params: [{ name: "x" }],
      captureList: [capture("x")],
    });
    expect(codeOf(() => collectCaptures(shadow, scope))).to.equal("VSL3002");
  });

  it("rejects captures whose type cannot be determined", () => {
    const lit = literal({ kind: "none" }, { captureList: [capture("items", { init: e.record() })] });
    expect(codeOf(() => collectCaptures(lit, scope))).to.equal("VSL3003");
    const annotated = literal(
      { kind: "none" },
      { captureList: [capture("items", { init: e.record(), type: t.named("Map", [t.str, t.num]) })] }
    );
    expect(collectCaptures(annotated, scope)[0]?.declaredType).to.deep.equal(t.named("Map", [t.str, t.num]));
  });

  it("falls back to the inferred type for values the scope cannot type", () => {
    const lit = literal(
      { kind: "none" },
      {
        captureList: [
          capture("total", { init: e.member(e.id("values"), "length"), inferredType: t.num }),
          capture("expected", { inferredType: t.named("Tag") }),
        ],
      }
    );
    expect(collectCaptures(lit, topLevel).map((c) => [c.name, c.declaredType])).to.deep.equal([
      ["total", t.num],
      ["expected", t.named("Tag")],
    ]);
    const scoped = literal({ kind: "none" }, { captureList: [capture("expected", { inferredType: t.named("Tag") })] });
    expect(collectCaptures(scoped, scope)[0]?.declaredType).to.deep.equal(t.str);
  });

  it("rejects self without an enclosing type", () => {
    const lit = literal(statementBody(s.ret(e.self())));
    expect(codeOf(() => collectCaptures(lit, topLevel))).to.equal("VSL3004");
  });

  it("walks getter and setter bodies of accessor literals", () => {
    const lit = literal(
      {
        kind: "accessor",
        getter: [s.ret(e.index(e.id("cache"), e.id("key")))],
        setter: { valueName: "newValue", body: [s.assign(e.index(e.id("cache"), e.id("key")), e.id("newValue"))] },
      },
      { params: [{ name: "key", type: t.str }] }
    );
    expect(collectCaptures(lit, scope).map((c) => c.name)).to.deep.equal(["cache"]);
  });
});
