import { expect } from "chai";

import { CompileError } from "../diagnostics.js";
import { method, param, protocol, req, s, t, e } from "../testing.js";
import {
  analyzeRequirements,
  createProtocolTable,
  derivableProtocolRules,
  missingProtocols,
  RequirementCache,
  requirementSetFor,
} from "./requirements.js";

describe("@vessel/compiler passes/requirements", () => {
  const noRules = derivableProtocolRules([]);
  const stdRules = derivableProtocolRules(["Equatable", "Hashable"]);

  it("flattens inherited protocols before the refining protocol", () => {
    const table = createProtocolTable(
      [
        protocol("Named", [req("readonly-property", "name", { result: t.str })]),
        protocol("Greeter", [req("method", "greet", { result: t.str })], ["Named"]),
      ],
      []
    );
    const set = analyzeRequirements(table, ["Greeter"], noRules);
    expect(set.requirements.map((r) => `${r.protocol}.${r.name}`)).to.deep.equal(["Named.name", "Greeter.greet"]);
    expect(set.uncoveredRequirements.map((r) => r.name)).to.deep.equal(["name", "greet"]);
  });

  it("lists a requirement reachable through two protocols once", () => {
    const table = createProtocolTable(
      [
        protocol("Base", [req("method", "run")]),
        protocol("Left", [], ["Base"]),
        protocol("Right", [req("method", "run")], ["Base"]),
      ],
      []
    );
    const set = analyzeRequirements(table, ["Left", "Right"], noRules);
    expect(set.requirements.map((r) => r.key)).to.deep.equal(["instance:method:run"]);
    expect(set.requirements[0]?.protocol).to.equal("Base");
  });

  it("marks requirements with extension defaults as covered", () => {
    const table = createProtocolTable(
      [protocol("Shape", [req("method", "area", { result: t.num }), req("method", "describe", { result: t.str })])],
      [{ protocol: "Shape", members: [method("describe", [s.ret(e.str("shape"))], { ret: t.str })] }]
    );
    const set = analyzeRequirements(table, ["Shape"], noRules);
    const describeReq = set.requirements.find((r) => r.name === "describe");
    expect(describeReq?.hasDefaultImplementation).to.equal(true);
    expect(describeReq?.defaultImplementation?.kind).to.equal("method");
    expect(set.uncoveredRequirements.map((r) => r.name)).to.deep.equal(["area"]);
  });

  it("applies synthesis rules to the builtin derivable protocols", () => {
    const table = createProtocolTable([protocol("Predicate", [req("method", "evaluate", { result: t.bool })])], []);
    const set = analyzeRequirements(table, ["Predicate", "Hashable"], stdRules);
    expect(set.requirements.map((r) => r.name)).to.deep.equal(["evaluate", "equals", "hashValue"]);
    expect(set.requirements.filter((r) => r.isCompilerSynthesizable).map((r) => r.name)).to.deep.equal([
      "equals",
      "hashValue",
    ]);
    expect(set.uncoveredRequirements.map((r) => r.name)).to.deep.equal(["evaluate"]);
  });

  it("does not derive builtin requirements when synthesis is disabled", () => {
    const table = createProtocolTable([], []);
    const set = analyzeRequirements(table, ["Equatable"], noRules);
    expect(set.uncoveredRequirements.map((r) => r.name)).to.deep.equal(["equals"]);
  });

  it("tracks static requirements separately", () => {
    const table = createProtocolTable(
      [protocol("Factory", [req("static-method", "make", { params: [param("n", t.num)], result: t.self })])],
      []
    );
    const set = analyzeRequirements(table, ["Factory"], noRules);
    expect(set.staticRequirements.map((r) => r.key)).to.deep.equal(["static:method:make"]);
  });

  it("reports unknown protocols including inherited ones", () => {
    const table = createProtocolTable([protocol("A", [], ["Missing"])], []);
    expect(missingProtocols(table, ["A", "Other", "Equatable"])).to.deep.equal(["Missing", "Other"]);
  });

  it("rejects duplicate protocol declarations", () => {
    expect(() => createProtocolTable([protocol("A", []), protocol("A", [])], [])).to.throw(CompileError, /more than once/);
  });

  it("publishes one frozen set per order-insensitive protocol set", () => {
    const table = createProtocolTable([protocol("A", [req("method", "a")]), protocol("B", [req("method", "b")])], []);
    const cache = new RequirementCache();
    const first = requirementSetFor(table, cache, ["B", "A"], noRules);
    const second = requirementSetFor(table, cache, ["A", "B", "A"], noRules);
    expect(second).to.equal(first);
    expect(cache.computations).to.equal(1);
    expect(cache.size).to.equal(1);
    expect(first.key).to.equal("A&B");
    expect(first.requirements.map((r) => r.name)).to.deep.equal(["a", "b"]);
    expect(Object.isFrozen(first)).to.equal(true);
    expect(Object.isFrozen(first.requirements[0])).to.equal(true);
    expect(Object.isFrozen(first.requirements[0]?.signature)).to.equal(true);
  });
});
