import { expect } from "chai";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { CompileError } from "./diagnostics.js";
import { lowerHostProgram, type LowerHostOutput } from "./host.js";

describe("@vessel/compiler host front end", () => {
  function writeProject(files: Record<string, readonly string[]>): string {
    const dir = mkdtempSync(join(tmpdir(), "vessel-host-"));
    for (const [name, lines] of Object.entries(files)) {
      writeFileSync(join(dir, name), [...lines, ""].join("\n"), "utf-8");
    }
    return join(dir, "main.ts");
  }

  function compileErrorOf(fn: () => unknown): CompileError {
    try {
      fn();
    } catch (error) {
      if (error instanceof CompileError) return error;
      throw error;
    }
    throw new Error("expected a CompileError");
  }

  function codes(out: LowerHostOutput): readonly (string | undefined)[] {
    return out.literals.map((l) => (l.kind === "rejected" ? l.issue.code : undefined));
  }

  const predicate = ["export interface Predicate {", "  evaluate(value: string): boolean;", "}", ""];

  it("lowers a literal assigned to an annotated variable", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon } from "@vessel/core";',
        "",
        ...predicate,
        "export function main(): void {",
        '  const expected = "ok";',
        "  const pred: Predicate = anon((value: string) => value === expected);",
        "  console.log(pred);",
        "}",
      ],
    });

    const out = lowerHostProgram({ entryFile: entry });
    expect(out.issues).to.deep.equal([]);
    expect(out.literals).to.have.length(1);
    expect(out.literals[0]).to.deep.include({
      kind: "lowered",
      literalId: "main.ts:9:27",
      fileName: "main.ts",
      line: 9,
      column: 27,
      structName: "__Anon_1",
      replacement: "new __Anon_1(expected)",
    });
    expect(out.text).to.equal(
      [
        "// Generated by @vessel/compiler",
        "",
        "struct __Anon_1 implements Predicate {",
        "  private readonly expected: string;",
        "",
        "  evaluate(value: string): boolean {",
        "    return value == expected;",
        "  }",
        "}",
        "",
        "main.ts:9:27 => new __Anon_1(expected)",
        "",
      ].join("\n")
    );
  });

  it("reads generic bounds from the parameter a literal is passed to", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon as closure } from "@vessel/core";',
        'import type { Predicate } from "./protocols.js";',
        "",
        "function keep<P extends Predicate>(p: P): P {",
        "  return p;",
        "}",
        "",
        "export function main(): void {",
        "  keep(closure((value: string) => value.length > 0));",
        "}",
      ],
      "protocols.ts": predicate,
    });

    const out = lowerHostProgram({ entryFile: entry, namePrefix: "Lit_" });
    expect(codes(out)).to.deep.equal([undefined]);
    const [lowered] = out.lowered;
    expect(lowered?.resolution.path).to.equal("single-requirement");
    expect(lowered?.struct.name).to.equal("Lit_1");
    expect(lowered?.struct.conformances).to.deep.equal(["Predicate"]);
    expect(lowered?.struct.fields).to.deep.equal([]);
  });

  it("captures the enclosing instance inside a method", () => {
    const entry = writeProject({
      "main.ts": [
        'import * as v from "@vessel/core";',
        "",
        ...predicate,
        "export class Limits {",
        "  limit = 3;",
        "  shorter(): Predicate {",
        "    return v.anon((value: string) => value.length < this.limit);",
        "  }",
        "}",
      ],
    });

    const out = lowerHostProgram({ entryFile: entry });
    expect(codes(out)).to.deep.equal([undefined]);
    expect(out.literals[0]).to.deep.include({ kind: "lowered", replacement: "new __Anon_1(this)" });
    expect(out.structs[0]?.fields.map((f) => [f.name, f.type])).to.deep.equal([
      ["`self`", { kind: "named", name: "Limits", args: [] }],
    ]);
  });

  it("reports a failing literal and keeps lowering the others", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon } from "@vessel/core";',
        "",
        ...predicate,
        "export function main(): void {",
        "  const loose = anon(() => true);",
        "  const orphan: Predicate = anon((value: string) => value === this.name);",
        "  const ok: Predicate = anon((value: string) => value.length === 0);",
        "  console.log(loose, orphan, ok);",
        "}",
      ],
    });

    const out = lowerHostProgram({ entryFile: entry });
    expect(codes(out)).to.deep.equal(["VSL1103", "VSL3004", undefined]);
    expect(out.issues.map((i) => [i.code, i.line])).to.deep.equal([
      ["VSL1103", 8],
      ["VSL3004", 9],
    ]);
    expect(out.literals[2]).to.deep.include({ kind: "lowered", structName: "__Anon_1" });
    expect(out.text.split("\n")).to.include("main.ts:10:25 => new __Anon_1()");
  });

  it("ignores files that do not import the markers", () => {
    const entry = writeProject({
      "main.ts": ["export function anon(x: number): number {", "  return x;", "}", "export const y = anon(1);"],
    });
    const out = lowerHostProgram({ entryFile: entry });
    expect(out.literals).to.deep.equal([]);
    expect(out.text).to.equal("// Generated by @vessel/compiler\n");
  });

  it("reports a malformed protocol only on the literals that use it", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon } from "@vessel/core";',
        "",
        ...predicate,
        "interface Named {",
        "  readonly name?: string;",
        "}",
        "",
        "export function main(): void {",
        '  const n: Named = anon({ name: "x" });',
        "  const ok: Predicate = anon((value: string) => value.length > 0);",
        "  console.log(n, ok);",
        "}",
      ],
    });
    const out = lowerHostProgram({ entryFile: entry });
    expect(codes(out)).to.deep.equal(["VSL1001", undefined]);
    expect(out.issues.map((i) => [i.code, i.line, i.message])).to.deep.equal([
      ["VSL1001", 12, "Protocol 'Named': optional requirements are not supported."],
    ]);
    expect(out.issues[0]?.span?.fileName).to.equal("main.ts");
    expect(out.literals[1]).to.deep.include({ kind: "lowered", structName: "__Anon_1" });
  });

  it("reports a protocol declared twice on its literals", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon } from "@vessel/core";',
        "",
        ...predicate,
        "interface Predicate {",
        "  describe(): string;",
        "}",
        "",
        "export function main(): void {",
        "  const p: Predicate = anon((value: string) => value.length > 0);",
        "  console.log(p);",
        "}",
      ],
    });
    const out = lowerHostProgram({ entryFile: entry });
    expect(out.issues.map((i) => [i.code, i.message])).to.deep.equal([
      ["VSL1001", "Protocol 'Predicate' is declared more than once."],
    ]);
    expect(out.structs).to.deep.equal([]);
  });

  it("types explicit captures of module constants and computed values", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon } from "@vessel/core";',
        "",
        ...predicate,
        'const expected = "abc";',
        "",
        "export function main(values: string[]): void {",
        "  const same: Predicate = anon({ expected }, (value: string) => value === expected);",
        "  const shorter: Predicate = anon({ n: values.length }, (value: string) => value.length < n);",
        "  console.log(same, shorter);",
        "}",
      ],
    });
    const out = lowerHostProgram({ entryFile: entry });
    expect(codes(out)).to.deep.equal([undefined, undefined]);
    expect(out.structs.map((st) => st.fields.map((f) => [f.name, f.type]))).to.deep.equal([
      [["expected", { kind: "named", name: "string", args: [] }]],
      [["n", { kind: "named", name: "number", args: [] }]],
    ]);
    expect(out.literals.map((l) => (l.kind === "lowered" ? l.replacement : undefined))).to.deep.equal([
      "new __Anon_1(expected)",
      "new __Anon_2(values.length)",
    ]);
  });

  it("keeps type arguments of constructed capture values", () => {
    const entry = writeProject({
      "main.ts": [
        'import { anon, mutable } from "@vessel/core";',
        "",
        "interface Store {",
        "  [key: string]: number;",
        "}",
        "",
        "export function main(): void {",
        "  const store: Store = anon({ storage: mutable(new Map<string, number>()) }, {",
        "    get(key: string): number {",
        "      return storage.get(key);",
        "    },",
        "    set(key: string, value: number) {",
        "      storage.set(key, value);",
        "    },",
        "  });",
        "  console.log(store);",
        "}",
      ],
    });
    const out = lowerHostProgram({ entryFile: entry });
    expect(codes(out)).to.deep.equal([undefined]);
    expect(out.structs[0]?.fields.map((f) => [f.name, f.type, f.mutable])).to.deep.equal([
      [
        "storage",
        {
          kind: "named",
          name: "Map",
          args: [
            { kind: "named", name: "string", args: [] },
            { kind: "named", name: "number", args: [] },
          ],
        },
        true,
      ],
    ]);
    expect(out.literals[0]).to.deep.include({ kind: "lowered", replacement: "new __Anon_1(new Map<string, number>())" });
    expect(out.text.split("\n")).to.include("  private storage: Map<string, number>;");
  });

  it("fails on an extension of an unknown protocol", () => {
    const entry = writeProject({
      "main.ts": ['import { extend } from "@vessel/core";', "", "extend<Missing>({ describe(): string { return \"m\"; } });"],
    });
    expect(compileErrorOf(() => lowerHostProgram({ entryFile: entry })).code).to.equal("VSL1002");
  });

  it("fails on a syntax error with its position", () => {
    const entry = writeProject({ "main.ts": ["export function main(): void {", "  const x = ;", "}"] });
    const err = compileErrorOf(() => lowerHostProgram({ entryFile: entry }));
    expect(err.code).to.equal("VSL0002");
    expect(err.message).to.match(/^main\.ts:2:13: /);
  });

  it("fails when the entry file does not exist", () => {
    const dir = mkdtempSync(join(tmpdir(), "vessel-host-"));
    expect(compileErrorOf(() => lowerHostProgram({ entryFile: join(dir, "missing.ts") })).code).to.equal("VSL0001");
  });
});
