import { expect } from "chai";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

import {
  assertCompilerDiagnosticCode,
  COMPILER_DIAGNOSTIC_CODES,
  CompileError,
  compilerDiagnosticDomain,
  failWith,
  REJECTION_CODES,
} from "./diagnostics.js";

describe("@vessel/compiler diagnostics registry", () => {
  const anonRoot = dirname(fileURLToPath(import.meta.url));

  function compilerSourceFiles(): readonly string[] {
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        const abs = join(dir, entry);
        if (statSync(abs).isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts") || abs.endsWith(".test.ts")) continue;
        out.push(abs);
      }
    };
    walk(anonRoot);
    return out.sort((a, b) => a.localeCompare(b));
  }

  // Codes raised directly by the passes, outside the registry module itself.
  function extractRaisedCodes(): readonly string[] {
    const registry = join(anonRoot, "diagnostics.ts");
    const matches = new Set<string>(Object.values(REJECTION_CODES));
    for (const file of compilerSourceFiles()) {
      if (file === registry) continue;
      for (const code of readFileSync(file, "utf-8").match(/\bVSL\d{4}\b/g) ?? []) {
        matches.add(code);
      }
    }
    return [...matches].sort((a, b) => a.localeCompare(b));
  }

  it("keeps compiler diagnostic codes normalized and unique", () => {
    const values = [...COMPILER_DIAGNOSTIC_CODES];
    expect(new Set(values).size).to.equal(values.length);
    for (const code of values) {
      expect(code).to.match(/^VSL\d{4}$/);
    }
  });

  it("keeps compiler diagnostic usage synchronized with the registry", () => {
    const fromRegistry = [...COMPILER_DIAGNOSTIC_CODES].sort((a, b) => a.localeCompare(b));
    expect(extractRaisedCodes()).to.deep.equal(fromRegistry);
  });

  it("rejects unknown diagnostic codes", () => {
    expect(() => assertCompilerDiagnosticCode("VSL9999")).to.throw("Unknown compiler diagnostic code");
    expect(() => new CompileError("VSL9999", "nope")).to.throw("Unknown compiler diagnostic code");
  });

  it("maps each registered diagnostic code into a known domain", () => {
    for (const code of COMPILER_DIAGNOSTIC_CODES) {
      expect(compilerDiagnosticDomain(code)).to.not.equal("other");
    }
    expect(compilerDiagnosticDomain("VSL1103")).to.equal("host-and-syntax");
    expect(compilerDiagnosticDomain("VSL2004")).to.equal("protocols-and-applicability");
    expect(compilerDiagnosticDomain("VSL5002")).to.equal("shape");
    expect(compilerDiagnosticDomain("E0001")).to.equal("other");
  });

  it("raises rejections under their registered code", () => {
    const span = { fileName: "main.ts", start: 3, end: 9 };
    let caught: unknown;
    try {
      failWith("metatype-capture", "cannot capture 'seed'", span);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(CompileError);
    if (!(caught instanceof CompileError)) return;
    expect(caught.toIssue()).to.deep.equal({ code: "VSL5002", message: "cannot capture 'seed'", span });
  });

  it("keeps direct fail(...) calls span-annotated", () => {
    const offenders: string[] = [];
    for (const file of compilerSourceFiles()) {
      const src = readFileSync(file, "utf-8");
      const sf = ts.createSourceFile(file, src, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
      const walk = (node: ts.Node): void => {
        if (
          ts.isCallExpression(node) &&
          ts.isIdentifier(node.expression) &&
          (node.expression.text === "fail" || node.expression.text === "failWith") &&
          node.arguments.length < 3
        ) {
          const { line, character } = sf.getLineAndCharacterOfPosition(node.getStart(sf));
          offenders.push(`${file}:${line + 1}:${character + 1}`);
        }
        ts.forEachChild(node, walk);
      };
      walk(sf);
    }
    expect(offenders).to.deep.equal([]);
  });
});
