import { expect } from "chai";
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runInit } from "./init.js";
import { runLower } from "./lower.js";

describe("@vessel/cli lower", () => {
  function collector(): { readonly out: string[]; readonly err: string[]; readonly log: (l: string) => void; readonly error: (l: string) => void } {
    const out: string[] = [];
    const err: string[] = [];
    return { out, err, log: (l) => void out.push(l), error: (l) => void err.push(l) };
  }

  it("writes the lowered program for the sample project", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vessel-lower-"));
    await runInit({ dir, logger: collector() });

    const logger = collector();
    const result = await runLower({ dir, logger });
    expect(result.issues).to.equal(0);
    expect(result.outFile).to.equal(join(dir, "out", "lowered.vsl.txt"));
    expect(logger.out).to.deep.equal([
      "src/main.ts:9:30: __Anon_1 <= new __Anon_1(expected)",
      "Wrote out/lowered.vsl.txt",
    ]);
    expect(logger.err).to.deep.equal([]);

    const text = readFileSync(join(dir, "out", "lowered.vsl.txt"), "utf-8");
    expect(text.split("\n")).to.include("main.ts:9:30 => new __Anon_1(expected)");
    expect(text.startsWith("// Generated by @vessel/compiler\n")).to.equal(true);
  });

  it("honours the configured name prefix", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vessel-lower-prefix-"));
    await runInit({ dir, logger: collector() });
    writeFileSync(
      join(dir, "vessel.json"),
      JSON.stringify({ schema: 1, entry: "src/main.ts", outDir: "gen", naming: { prefix: "Lit_" } }),
      "utf-8"
    );

    const logger = collector();
    await runLower({ dir, logger });
    expect(logger.out[0]).to.equal("src/main.ts:9:30: Lit_1 <= new Lit_1(expected)");
    expect(existsSync(join(dir, "gen", "lowered.vsl.txt"))).to.equal(true);
  });

  it("reports rejected literals and still writes the others", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vessel-lower-issues-"));
    await runInit({ dir, logger: collector() });
    writeFileSync(
      join(dir, "src", "main.ts"),
      [
        'import { anon } from "@vessel/core";',
        "",
        "export function main(): void {",
        "  const loose = anon(() => 1);",
        "  console.log(loose);",
        "}",
        "",
      ].join("\n"),
      "utf-8"
    );

    const logger = collector();
    const result = await runLower({ dir, logger });
    expect(result.issues).to.equal(1);
    expect(logger.err).to.deep.equal([
      "src/main.ts:4:17: VSL1103: Cannot tell which protocol this literal conforms to. Annotate its target or pass the protocol explicitly: anon<P>(...).",
    ]);
    expect(readFileSync(join(dir, "out", "lowered.vsl.txt"), "utf-8")).to.equal("// Generated by @vessel/compiler\n");
  });

  it("writes nothing when the entry does not parse", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vessel-lower-fatal-"));
    await runInit({ dir, logger: collector() });
    writeFileSync(join(dir, "src", "main.ts"), "export const x = ;\n", "utf-8");

    const logger = collector();
    const result = await runLower({ dir, logger });
    expect(result).to.deep.equal({ issues: 1 });
    expect(logger.err).to.have.length(1);
    expect(logger.err[0]).to.match(/^src\/main\.ts:1:18: VSL0002: /);
    expect(existsSync(join(dir, "out"))).to.equal(false);
  });
});
