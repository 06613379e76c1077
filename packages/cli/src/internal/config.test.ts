import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { defaultConfig, findProjectRoot, loadConfig, loadProjectContext } from "./config.js";
import { runInit } from "./commands/init.js";

describe("@vessel/cli config", () => {
  const quiet = { log: (): void => {}, error: (): void => {} };

  function writeJson(path: string, value: unknown): void {
    writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
  }

  it("findProjectRoot picks the nearest project root", () => {
    const root = mkdtempSync(join(tmpdir(), "vessel-config-project-"));
    const nestedProjectRoot = join(root, "packages", "demo");
    const deep = join(nestedProjectRoot, "src", "docs");
    mkdirSync(deep, { recursive: true });
    writeFileSync(join(root, "vessel.json"), "{}\n", "utf-8");
    writeFileSync(join(nestedProjectRoot, "vessel.json"), "{}\n", "utf-8");

    expect(findProjectRoot(deep)).to.equal(nestedProjectRoot);
  });

  it("fills naming and synthesis defaults", () => {
    const root = mkdtempSync(join(tmpdir(), "vessel-config-defaults-"));
    const path = join(root, "vessel.json");
    writeJson(path, { schema: 1, entry: "src/main.ts", outDir: "out" });

    expect(loadConfig(path)).to.deep.equal(defaultConfig());
    expect(defaultConfig().naming.prefix).to.equal("__Anon_");
    expect(defaultConfig().synthesis.derivable).to.deep.equal(["Equatable", "Hashable"]);
  });

  it("rejects unknown keys at every level", () => {
    const root = mkdtempSync(join(tmpdir(), "vessel-config-strict-"));
    const path = join(root, "vessel.json");
    writeJson(path, { schema: 1, entry: "src/main.ts", outDir: "out", extra: true });
    expect(() => loadConfig(path)).to.throw("vessel.json: unknown key 'extra'.");

    writeJson(path, { schema: 1, entry: "src/main.ts", outDir: "out", naming: { prefix: "Lit_", suffix: "_" } });
    expect(() => loadConfig(path)).to.throw("vessel.json: 'naming': unknown key 'suffix'.");
  });

  it("validates field types and the name prefix", () => {
    const root = mkdtempSync(join(tmpdir(), "vessel-config-types-"));
    const path = join(root, "vessel.json");
    writeJson(path, { schema: 2, entry: "src/main.ts", outDir: "out" });
    expect(() => loadConfig(path)).to.throw("Unsupported vessel.json schema.");

    writeJson(path, { schema: 1, entry: "", outDir: "out" });
    expect(() => loadConfig(path)).to.throw("vessel.json: 'entry' must be a non-empty string.");

    writeJson(path, { schema: 1, entry: "src/main.ts", outDir: "out", naming: { prefix: "1bad" } });
    expect(() => loadConfig(path)).to.throw("'naming.prefix' must be a valid identifier prefix");

    writeJson(path, { schema: 1, entry: "src/main.ts", outDir: "out", synthesis: { derivable: ["Equatable", 3] } });
    expect(() => loadConfig(path)).to.throw("'synthesis.derivable' must be an array of non-empty strings");
  });

  it("resolves the project context from nested directories", async () => {
    const root = join(mkdtempSync(join(tmpdir(), "vessel-config-context-")), "demo");
    await runInit({ dir: root, logger: quiet });
    const nested = join(root, "src", "deep");
    mkdirSync(nested, { recursive: true });

    const ctx = loadProjectContext(nested);
    expect(ctx.projectRoot).to.equal(root);
    expect(ctx.config.entry).to.equal("src/main.ts");
    expect(ctx.config.outDir).to.equal("out");
  });

  it("fails outside of any project", () => {
    const root = mkdtempSync(join(tmpdir(), "vessel-config-none-"));
    expect(() => findProjectRoot(root)).to.throw("Could not find vessel.json");
  });
});
