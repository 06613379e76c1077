import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { DEFAULT_ANON_PREFIX, DEFAULT_DERIVABLE_PROTOCOLS, isValidNamePrefix } from "@vessel/compiler";

export const CONFIG_FILE_NAME = "vessel.json";

export type VesselConfig = {
  readonly schema: 1;
  readonly entry: string;
  readonly outDir: string;
  readonly naming: {
    readonly prefix: string;
  };
  readonly synthesis: {
    readonly derivable: readonly string[];
  };
};

export type ProjectContext = {
  readonly projectRoot: string;
  readonly config: VesselConfig;
};

export function defaultConfig(): VesselConfig {
  return {
    schema: 1,
    entry: "src/main.ts",
    outDir: "out",
    naming: { prefix: DEFAULT_ANON_PREFIX },
    synthesis: { derivable: [...DEFAULT_DERIVABLE_PROTOCOLS] },
  };
}

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string" && entry.length > 0)) {
    throw new Error(`${label} must be an array of non-empty strings.`);
  }
  return value;
}

function parseConfig(value: unknown): VesselConfig {
  const root = asRecord(value, CONFIG_FILE_NAME);
  assertKnownKeys(root, ["schema", "entry", "outDir", "naming", "synthesis"], CONFIG_FILE_NAME);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE_NAME} schema.`);
  }

  const entry = asString(root.entry, `${CONFIG_FILE_NAME}: 'entry'`);
  const outDir = asString(root.outDir, `${CONFIG_FILE_NAME}: 'outDir'`);
  const defaults = defaultConfig();

  let prefix = defaults.naming.prefix;
  if (root.naming !== undefined) {
    const naming = asRecord(root.naming, `${CONFIG_FILE_NAME}: 'naming'`);
    assertKnownKeys(naming, ["prefix"], `${CONFIG_FILE_NAME}: 'naming'`);
    prefix = asString(naming.prefix, `${CONFIG_FILE_NAME}: 'naming.prefix'`);
    if (!isValidNamePrefix(prefix)) {
      throw new Error(`${CONFIG_FILE_NAME}: 'naming.prefix' must be a valid identifier prefix.`);
    }
  }

  let derivable = defaults.synthesis.derivable;
  if (root.synthesis !== undefined) {
    const synthesis = asRecord(root.synthesis, `${CONFIG_FILE_NAME}: 'synthesis'`);
    assertKnownKeys(synthesis, ["derivable"], `${CONFIG_FILE_NAME}: 'synthesis'`);
    derivable = asStringArray(synthesis.derivable, `${CONFIG_FILE_NAME}: 'synthesis.derivable'`);
  }

  return {
    schema: 1,
    entry,
    outDir,
    naming: { prefix },
    synthesis: { derivable },
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export function writeConfig(path: string, value: VesselConfig): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

export function findProjectRoot(fromDir: string): string {
  let cur = resolve(fromDir);
  while (true) {
    if (existsSync(join(cur, CONFIG_FILE_NAME))) return cur;
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  throw new Error(`Could not find ${CONFIG_FILE_NAME} in this directory or any parent.`);
}

export function loadConfig(path: string): VesselConfig {
  return parseConfig(readJson(path));
}

export function loadProjectContext(fromDir: string): ProjectContext {
  const projectRoot = findProjectRoot(fromDir);
  const config = loadConfig(join(projectRoot, CONFIG_FILE_NAME));
  return { projectRoot, config };
}
