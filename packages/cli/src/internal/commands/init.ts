import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { CONFIG_FILE_NAME, defaultConfig, writeConfig } from "../config.js";
import type { CliLogger } from "../project.js";

export type InitArgs = {
  readonly dir: string;
  readonly logger?: CliLogger;
};

const sampleEntry = [
  'import { anon } from "@vessel/core";',
  "",
  "export interface Predicate {",
  "  evaluate(value: string): boolean;",
  "}",
  "",
  "export function main(): void {",
  '  const expected = "vessel";',
  "  const matches: Predicate = anon((value: string) => value === expected);",
  '  console.log(matches.evaluate("vessel"));',
  "}",
  "",
].join("\n");

export async function runInit(args: InitArgs): Promise<void> {
  const root = resolve(args.dir);
  const configPath = join(root, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    throw new Error(`${CONFIG_FILE_NAME} already exists in ${root}; refusing to overwrite it.`);
  }

  const config = defaultConfig();
  mkdirSync(root, { recursive: true });
  writeConfig(configPath, config);

  const entry = join(root, config.entry);
  if (!existsSync(entry)) {
    mkdirSync(dirname(entry), { recursive: true });
    writeFileSync(entry, sampleEntry, "utf-8");
  }
  (args.logger ?? console).log(`Created ${CONFIG_FILE_NAME} and ${config.entry}.`);
}
