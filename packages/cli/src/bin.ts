#!/usr/bin/env node
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { runCheck } from "./internal/commands/check.js";
import { runInit } from "./internal/commands/init.js";
import { runLower } from "./internal/commands/lower.js";

export type Cmd = "init" | "lower" | "check" | "help";

function usage(): void {
  console.log(
    [
      "vessel",
      "",
      "Usage:",
      "  vessel init    create vessel.json and a sample src/main.ts",
      "  vessel lower   lower closure literals and write <outDir>/lowered.vsl.txt",
      "  vessel check   report diagnostics without writing output",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "init" || cmd === "lower" || cmd === "check" || cmd === "help") return cmd;
  return "help";
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "init":
        await runInit({ dir: cwd() });
        return;
      case "lower": {
        const { issues } = await runLower({ dir: cwd() });
        if (issues > 0) exit(1);
        return;
      }
      case "check": {
        const { issues } = await runCheck({ dir: cwd() });
        if (issues > 0) exit(1);
        return;
      }
      default:
        usage();
        exit(1);
    }
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : err);
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
