import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, relative } from "node:path";

import { loadProjectContext } from "../config.js";
import { lowerProject, outputFileFor, type CliLogger } from "../project.js";

export type LowerArgs = {
  readonly dir: string;
  readonly logger?: CliLogger;
};

export type LowerResult = {
  // Absent when a fatal error stopped lowering.
  readonly outFile?: string;
  readonly issues: number;
};

export async function runLower(args: LowerArgs): Promise<LowerResult> {
  const logger = args.logger ?? console;
  const ctx = loadProjectContext(args.dir);
  const { output, diagnostics, displayPath } = lowerProject(ctx);
  if (!output) {
    for (const line of diagnostics) logger.error(line);
    return { issues: diagnostics.length };
  }

  const outFile = outputFileFor(ctx);
  mkdirSync(dirname(outFile), { recursive: true });
  writeFileSync(outFile, output.text, "utf-8");

  for (const lit of output.literals) {
    const at = `${displayPath(lit.fileName)}:${lit.line}:${lit.column}`;
    if (lit.kind === "rejected") {
      logger.error(`${at}: ${lit.issue.code}: ${lit.issue.message}`);
      continue;
    }
    logger.log(`${at}: ${lit.structName} <= ${lit.replacement}`);
  }
  logger.log(`Wrote ${relative(ctx.projectRoot, outFile).replaceAll("\\", "/")}`);
  return { outFile, issues: output.issues.length };
}
