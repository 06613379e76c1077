import { loadProjectContext } from "../config.js";
import { lowerProject, type CliLogger } from "../project.js";

export type CheckArgs = {
  readonly dir: string;
  readonly logger?: CliLogger;
};

export type CheckResult = {
  readonly issues: number;
};

export async function runCheck(args: CheckArgs): Promise<CheckResult> {
  const logger = args.logger ?? console;
  const { output, diagnostics } = lowerProject(loadProjectContext(args.dir));
  for (const line of diagnostics) logger.error(line);

  const literals = output?.literals.length ?? 0;
  if (diagnostics.length === 0) {
    logger.log(`No issues in ${literals} literal(s).`);
  } else {
    logger.log(`${diagnostics.length} issue(s) in ${literals} literal(s).`);
  }
  return { issues: diagnostics.length };
}
