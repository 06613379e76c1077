import { existsSync, readFileSync } from "node:fs";
import { dirname, join, relative, resolve } from "node:path";

import { CompileError, lowerHostProgram, type LowerHostOutput, type Span } from "@vessel/compiler";

import type { ProjectContext } from "./config.js";

export type CliLogger = {
  readonly log: (line: string) => void;
  readonly error: (line: string) => void;
};

export type ProjectLowering = {
  readonly entryFile: string;
  // Undefined when a fatal error stopped the run.
  readonly output?: LowerHostOutput;
  // One `file:line:col: CODE: message` line per problem.
  readonly diagnostics: readonly string[];
  readonly displayPath: (fileName: string) => string;
};

function normalizePath(p: string): string {
  return p.replaceAll("\\", "/");
}

function posToLineCol(text: string, pos: number): { readonly line: number; readonly col: number } {
  // 1-based, like most compilers.
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

/** Lowers the project's entry and renders every problem against project-relative paths. */
export function lowerProject(ctx: ProjectContext): ProjectLowering {
  const entryFile = resolve(ctx.projectRoot, ctx.config.entry);
  const entryDir = dirname(entryFile);
  // Compiler spans are relative to the entry's directory.
  const displayPath = (fileName: string): string => normalizePath(relative(ctx.projectRoot, resolve(entryDir, fileName)));

  const fatalLine = (err: CompileError): string => {
    const span: Span | undefined = err.span;
    if (!span) return `${err.code}: ${err.message}`;
    const source = resolve(entryDir, span.fileName);
    // A missing entry is reported at the file start.
    const pos = existsSync(source) ? posToLineCol(readFileSync(source, "utf-8"), span.start) : { line: 1, col: 1 };
    return `${displayPath(span.fileName)}:${pos.line}:${pos.col}: ${err.code}: ${err.message}`;
  };

  try {
    const output = lowerHostProgram({
      entryFile,
      namePrefix: ctx.config.naming.prefix,
      derivableProtocols: ctx.config.synthesis.derivable,
    });
    const diagnostics = output.issues.map(
      (issue) => `${displayPath(issue.fileName)}:${issue.line}:${issue.column}: ${issue.code}: ${issue.message}`
    );
    return { entryFile, output, diagnostics, displayPath };
  } catch (err: unknown) {
    if (err instanceof CompileError) return { entryFile, diagnostics: [fatalLine(err)], displayPath };
    throw err;
  }
}

export function outputFileFor(ctx: ProjectContext): string {
  return join(ctx.projectRoot, ctx.config.outDir, "lowered.vsl.txt");
}
