import ts from "typescript";

import type { Span } from "../ir.js";

export type HostBootstrapOptions = {
  readonly entryFile: string;
};

export type HostBootstrap = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly entrySourceFile: ts.SourceFile;
  readonly userSourceFiles: readonly ts.SourceFile[];
};

type BootstrapPassDeps = {
  readonly fail: (code: string, message: string, span?: Span) => never;
  readonly isInNodeModules: (fileName: string) => boolean;
  readonly syntheticSpanForFile: (fileName: string) => Span;
  readonly mapSpanFileName: (fileName: string) => string;
  readonly compareText: (a: string, b: string) => number;
};

/**
 * Builds the program. Only syntax errors are fatal: marker imports need not
 * resolve for lowering, so semantic diagnostics are left to the host build.
 */
export function runBootstrapPass(opts: HostBootstrapOptions, deps: BootstrapPassDeps): HostBootstrap {
  const compilerOptions: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.NodeNext,
    moduleResolution: ts.ModuleResolutionKind.NodeNext,
    strict: true,
    skipLibCheck: true,
    noEmit: true,
    types: [],
  };

  const host = ts.createCompilerHost(compilerOptions, true);
  const program = ts.createProgram([opts.entryFile], compilerOptions, host);

  const entrySourceFile = program.getSourceFile(opts.entryFile);
  if (!entrySourceFile) {
    deps.fail("VSL0001", `Could not read entry file: ${opts.entryFile}`, deps.syntheticSpanForFile(opts.entryFile));
  }

  const userSourceFiles = program
    .getSourceFiles()
    .filter((f) => !f.isDeclarationFile && !deps.isInNodeModules(f.fileName))
    .sort((a, b) => deps.compareText(deps.mapSpanFileName(a.fileName), deps.mapSpanFileName(b.fileName)));

  for (const sf of userSourceFiles) {
    const d = program.getSyntacticDiagnostics(sf).at(0);
    if (!d) continue;
    const msg = ts.flattenDiagnosticMessageText(d.messageText, "\n");
    const fileName = deps.mapSpanFileName(sf.fileName);
    const start = d.start ?? 0;
    const pos = sf.getLineAndCharacterOfPosition(start);
    deps.fail("VSL0002", `${fileName}:${pos.line + 1}:${pos.character + 1}: ${msg}`, {
      fileName,
      start,
      end: d.length !== undefined ? start + d.length : start,
    });
  }

  return Object.freeze({
    program,
    checker: program.getTypeChecker(),
    entrySourceFile,
    userSourceFiles: Object.freeze([...userSourceFiles]),
  });
}
