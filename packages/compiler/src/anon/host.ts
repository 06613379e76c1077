import { dirname, resolve } from "node:path";

import ts from "typescript";

import { assertCompilerDiagnosticCode, CompileError, fail, type CompileIssue } from "./diagnostics.js";
import type { ClosureLiteral, ExpectedTypeContext, Span } from "./ir.js";
import { expectedProtocols } from "./ir.js";
import { createLoweringSession, lowerClosureLiteral, type LiteralInput, type LoweredLiteral } from "./lower.js";
import { compareText, normalizePath } from "./lowering/common.js";
import type { ExprLoweringDeps } from "./lowering/expr-lowering.js";
import { expectedTypeFor, parseClosureLiteral, type HostLiteralDeps } from "./lowering/host-literal.js";
import { createHostScope } from "./lowering/host-scope.js";
import { collectMarkerBindings, markerCallOf, type MarkerBindings } from "./lowering/markers.js";
import type { EnclosingScope } from "./lowering/scope.js";
import { runBootstrapPass } from "./passes/bootstrap.js";
import type { SynthesizedStructType } from "./passes/contracts.js";
import { scanLiteralsPass, type ScannedLiteral } from "./passes/literal-scan.js";
import {
  brokenProtocolIssue,
  createProtocolIndexPass,
  parseExtensionsPass,
  parseProtocolsPass,
} from "./passes/protocol-index.js";
import { writeExpr, writeLoweredProgram } from "./write.js";

export type LowerHostOptions = {
  readonly entryFile: string;
  readonly namePrefix?: string;
  readonly derivableProtocols?: readonly string[];
};

export type LiteralReport = {
  readonly literalId: string;
  readonly fileName: string;
  readonly line: number;
  readonly column: number;
  readonly span: Span;
} & (
  | { readonly kind: "lowered"; readonly structName: string; readonly replacement: string }
  | { readonly kind: "rejected"; readonly issue: CompileIssue }
);

export type HostIssue = CompileIssue & {
  readonly fileName: string;
  readonly line: number;
  readonly column: number;
};

export type LowerHostOutput = {
  readonly structs: readonly SynthesizedStructType[];
  readonly lowered: readonly LoweredLiteral[];
  readonly literals: readonly LiteralReport[];
  readonly issues: readonly HostIssue[];
  readonly text: string;
};

export const LOWERED_PROGRAM_HEADER: readonly string[] = Object.freeze(["// Generated by @vessel/compiler"]);

function syntheticSpanForFile(fileName: string): Span {
  return {
    fileName: mapSpanFileName(fileName),
    start: 0,
    end: 0,
  };
}

function createSpanFileNameMapper(entryFile: string): (raw: string) => string {
  const entryDir = normalizePath(resolve(dirname(entryFile)));
  return (raw: string): string => {
    const abs = normalizePath(resolve(raw));
    const rel = normalizePath(
      abs === entryDir ? "." : abs.startsWith(`${entryDir}/`) ? abs.slice(entryDir.length + 1) : abs
    );
    return rel.length === 0 ? "." : rel;
  };
}

let activeSpanFileNameMapper: ((raw: string) => string) | undefined;

function withSpanFileNameMapper<T>(mapper: (raw: string) => string, fn: () => T): T {
  const prev = activeSpanFileNameMapper;
  activeSpanFileNameMapper = mapper;
  try {
    return fn();
  } finally {
    activeSpanFileNameMapper = prev;
  }
}

function mapSpanFileName(raw: string): string {
  const normalized = normalizePath(raw);
  return activeSpanFileNameMapper ? activeSpanFileNameMapper(normalized) : normalized;
}

function spanFromNode(node: ts.Node): Span {
  const sf = node.getSourceFile();
  return {
    fileName: mapSpanFileName(sf.fileName),
    start: node.getStart(sf, false),
    end: node.getEnd(),
  };
}

function failAt(node: ts.Node, code: string, message: string): never {
  assertCompilerDiagnosticCode(code);
  throw new CompileError(code, message, spanFromNode(node));
}

function isInNodeModules(fileName: string): boolean {
  return normalizePath(fileName).includes("/node_modules/");
}

type PreparedLiteral =
  | { readonly kind: "ready"; readonly scanned: ScannedLiteral; readonly input: LiteralInput }
  | { readonly kind: "failed"; readonly scanned: ScannedLiteral; readonly issue: CompileIssue };

function prepareLiteral(
  scanned: ScannedLiteral,
  checker: ts.TypeChecker,
  deps: HostLiteralDeps
): PreparedLiteral {
  try {
    const literal: ClosureLiteral = parseClosureLiteral(scanned.call, scanned.literalId, deps);
    const expected: ExpectedTypeContext = expectedTypeFor(scanned.call, deps);
    const scope: EnclosingScope = createHostScope(checker, scanned.call);
    return { kind: "ready", scanned, input: { literal, expected, scope } };
  } catch (error) {
    if (error instanceof CompileError) return { kind: "failed", scanned, issue: error.toIssue() };
    throw error;
  }
}

/**
 * Lowers every closure literal reachable from `entryFile`. Syntax errors and
 * malformed extensions abort the whole run with a `CompileError`. A malformed
 * protocol is reported on each literal that reaches it, and errors in a single
 * literal are reported for that literal; the rest still lower.
 */
export function lowerHostProgram(opts: LowerHostOptions): LowerHostOutput {
  const spanMapper = createSpanFileNameMapper(opts.entryFile);
  return withSpanFileNameMapper(spanMapper, () => lowerHostProgramImpl(opts));
}

function lowerHostProgramImpl(opts: LowerHostOptions): LowerHostOutput {
  // Phase 1: build the program; only syntax errors stop here.
  const { checker, userSourceFiles } = runBootstrapPass(opts, {
    fail,
    isInNodeModules,
    syntheticSpanForFile,
    mapSpanFileName,
    compareText,
  });

  // Phase 2: marker imports per file.
  const markersByFile = new Map<string, MarkerBindings>();
  const markersFor = (sf: ts.SourceFile): MarkerBindings => {
    const cached = markersByFile.get(sf.fileName);
    if (cached) return cached;
    const bindings = collectMarkerBindings(sf);
    markersByFile.set(sf.fileName, bindings);
    return bindings;
  };
  const exprDeps: ExprLoweringDeps = {
    failAt,
    spanFromNode,
    isLiteralMarker: (call) => markerCallOf(markersFor(call.getSourceFile()), call) === "anon",
  };

  // Phase 3: index interfaces and top-level extensions.
  const index = createProtocolIndexPass(userSourceFiles, { ...exprDeps, markersFor });

  // Phase 4: scan literals and read each one's body, expected type and scope.
  const scanned = scanLiteralsPass(userSourceFiles, { markersFor, mapSpanFileName });
  const prepared = scanned.map((s) =>
    prepareLiteral(s, checker, { ...exprDeps, checker, markers: markersFor(s.sourceFile) })
  );

  // Phase 5: parse the protocols the literals and extensions name.
  const roots = new Set<string>();
  for (const p of prepared) {
    if (p.kind === "ready") expectedProtocols(p.input.expected).forEach((name) => roots.add(name));
  }
  const extensions = parseExtensionsPass(index, exprDeps);
  for (const ext of extensions) roots.add(ext.protocol);
  const parsed = parseProtocolsPass(index, roots, exprDeps);

  // Phase 6: lower through one session so struct names and analyses are shared.
  // Extensions of a broken protocol go with it; only literals reaching it fail.
  const session = createLoweringSession({
    protocols: parsed.protocols,
    extensions: extensions.filter((ext) => !parsed.broken.has(ext.protocol)),
    namePrefix: opts.namePrefix,
    derivableProtocols: opts.derivableProtocols,
  });

  const lowered: LoweredLiteral[] = [];
  const literals: LiteralReport[] = [];
  const issues: HostIssue[] = [];
  for (const p of prepared) {
    const { scanned: s } = p;
    const base = {
      literalId: s.literalId,
      fileName: mapSpanFileName(s.sourceFile.fileName),
      line: s.line,
      column: s.column,
      span: spanFromNode(s.call),
    };
    const report = (issue: CompileIssue): void => {
      literals.push({ ...base, kind: "rejected", issue });
      issues.push({ ...issue, fileName: base.fileName, line: s.line, column: s.column });
    };
    if (p.kind === "failed") {
      report(p.issue);
      continue;
    }
    const broken = brokenProtocolIssue(parsed, expectedProtocols(p.input.expected));
    if (broken) {
      report(broken);
      continue;
    }
    const outcome = lowerClosureLiteral(session, p.input);
    if (outcome.kind === "rejected") {
      report(outcome.issue);
      continue;
    }
    lowered.push(outcome.value);
    literals.push({
      ...base,
      kind: "lowered",
      structName: outcome.value.struct.name,
      replacement: writeExpr(outcome.value.replacement),
    });
  }

  // Phase 7: render.
  const structs = lowered.map((l) => l.struct);
  const text = writeLoweredProgram(
    {
      structs,
      replacements: lowered.map((l) => ({ location: l.literalId, expr: l.replacement })),
    },
    { header: LOWERED_PROGRAM_HEADER }
  );

  return Object.freeze({
    structs: Object.freeze(structs),
    lowered: Object.freeze(lowered),
    literals: Object.freeze(literals),
    issues: Object.freeze(issues),
    text,
  });
}
