import ts from "typescript";

import { markerCallOf, type MarkerBindings } from "../lowering/markers.js";

export type ScannedLiteral = {
  readonly call: ts.CallExpression;
  readonly sourceFile: ts.SourceFile;
  readonly literalId: string;
  readonly line: number;
  readonly column: number;
};

type LiteralScanPassDeps = {
  readonly markersFor: (sf: ts.SourceFile) => MarkerBindings;
  readonly mapSpanFileName: (fileName: string) => string;
};

/**
 * Finds `anon(...)` calls in source order. A literal nested inside another
 * literal's arguments is left to the outer one, which rejects it.
 */
export function scanLiteralsPass(
  userSourceFiles: readonly ts.SourceFile[],
  deps: LiteralScanPassDeps
): readonly ScannedLiteral[] {
  const out: ScannedLiteral[] = [];
  for (const sf of userSourceFiles) {
    const markers = deps.markersFor(sf);
    if (markers.named.size === 0 && markers.namespaces.size === 0) continue;
    const fileName = deps.mapSpanFileName(sf.fileName);
    const visit = (node: ts.Node): void => {
      if (ts.isCallExpression(node) && markerCallOf(markers, node) === "anon") {
        const pos = sf.getLineAndCharacterOfPosition(node.getStart(sf, false));
        const line = pos.line + 1;
        const column = pos.character + 1;
        out.push({ call: node, sourceFile: sf, literalId: `${fileName}:${line}:${column}`, line, column });
        return;
      }
      ts.forEachChild(node, visit);
    };
    ts.forEachChild(sf, visit);
  }
  return Object.freeze(out);
}
