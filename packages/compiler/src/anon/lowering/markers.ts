import ts from "typescript";

const markerModuleSpecifiers = new Set<string>(["@vessel/core", "@vessel/core/lang.js", "@vessel/core/types.js"]);

const markerNames = ["anon", "mutable", "byRef", "tagged", "extend"] as const;

export type MarkerName = (typeof markerNames)[number];

function isMarkerName(name: string): name is MarkerName {
  return markerNames.some((m) => m === name);
}

export function isMarkerModuleSpecifier(spec: string): boolean {
  return markerModuleSpecifiers.has(spec);
}

/** Local names a file binds to the compile-time markers, including aliased and namespace imports. */
export type MarkerBindings = {
  readonly named: ReadonlyMap<string, MarkerName>;
  readonly namespaces: ReadonlySet<string>;
};

export function collectMarkerBindings(sf: ts.SourceFile): MarkerBindings {
  const named = new Map<string, MarkerName>();
  const namespaces = new Set<string>();
  for (const st of sf.statements) {
    if (!ts.isImportDeclaration(st) || !ts.isStringLiteral(st.moduleSpecifier)) continue;
    if (!isMarkerModuleSpecifier(st.moduleSpecifier.text)) continue;
    const bindings = st.importClause?.namedBindings;
    if (!bindings) continue;
    if (ts.isNamespaceImport(bindings)) {
      namespaces.add(bindings.name.text);
      continue;
    }
    for (const el of bindings.elements) {
      const imported = (el.propertyName ?? el.name).text;
      if (isMarkerName(imported)) named.set(el.name.text, imported);
    }
  }
  return { named, namespaces };
}

export function markerOf(bindings: MarkerBindings, callee: ts.Expression): MarkerName | undefined {
  if (ts.isIdentifier(callee)) return bindings.named.get(callee.text);
  if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.expression)) {
    if (!bindings.namespaces.has(callee.expression.text)) return undefined;
    const name = callee.name.text;
    return isMarkerName(name) ? name : undefined;
  }
  return undefined;
}

export function markerCallOf(bindings: MarkerBindings, node: ts.Node): MarkerName | undefined {
  return ts.isCallExpression(node) ? markerOf(bindings, node.expression) : undefined;
}
