import type { MemberDecl, ProtocolDecl, ProtocolExtension, RequirementDecl } from "../ir.js";
import { fail } from "../diagnostics.js";
import { builtinProtocols } from "../lowering/builtin-protocols.js";
import { protocolSetKey, requirementKey } from "../lowering/common.js";
import { deepFreeze, frozenList, type Requirement, type RequirementSet } from "./contracts.js";

export type ProtocolTable = {
  readonly protocols: ReadonlyMap<string, ProtocolDecl>;
  readonly extensions: readonly ProtocolExtension[];
};

// Compiler derivation rules (equality, hashing, ...), supplied by the host.
export type SynthesisRules = {
  readonly canSynthesize: (protocol: ProtocolDecl, requirement: RequirementDecl) => boolean;
};

export function derivableProtocolRules(protocolNames: readonly string[]): SynthesisRules {
  const derivable = new Set(protocolNames);
  return Object.freeze({
    canSynthesize: (protocol: ProtocolDecl) => derivable.has(protocol.name),
  });
}

export function createProtocolTable(
  declared: readonly ProtocolDecl[],
  extensions: readonly ProtocolExtension[]
): ProtocolTable {
  const protocols = new Map<string, ProtocolDecl>();
  for (const decl of declared) {
    if (protocols.has(decl.name)) {
      fail("VSL1001", `Protocol '${decl.name}' is declared more than once.`, decl.span);
    }
    protocols.set(decl.name, decl);
  }
  for (const builtin of builtinProtocols()) {
    if (!protocols.has(builtin.name)) protocols.set(builtin.name, builtin);
  }
  for (const ext of extensions) {
    if (!protocols.has(ext.protocol)) {
      fail("VSL1002", `Extension targets unknown protocol '${ext.protocol}'.`, ext.span);
    }
  }
  return Object.freeze({
    protocols: new Map(protocols),
    extensions: frozenList(extensions),
  });
}

/** Names in `requested` (or protocols they inherit from) missing from the table. */
export function missingProtocols(table: ProtocolTable, requested: readonly string[]): readonly string[] {
  const missing: string[] = [];
  const seen = new Set<string>();
  const visit = (name: string): void => {
    if (seen.has(name)) return;
    seen.add(name);
    const decl = table.protocols.get(name);
    if (!decl) {
      missing.push(name);
      return;
    }
    for (const parent of decl.inherits) visit(parent);
  };
  for (const name of requested) visit(name);
  return missing;
}

function flattenProtocols(table: ProtocolTable, names: readonly string[]): readonly ProtocolDecl[] {
  const out: ProtocolDecl[] = [];
  const seen = new Set<string>();
  const visit = (name: string): void => {
    if (seen.has(name)) return;
    seen.add(name);
    const decl = table.protocols.get(name);
    if (!decl) return;
    for (const parent of decl.inherits) visit(parent);
    out.push(decl);
  };
  for (const name of names) visit(name);
  return out;
}

export function memberRequirementKey(member: MemberDecl): string {
  switch (member.kind) {
    case "method":
      return requirementKey(member.isStatic ? "static-method" : "method", member.name);
    case "property":
    case "stored":
      return requirementKey("readonly-property", member.name);
    case "subscript":
      return requirementKey("readonly-subscript", "subscript");
  }
}

function defaultMembersFor(
  table: ProtocolTable,
  protocolNames: ReadonlySet<string>
): ReadonlyMap<string, MemberDecl> {
  const out = new Map<string, MemberDecl>();
  for (const ext of table.extensions) {
    if (!protocolNames.has(ext.protocol)) continue;
    for (const member of ext.members) {
      const key = memberRequirementKey(member);
      if (!out.has(key)) out.set(key, member);
    }
  }
  return out;
}

/**
 * Classifies the requirements of a protocol conjunction. Inherited protocols
 * come before the protocols refining them; a requirement reachable through
 * several protocols is listed once, at its first position.
 */
export function analyzeRequirements(
  table: ProtocolTable,
  protocols: readonly string[],
  rules: SynthesisRules
): RequirementSet {
  const ordered = [...new Set(protocols)];
  const decls = flattenProtocols(table, ordered);
  const defaults = defaultMembersFor(table, new Set(decls.map((d) => d.name)));

  const byKey = new Map<string, Requirement>();
  for (const decl of decls) {
    for (const req of decl.requirements) {
      const key = requirementKey(req.kind, req.name);
      const defaultImplementation = defaults.get(key);
      const synthesizable = rules.canSynthesize(decl, req);
      const prev = byKey.get(key);
      if (prev) {
        byKey.set(key, {
          ...prev,
          hasDefaultImplementation: prev.hasDefaultImplementation || defaultImplementation !== undefined,
          isCompilerSynthesizable: prev.isCompilerSynthesizable || synthesizable,
        });
        continue;
      }
      byKey.set(key, {
        key,
        protocol: decl.name,
        kind: req.kind,
        name: req.name,
        signature: req.signature,
        hasDefaultImplementation: defaultImplementation !== undefined,
        isCompilerSynthesizable: synthesizable,
        defaultImplementation,
        span: req.span,
      });
    }
  }

  const requirements = [...byKey.values()];
  return {
    key: protocolSetKey(ordered),
    protocols: ordered,
    requirements,
    staticRequirements: requirements.filter((r) => r.kind === "static-method"),
    uncoveredRequirements: requirements.filter((r) => !r.hasDefaultImplementation && !r.isCompilerSynthesizable),
  };
}

/**
 * Memoizes one published `RequirementSet` per distinct protocol set. A set is
 * deeply frozen before it is published and never replaced afterwards.
 */
export class RequirementCache {
  readonly #published = new Map<string, RequirementSet>();
  #computations = 0;

  get computations(): number {
    return this.#computations;
  }

  get size(): number {
    return this.#published.size;
  }

  getOrCompute(key: string, compute: () => RequirementSet): RequirementSet {
    const published = this.#published.get(key);
    if (published) return published;
    const computed = deepFreeze(compute());
    this.#computations++;
    this.#published.set(key, computed);
    return computed;
  }
}

export function requirementSetFor(
  table: ProtocolTable,
  cache: RequirementCache,
  protocols: readonly string[],
  rules: SynthesisRules
): RequirementSet {
  const key = protocolSetKey(protocols);
  // Analyze in key order so the published set does not depend on which caller came first.
  return cache.getOrCompute(key, () => analyzeRequirements(table, key.split("&"), rules));
}
