import type { Accessor, Expr, MemberDecl, Stmt, TypedParam, TypeRef } from "./ir.js";
import { namedType } from "./ir.js";
import type { StructField, SynthesizedStructType } from "./passes/contracts.js";

function emitType(ty: TypeRef): string {
  if (ty.kind === "void") return "void";
  if (ty.kind === "self") return "Self";
  if (ty.args.length === 0) return ty.name;
  return `${ty.name}<${ty.args.map(emitType).join(", ")}>`;
}

// Binary operands are parenthesized only when nested in another operator.
function emitExpr(expr: Expr, nested = false): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "self":
      return "this";
    case "self_type":
      return "Self";
    case "type_ref":
      return expr.name;
    case "number":
      return expr.text;
    case "string":
      return JSON.stringify(expr.value);
    case "bool":
      return expr.value ? "true" : "false";
    case "unary":
      return `${expr.op}${emitExpr(expr.operand, true)}`;
    case "binary": {
      const text = `${emitExpr(expr.left, true)} ${expr.op} ${emitExpr(expr.right, true)}`;
      return nested ? `(${text})` : text;
    }
    case "member":
      return `${emitExpr(expr.object, true)}.${expr.name}`;
    case "index":
      return `${emitExpr(expr.object, true)}[${emitExpr(expr.index)}]`;
    case "call":
      return `${emitExpr(expr.callee, true)}(${expr.args.map((a) => emitExpr(a)).join(", ")})`;
    case "construct":
      return `new ${emitType(namedType(expr.typeName, expr.typeArgs))}(${expr.args.map((a) => emitExpr(a)).join(", ")})`;
    case "array":
      return `[${expr.elements.map((el) => emitExpr(el)).join(", ")}]`;
    case "record":
      if (expr.entries.length === 0) return "{}";
      return `{ ${expr.entries.map((entry) => `${entry.key}: ${emitExpr(entry.value)}`).join(", ")} }`;
    case "closure":
      return `<literal ${expr.literal.id}>`;
  }
}

function emitBlock(stmts: readonly Stmt[], indent: string): string[] {
  const out: string[] = [];
  for (const st of stmts) out.push(...emitStmtLines(st, indent));
  return out;
}

function emitStmtLines(st: Stmt, indent: string): string[] {
  const inner = `${indent}  `;
  switch (st.kind) {
    case "let": {
      const ty = st.type ? `: ${emitType(st.type)}` : "";
      return [`${indent}${st.mutable ? "let" : "const"} ${st.name}${ty} = ${emitExpr(st.init)};`];
    }
    case "assign":
      return [`${indent}${emitExpr(st.target)} ${st.op} ${emitExpr(st.value)};`];
    case "expr":
      return [`${indent}${emitExpr(st.expr)};`];
    case "return":
      return [st.expr ? `${indent}return ${emitExpr(st.expr)};` : `${indent}return;`];
    case "throw":
      return [`${indent}throw ${emitExpr(st.expr)};`];
    case "while":
      return [`${indent}while (${emitExpr(st.cond)}) {`, ...emitBlock(st.body, inner), `${indent}}`];
    case "if": {
      const out = [`${indent}if (${emitExpr(st.cond)}) {`, ...emitBlock(st.then, inner)];
      if (st.else) out.push(`${indent}} else {`, ...emitBlock(st.else, inner));
      out.push(`${indent}}`);
      return out;
    }
  }
}

function emitParams(params: readonly TypedParam[]): string {
  return params.map((p) => `${p.name}: ${emitType(p.type)}`).join(", ");
}

function emitSetter(head: string, setter: Accessor, type: TypeRef, indent: string): string[] {
  return [
    `${indent}${head}(${setter.valueName}: ${emitType(type)}) {`,
    ...emitBlock(setter.body, `${indent}  `),
    `${indent}}`,
  ];
}

function emitMember(member: MemberDecl, indent: string): string[] {
  const inner = `${indent}  `;
  switch (member.kind) {
    case "method": {
      const mods = `${member.isStatic ? "static " : ""}${member.mutating ? "mutating " : ""}`;
      const throwsClause = member.throws ? " throws" : "";
      return [
        `${indent}${mods}${member.name}(${emitParams(member.params)}): ${emitType(member.ret)}${throwsClause} {`,
        ...emitBlock(member.body, inner),
        `${indent}}`,
      ];
    }
    case "property": {
      const out = [`${indent}get ${member.name}(): ${emitType(member.type)} {`, ...emitBlock(member.getter, inner), `${indent}}`];
      if (member.setter) out.push(...emitSetter(`set ${member.name}`, member.setter, member.type, indent));
      return out;
    }
    case "subscript": {
      const keys = emitParams(member.params);
      const out = [`${indent}get [${keys}]: ${emitType(member.type)} {`, ...emitBlock(member.getter, inner), `${indent}}`];
      if (member.setter) out.push(...emitSetter(`set [${keys}]`, member.setter, member.type, indent));
      return out;
    }
    case "stored": {
      const ty = member.type ? `: ${emitType(member.type)}` : "";
      const init = member.init ? ` = ${emitExpr(member.init)}` : "";
      return [`${indent}${member.mutable ? "" : "readonly "}${member.name}${ty}${init};`];
    }
  }
}

function emitField(field: StructField, indent: string): string {
  const attrs = field.attributes.map((a) => `@${a} `).join("");
  const readonly = field.mutable ? "" : "readonly ";
  return `${indent}${attrs}${field.visibility} ${readonly}${field.name}: ${emitType(field.type)};`;
}

export function writeStruct(decl: SynthesizedStructType, indent = ""): string[] {
  const inner = `${indent}  `;
  const conformances = decl.conformances.length > 0 ? ` implements ${decl.conformances.join(", ")}` : "";
  const out = [`${indent}struct ${decl.name}${conformances} {`];
  for (const field of decl.fields) out.push(emitField(field, inner));
  for (const member of decl.members) {
    if (out.length > 1) out.push("");
    out.push(...emitMember(member, inner));
  }
  out.push(`${indent}}`);
  return out;
}

export function writeExpr(expr: Expr): string {
  return emitExpr(expr);
}

export function writeStmts(stmts: readonly Stmt[], indent = ""): string {
  return emitBlock(stmts, indent).join("\n");
}

export type LoweredProgram = {
  readonly structs: readonly SynthesizedStructType[];
  readonly replacements: readonly { readonly location: string; readonly expr: Expr }[];
};

export function writeLoweredProgram(program: LoweredProgram, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  for (const decl of program.structs) {
    if (parts.length > 0) parts.push("");
    parts.push(...writeStruct(decl));
  }
  if (program.replacements.length > 0) {
    if (parts.length > 0) parts.push("");
    for (const r of program.replacements) parts.push(`${r.location} => ${emitExpr(r.expr)}`);
  }
  parts.push("");
  return parts.join("\n");
}
