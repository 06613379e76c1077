export type Span = {
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
};

export type NodeBase = {
  readonly span?: Span;
};

export type TypeRef =
  | (NodeBase & { readonly kind: "named"; readonly name: string; readonly args: readonly TypeRef[] })
  | (NodeBase & { readonly kind: "self" })
  | (NodeBase & { readonly kind: "void" });

export type UnaryOp = "!" | "-" | "+";

export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

export type AssignOp = "=" | "+=" | "-=" | "*=" | "/=" | "%=";

export type Expr =
  | (NodeBase & { readonly kind: "ident"; readonly name: string })
  | (NodeBase & { readonly kind: "self" })
  | (NodeBase & { readonly kind: "self_type" })
  | (NodeBase & { readonly kind: "type_ref"; readonly name: string })
  | (NodeBase & { readonly kind: "number"; readonly text: string })
  | (NodeBase & { readonly kind: "string"; readonly value: string })
  | (NodeBase & { readonly kind: "bool"; readonly value: boolean })
  | (NodeBase & { readonly kind: "unary"; readonly op: UnaryOp; readonly operand: Expr })
  | (NodeBase & { readonly kind: "binary"; readonly op: BinaryOp; readonly left: Expr; readonly right: Expr })
  | (NodeBase & { readonly kind: "member"; readonly object: Expr; readonly name: string })
  | (NodeBase & { readonly kind: "index"; readonly object: Expr; readonly index: Expr })
  | (NodeBase & { readonly kind: "call"; readonly callee: Expr; readonly args: readonly Expr[] })
  | (NodeBase & { readonly kind: "construct";
      readonly typeName: string;
      readonly typeArgs: readonly TypeRef[];
      readonly args: readonly Expr[];
    })
  | (NodeBase & { readonly kind: "array"; readonly elements: readonly Expr[] })
  | (NodeBase & {
      readonly kind: "record";
      readonly entries: readonly { readonly key: string; readonly value: Expr }[];
    })
  | (NodeBase & { readonly kind: "closure"; readonly literal: ClosureLiteral });

export type Stmt =
  | (NodeBase & {
      readonly kind: "let";
      readonly name: string;
      readonly mutable: boolean;
      readonly type?: TypeRef;
      readonly init: Expr;
    })
  | (NodeBase & { readonly kind: "assign"; readonly op: AssignOp; readonly target: Expr; readonly value: Expr })
  | (NodeBase & { readonly kind: "expr"; readonly expr: Expr })
  | (NodeBase & { readonly kind: "return"; readonly expr?: Expr })
  | (NodeBase & {
      readonly kind: "if";
      readonly cond: Expr;
      readonly then: readonly Stmt[];
      readonly else?: readonly Stmt[];
    })
  | (NodeBase & { readonly kind: "while"; readonly cond: Expr; readonly body: readonly Stmt[] })
  | (NodeBase & { readonly kind: "throw"; readonly expr: Expr });

export type Param = NodeBase & {
  readonly name: string;
  readonly type?: TypeRef;
};

export type TypedParam = NodeBase & {
  readonly name: string;
  readonly type: TypeRef;
};

export type RequirementKind =
  | "method"
  | "readonly-property"
  | "readonly-subscript"
  | "mutable-property"
  | "mutable-subscript"
  | "static-method";

export type RequirementSignature = {
  readonly params: readonly TypedParam[];
  readonly result: TypeRef;
  readonly mutating: boolean;
  readonly throws: boolean;
};

export type RequirementDecl = NodeBase & {
  readonly kind: RequirementKind;
  readonly name: string;
  readonly signature: RequirementSignature;
};

export type ProtocolDecl = NodeBase & {
  readonly name: string;
  readonly inherits: readonly string[];
  readonly requirements: readonly RequirementDecl[];
};

export type Accessor = NodeBase & {
  readonly valueName: string;
  readonly body: readonly Stmt[];
};

export type MemberDecl =
  | (NodeBase & {
      readonly kind: "method";
      readonly name: string;
      readonly isStatic: boolean;
      readonly mutating: boolean;
      readonly throws: boolean;
      readonly params: readonly TypedParam[];
      readonly ret: TypeRef;
      readonly body: readonly Stmt[];
    })
  | (NodeBase & {
      readonly kind: "property";
      readonly name: string;
      readonly type: TypeRef;
      readonly getter: readonly Stmt[];
      readonly setter?: Accessor;
    })
  | (NodeBase & {
      readonly kind: "subscript";
      readonly params: readonly TypedParam[];
      readonly type: TypeRef;
      readonly getter: readonly Stmt[];
      readonly setter?: Accessor;
    })
  | (NodeBase & {
      readonly kind: "stored";
      readonly name: string;
      readonly type?: TypeRef;
      readonly mutable: boolean;
      readonly init?: Expr;
    });

export type ProtocolExtension = NodeBase & {
  readonly protocol: string;
  readonly members: readonly MemberDecl[];
};

export type CaptureItem = NodeBase & {
  readonly name: string;
  readonly init?: Expr;
  readonly type?: TypeRef;
  /** The checker's type for the captured value, used when nothing more direct is known. */
  readonly inferredType?: TypeRef;
  readonly mutable: boolean;
  readonly byReference: boolean;
  readonly attributes: readonly string[];
};

export type LiteralBody =
  | { readonly kind: "none" }
  | { readonly kind: "statement"; readonly stmts: readonly Stmt[] }
  | { readonly kind: "accessor"; readonly getter: readonly Stmt[]; readonly setter?: Accessor }
  | { readonly kind: "multi-declaration"; readonly members: readonly MemberDecl[] };

export type LiteralBodyKind = LiteralBody["kind"];

export type ClosureLiteral = NodeBase & {
  readonly id: string;
  readonly captureList?: readonly CaptureItem[];
  readonly params: readonly Param[];
  readonly body: LiteralBody;
};

export type ExpectedTypeContext =
  | { readonly kind: "generic"; readonly parameter: string; readonly bounds: readonly string[] }
  | { readonly kind: "existential"; readonly protocols: readonly string[] }
  | { readonly kind: "metatype"; readonly protocols: readonly string[] };

export function namedType(name: string, args: readonly TypeRef[] = []): TypeRef {
  return { kind: "named", name, args };
}

export function voidType(): TypeRef {
  return { kind: "void" };
}

export function identExpr(name: string): Expr {
  return { kind: "ident", name };
}

export function selfExpr(): Expr {
  return { kind: "self" };
}

export function isFunctionLikeKind(kind: RequirementKind): boolean {
  return kind === "method" || kind === "readonly-property" || kind === "readonly-subscript";
}

export function expectedProtocols(expected: ExpectedTypeContext): readonly string[] {
  return expected.kind === "generic" ? expected.bounds : expected.protocols;
}
