import type { Span } from "../hierarchy/ir.js";

export type { Span } from "../hierarchy/ir.js";

export type NodeBase = {
  readonly span?: Span;
};

export type RustPath = {
  readonly segments: readonly string[];
};

export type RustType =
  // Verbatim type text from the hierarchy description.
  | (NodeBase & { readonly kind: "opaque"; readonly text: string })
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath; readonly args: readonly RustType[] });

export type RustGenericParam = NodeBase & { readonly text: string };

export type RustExpr =
  | (NodeBase & { readonly kind: "ident"; readonly name: string })
  | (NodeBase & {
      readonly kind: "qualified_call";
      readonly selfType: RustType;
      readonly member: string;
      readonly args: readonly RustExpr[];
    });

export type RustStmt = NodeBase & { readonly kind: "tail"; readonly expr: RustExpr };

export type RustParam = NodeBase & { readonly name: string; readonly type: RustType };

/** The derived conversion an impl was generated for. */
export type ConversionOrigin = {
  readonly descendant: string;
  readonly intermediate: string;
  readonly ancestor: string;
};

export type RustFn = NodeBase & {
  readonly kind: "fn";
  readonly name: string;
  readonly params: readonly RustParam[];
  readonly ret?: RustType;
  readonly body: readonly RustStmt[];
};

export type RustItem = NodeBase & {
  readonly kind: "impl";
  readonly generics: readonly RustGenericParam[];
  readonly traitType: RustType;
  readonly selfType: RustType;
  readonly origin?: ConversionOrigin;
  readonly items: readonly RustFn[];
};

export type RustProgram = NodeBase & {
  readonly kind: "program";
  readonly items: readonly RustItem[];
};

export function opaqueType(text: string, span?: Span): RustType {
  return span ? { kind: "opaque", text, span } : { kind: "opaque", text };
}

export function pathType(segments: readonly string[], args: readonly RustType[] = []): RustType {
  return { kind: "path", path: { segments }, args };
}

export function identExpr(name: string): RustExpr {
  return { kind: "ident", name };
}

export function qualifiedCall(selfType: RustType, member: string, args: readonly RustExpr[]): RustExpr {
  return { kind: "qualified_call", selfType, member, args };
}
