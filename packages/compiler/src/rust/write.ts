import type { Span } from "../hierarchy/ir.js";
import type { ConversionOrigin, RustExpr, RustFn, RustItem, RustParam, RustProgram, RustStmt, RustType } from "./ir.js";

export const SPAN_COMMENT_PREFIX = "// upcast-span: ";

export type WriteRustOptions = {
  readonly header?: readonly string[];
  readonly spanComments?: boolean;
};

/**
 * Payload of a span marker. `from`/`via`/`to` are present when the impl was
 * generated for a derived conversion.
 */
export type SpanMarker = {
  readonly file: string;
  readonly start: number;
  readonly end: number;
  readonly from?: string;
  readonly via?: string;
  readonly to?: string;
};

function emitPath(segments: readonly string[]): string {
  return segments.join("::");
}

function emitType(ty: RustType): string {
  if (ty.kind === "opaque") return ty.text;
  const base = emitPath(ty.path.segments);
  if (ty.args.length === 0) return base;
  return `${base}<${ty.args.map(emitType).join(", ")}>`;
}

function emitExpr(expr: RustExpr): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "qualified_call":
      return `<${emitType(expr.selfType)}>::${expr.member}(${expr.args.map(emitExpr).join(", ")})`;
  }
}

function emitStmt(st: RustStmt, indent: string): string {
  return `${indent}${emitExpr(st.expr)}`;
}

function emitParam(p: RustParam): string {
  return `${p.name}: ${emitType(p.type)}`;
}

/** One-line marker: the prefix followed by a JSON object. */
export function spanComment(span: Span, origin?: ConversionOrigin): string {
  const marker: SpanMarker = origin
    ? {
        file: span.fileName,
        start: span.start,
        end: span.end,
        from: origin.descendant,
        via: origin.intermediate,
        to: origin.ancestor,
      }
    : { file: span.fileName, start: span.start, end: span.end };
  return `${SPAN_COMMENT_PREFIX}${JSON.stringify(marker)}`;
}

function emitFn(item: RustFn, indent: string): string[] {
  const retClause = item.ret ? ` -> ${emitType(item.ret)}` : "";
  const bodyIndent = `${indent}  `;
  return [
    `${indent}fn ${item.name}(${item.params.map(emitParam).join(", ")})${retClause} {`,
    ...item.body.map((st) => emitStmt(st, bodyIndent)),
    `${indent}}`,
  ];
}

function emitItem(item: RustItem, opts: WriteRustOptions): string[] {
  const out: string[] = [];
  if (opts.spanComments && item.span) out.push(spanComment(item.span, item.origin));
  const generics = item.generics.length > 0 ? `<${item.generics.map((g) => g.text).join(", ")}>` : "";
  out.push(`impl${generics} ${emitType(item.traitType)} for ${emitType(item.selfType)} {`);
  item.items.forEach((fn, i) => {
    if (i > 0) out.push("");
    out.push(...emitFn(fn, "  "));
  });
  out.push("}");
  return out;
}

/** Header lines, then items separated by one blank line; always ends with a single newline. */
export function writeRustProgram(program: RustProgram, opts: WriteRustOptions = {}): string {
  const parts: string[] = [...(opts.header ?? [])];
  for (const item of program.items) {
    if (parts.length > 0) parts.push("");
    parts.push(...emitItem(item, opts));
  }
  return parts.join("\n") + "\n";
}
