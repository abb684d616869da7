import { fail } from "../diagnostics.js";
import type { Span } from "./ir.js";

export type TokenKind = "ident" | "lifetime" | "literal" | "punct" | "open" | "close" | "eof";

export type Token = {
  readonly kind: TokenKind;
  readonly text: string;
  readonly span: Span;
  // Whitespace or a comment separates this token from the previous one.
  readonly spaceBefore: boolean;
};

const MULTI_CHAR_PUNCT = ["::", "->"] as const;
const SINGLE_CHAR_PUNCT = new Set([..."<>,:;&*+-=!?#.@/|^%~$"]);

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Splits a hierarchy description into tokens.
 *
 * Only as much of the type-expression grammar is recognized as is needed to
 * find where a label ends: identifiers, lifetimes, numeric and string literals,
 * delimiters, and `::` / `->` as single tokens (so `->` never closes a `<`).
 */
export function tokenize(source: string, fileName: string): readonly Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let spaceBefore = false;

  const span = (start: number, end: number): Span => Object.freeze({ fileName, start, end });
  const push = (kind: TokenKind, start: number, end: number): void => {
    tokens.push(Object.freeze({ kind, text: source.slice(start, end), span: span(start, end), spaceBefore }));
    spaceBefore = false;
  };

  while (pos < source.length) {
    const ch = source[pos] ?? "";
    const next = source[pos + 1] ?? "";

    if (isWhitespace(ch)) {
      pos++;
      spaceBefore = true;
      continue;
    }

    if (ch === "/" && next === "/") {
      while (pos < source.length && source[pos] !== "\n") pos++;
      spaceBefore = true;
      continue;
    }

    if (ch === "/" && next === "*") {
      // Block comments nest.
      const start = pos;
      let depth = 0;
      while (pos < source.length) {
        if (source.startsWith("/*", pos)) {
          depth++;
          pos += 2;
        } else if (source.startsWith("*/", pos)) {
          depth--;
          pos += 2;
          if (depth === 0) break;
        } else {
          pos++;
        }
      }
      if (depth !== 0) fail("UPC1002", "Unterminated block comment.", span(start, start + 2));
      spaceBefore = true;
      continue;
    }

    const start = pos;

    if (isIdentStart(ch)) {
      while (pos < source.length && isIdentPart(source[pos] ?? "")) pos++;
      push("ident", start, pos);
      continue;
    }

    if (ch === "'") {
      if (!isIdentStart(next)) fail("UPC1001", "Expected a lifetime name after `'`.", span(start, start + 1));
      pos++;
      while (pos < source.length && isIdentPart(source[pos] ?? "")) pos++;
      push("lifetime", start, pos);
      continue;
    }

    if (/[0-9]/.test(ch)) {
      while (pos < source.length && isIdentPart(source[pos] ?? "")) pos++;
      push("literal", start, pos);
      continue;
    }

    if (ch === '"') {
      pos++;
      while (pos < source.length && source[pos] !== '"') {
        pos += source[pos] === "\\" ? 2 : 1;
      }
      if (pos >= source.length) fail("UPC1002", "Unterminated string literal.", span(start, start + 1));
      pos++;
      push("literal", start, pos);
      continue;
    }

    if (ch === "(" || ch === "[" || ch === "{") {
      pos++;
      push("open", start, pos);
      continue;
    }

    if (ch === ")" || ch === "]" || ch === "}") {
      pos++;
      push("close", start, pos);
      continue;
    }

    const multi = MULTI_CHAR_PUNCT.find((p) => source.startsWith(p, pos));
    if (multi) {
      pos += multi.length;
      push("punct", start, pos);
      continue;
    }

    if (SINGLE_CHAR_PUNCT.has(ch)) {
      pos++;
      push("punct", start, pos);
      continue;
    }

    fail("UPC1001", `Unexpected character ${JSON.stringify(ch)}.`, span(start, start + 1));
  }

  push("eof", source.length, source.length);
  return Object.freeze(tokens);
}

/** Renders a token run, keeping a single space wherever the source had any. */
export function renderTokens(tokens: readonly Token[]): string {
  let out = "";
  tokens.forEach((token, i) => {
    if (i > 0 && token.spaceBefore) out += " ";
    out += token.text;
  });
  return out;
}
