import { fail } from "../diagnostics.js";
import type { BindingParam, BindingSet, Hierarchy, HierarchyNode, Span, TypeLabel } from "./ir.js";
import { hierarchyNode, mergeSpans } from "./ir.js";
import { renderTokens, tokenize, type Token } from "./lexer.js";

const CLOSER_FOR: Readonly<Record<string, string>> = { "(": ")", "[": "]", "{": "}" };

class Cursor {
  readonly #tokens: readonly Token[];
  #pos = 0;

  constructor(tokens: readonly Token[]) {
    this.#tokens = tokens;
  }

  get current(): Token {
    // The token list always ends with an `eof` token, and the cursor never moves past it.
    return this.#tokens[Math.min(this.#pos, this.#tokens.length - 1)] ?? eofToken(this.#tokens);
  }

  advance(): Token {
    const tok = this.current;
    if (tok.kind !== "eof") this.#pos++;
    return tok;
  }

  is(kind: Token["kind"], text?: string): boolean {
    const tok = this.current;
    return tok.kind === kind && (text === undefined || tok.text === text);
  }
}

function eofToken(tokens: readonly Token[]): Token {
  const fileName = tokens[0]?.span.fileName ?? "<unknown>";
  return { kind: "eof", text: "", span: { fileName, start: 0, end: 0 }, spaceBefore: false };
}

/**
 * Collects a balanced token run. Stops (without consuming) at the first token
 * for which `isStop` holds while no bracket is open. `(`, `[` and `{` must
 * balance; `<`/`>` are counted so that commas inside generic arguments stay in
 * the run.
 */
function collectBalancedRun(
  cursor: Cursor,
  isStop: (tok: Token, angleDepth: number) => boolean
): readonly Token[] {
  const run: Token[] = [];
  const open: Token[] = [];
  let angleDepth = 0;

  while (true) {
    const tok = cursor.current;
    if (tok.kind === "eof") {
      const unclosed = open[open.length - 1];
      if (unclosed) fail("UPC1007", `Unclosed '${unclosed.text}'.`, unclosed.span);
      return run;
    }
    if (open.length === 0 && isStop(tok, angleDepth)) return run;

    if (tok.kind === "open") {
      open.push(tok);
    } else if (tok.kind === "close") {
      const opener = open.pop();
      if (!opener) fail("UPC1007", `Unmatched '${tok.text}'.`, tok.span);
      if (CLOSER_FOR[opener.text] !== tok.text) {
        fail("UPC1007", `Mismatched '${tok.text}' closing '${opener.text}'.`, tok.span);
      }
    } else if (open.length === 0 && tok.kind === "punct") {
      if (tok.text === "<") angleDepth++;
      if (tok.text === ">" && angleDepth > 0) angleDepth--;
    }
    run.push(cursor.advance());
  }
}

function runSpan(run: readonly Token[], fallback: Token): Span {
  const first = run[0];
  const last = run[run.length - 1];
  if (!first || !last) return fallback.span;
  return mergeSpans(first.span, last.span);
}

function isIdentText(text: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(text);
}

function parseBindingParam(run: readonly Token[], fallback: Token): BindingParam {
  const span = runSpan(run, fallback);
  const text = renderTokens(run);
  const [first, second] = run;
  if (!first) fail("UPC1004", "Empty binding parameter.", span);

  const boundsOf = (from: number): string | undefined => {
    const rest = run.slice(from);
    return rest.length > 0 ? renderTokens(rest) : undefined;
  };
  const make = (kind: BindingParam["kind"], name: string, bounds: string | undefined): BindingParam =>
    Object.freeze(bounds === undefined ? { kind, name, text, span } : { kind, name, bounds, text, span });

  if (first.kind === "lifetime") {
    if (!second) return make("lifetime", first.text, undefined);
    if (second.text === ":") return make("lifetime", first.text, boundsOf(2));
  } else if (first.kind === "ident" && first.text === "const") {
    const [, name, colon] = run;
    if (name?.kind === "ident" && isIdentText(name.text) && colon?.text === ":" && run.length > 3) {
      return make("const", name.text, boundsOf(3));
    }
  } else if (first.kind === "ident") {
    if (!second) return make("type", first.text, undefined);
    if (second.text === ":") return make("type", first.text, boundsOf(2));
  }

  fail(
    "UPC1004",
    `Malformed binding parameter '${text}'. Expected a lifetime ('a), a type parameter (T, T: Bound) or a const parameter (const N: Type).`,
    span
  );
}

function parseBindingSet(cursor: Cursor): BindingSet {
  const open = cursor.current;
  if (open.kind !== "open" || open.text !== "[") {
    fail(
      "UPC1003",
      "A hierarchy description must start with a binding list, e.g. `[]` or `['a, T: Clone]`.",
      open.span
    );
  }
  cursor.advance();

  const params: BindingParam[] = [];
  while (true) {
    if (cursor.is("close", "]")) break;
    const before = cursor.current;
    const run = collectBalancedRun(
      cursor,
      (tok, angleDepth) => tok.kind === "close" || (tok.kind === "punct" && tok.text === "," && angleDepth === 0)
    );
    if (cursor.current.kind === "eof") fail("UPC1007", "Unclosed '['.", open.span);
    params.push(parseBindingParam(run, before));
    if (cursor.is("punct", ",")) {
      cursor.advance();
      continue;
    }
    if (!cursor.is("close", "]")) {
      fail("UPC1007", `Mismatched '${cursor.current.text}' closing '['.`, cursor.current.span);
    }
  }
  const close = cursor.advance();
  return Object.freeze({ params: Object.freeze(params), span: mergeSpans(open.span, close.span) });
}

function parseLabel(cursor: Cursor): TypeLabel {
  const start = cursor.current;
  const run = collectBalancedRun(
    cursor,
    (tok, angleDepth) =>
      tok.kind === "close" ||
      (tok.kind === "open" && tok.text === "{" && angleDepth === 0) ||
      (tok.kind === "punct" && tok.text === "," && angleDepth === 0)
  );
  if (run.length === 0) {
    const found = start.kind === "eof" ? "end of input" : `'${start.text}'`;
    fail("UPC1005", `Expected a type label, found ${found}.`, start.span);
  }
  return Object.freeze({
    text: renderTokens(run),
    idents: Object.freeze(run.filter((t) => t.kind === "ident").map((t) => t.text)),
    lifetimes: Object.freeze(run.filter((t) => t.kind === "lifetime").map((t) => t.text)),
    span: runSpan(run, start),
  });
}

function parseItem(cursor: Cursor): HierarchyNode {
  const label = parseLabel(cursor);
  if (!cursor.is("open", "{")) return hierarchyNode(label);

  const open = cursor.advance();
  const children = parseItems(cursor, open);
  cursor.advance();
  return hierarchyNode(label, children);
}

/**
 * Parses a comma-separated item list up to the `}` matching `open`, or up to
 * end of input for the top-level forest (`open` undefined). A trailing comma
 * is accepted. The closing `}` is left for the caller.
 */
function parseItems(cursor: Cursor, open: Token | undefined): readonly HierarchyNode[] {
  const items: HierarchyNode[] = [];
  const atEnd = (): boolean => (open ? cursor.is("close", "}") : cursor.is("eof"));

  while (!atEnd()) {
    if (cursor.is("eof") && open) fail("UPC1007", "Unclosed '{'.", open.span);
    if (cursor.is("close")) fail("UPC1007", `Unmatched '${cursor.current.text}'.`, cursor.current.span);

    items.push(parseItem(cursor));

    if (cursor.is("punct", ",")) {
      cursor.advance();
      continue;
    }
    if (atEnd()) break;
    if (cursor.is("eof") && open) fail("UPC1007", "Unclosed '{'.", open.span);
    if (cursor.is("close")) fail("UPC1007", `Unmatched '${cursor.current.text}'.`, cursor.current.span);
    fail("UPC1006", `Expected ',' between items, found '${cursor.current.text}'.`, cursor.current.span);
  }
  return Object.freeze(items);
}

/**
 * Builds the tree model from a description of the form
 *
 *   [ 'a, T: Bound ]
 *   Root { Child { Grandchild, … }, … }, OtherRoot, …
 *
 * Labels are opaque; structural problems abort with a `CompileError`.
 */
export function parseHierarchy(source: string, fileName: string): Hierarchy {
  const cursor = new Cursor(tokenize(source, fileName));
  const bindings = parseBindingSet(cursor);
  const roots = parseItems(cursor, undefined);
  return Object.freeze({ fileName, bindings, roots });
}
