import type { CompileError, Diagnostic, Span } from "@upcast/compiler";

/** Where command output goes. Defaults to the console. */
export type CommandOutput = {
  readonly log: (line: string) => void;
  readonly error: (line: string) => void;
};

export const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/** 1-based line and column of `pos`, clamped to the text. */
export function posToLineCol(text: string, pos: number): { readonly line: number; readonly col: number } {
  const before = text.slice(0, Math.max(0, pos));
  const lastBreak = before.lastIndexOf("\n");
  return { line: before.split("\n").length, col: before.length - lastBreak };
}

export function formatLocation(span: Span, text: string): string {
  const pos = posToLineCol(text, span.start);
  return `${span.fileName}:${pos.line}:${pos.col}`;
}

export function formatCompileError(err: CompileError, text: string | undefined): string {
  if (!err.span || text === undefined) return `${err.code}: ${err.message}`;
  return `${formatLocation(err.span, text)}: ${err.code}: ${err.message}`;
}

export function formatDiagnostic(d: Diagnostic, text: string): string {
  const prefix = d.span ? `${formatLocation(d.span, text)}: ` : "";
  return `${prefix}${d.severity}: ${d.code}: ${d.message}`;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function summarize(fileName: string, conversions: number, diagnostics: readonly Diagnostic[]): string {
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  const warnings = diagnostics.length - errors;
  return `${fileName}: ${plural(conversions, "conversion")}, ${plural(errors, "error")}, ${plural(warnings, "warning")}.`;
}
