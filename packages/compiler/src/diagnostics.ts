import type { Span } from "./hierarchy/ir.js";

export const COMPILER_DIAGNOSTIC_CODES = [
  "UPC1001",
  "UPC1002",
  "UPC1003",
  "UPC1004",
  "UPC1005",
  "UPC1006",
  "UPC1007",
  "UPC2001",
  "UPC2002",
  "UPC3001",
  "UPC3002",
] as const;

export type CompilerDiagnosticCode = (typeof COMPILER_DIAGNOSTIC_CODES)[number];

export type CompilerDiagnosticDomain = "syntax" | "lint" | "runtime" | "other";

const KNOWN_CODES: ReadonlySet<string> = new Set(COMPILER_DIAGNOSTIC_CODES);

export function isCompilerDiagnosticCode(code: string): code is CompilerDiagnosticCode {
  return KNOWN_CODES.has(code);
}

export function assertCompilerDiagnosticCode(code: string): asserts code is CompilerDiagnosticCode {
  if (!isCompilerDiagnosticCode(code)) {
    throw new Error(`Unknown compiler diagnostic code '${code}'.`);
  }
}

export function compilerDiagnosticDomain(code: string): CompilerDiagnosticDomain {
  if (!isCompilerDiagnosticCode(code)) return "other";
  switch (code[3]) {
    case "1":
      return "syntax";
    case "2":
      return "lint";
    case "3":
      return "runtime";
    default:
      return "other";
  }
}

export class CompileError extends Error {
  readonly code: CompilerDiagnosticCode;
  readonly span?: Span;

  constructor(code: string, message: string, span?: Span) {
    assertCompilerDiagnosticCode(code);
    super(message);
    this.code = code;
    this.span = span;
    this.name = "CompileError";
  }
}

export function fail(code: CompilerDiagnosticCode, message: string, span: Span | undefined): never {
  throw new CompileError(code, message, span);
}

export type Severity = "off" | "warn" | "error";

/** A non-fatal finding. Fatal problems are thrown as `CompileError`. */
export type Diagnostic = {
  readonly code: CompilerDiagnosticCode;
  readonly severity: "warning" | "error";
  readonly message: string;
  readonly span?: Span;
};

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}
