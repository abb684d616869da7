import type { Severity } from "../diagnostics.js";

export function freezeReadonlyArray<T>(items: readonly T[]): readonly T[] {
  return Object.freeze([...items]);
}

export type LintOptions = {
  readonly unusedBindings?: Severity;
  readonly duplicateLabels?: Severity;
};

export type EmitOptions = {
  readonly header?: readonly string[];
  readonly spanComments?: boolean;
};

export type ConversionTarget = "rust" | "json";
