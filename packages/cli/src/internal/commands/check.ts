import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { generateTransitiveConversions, hasErrors, type LintOptions } from "@upcast/compiler";

import { consoleOutput, type CommandOutput, formatDiagnostic, summarize } from "../report.js";

export type CheckArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly output?: CommandOutput;
};

const STRICT_LINT: LintOptions = { unusedBindings: "error", duplicateLabels: "error" };

function parseCheckArgs(argv: readonly string[]): { readonly file: string; readonly strict: boolean } {
  let file: string | undefined;
  let strict = false;
  for (const arg of argv) {
    if (arg === "--strict") {
      strict = true;
      continue;
    }
    if (arg.startsWith("--")) throw new Error(`check: unknown option '${arg}'.`);
    if (file !== undefined) throw new Error("check: expected a single input file.");
    file = arg;
  }
  if (file === undefined) throw new Error("Usage: upcast check <file> [--strict]");
  return { file, strict };
}

/** Parses and lints one file. Returns false when any finding has error severity. */
export async function runCheck(args: CheckArgs): Promise<boolean> {
  const output = args.output ?? consoleOutput;
  const { file, strict } = parseCheckArgs(args.argv);
  const source = readFileSync(resolve(args.dir, file), "utf-8");

  const generated = generateTransitiveConversions({
    source,
    fileName: file,
    target: "json",
    ...(strict ? { lint: STRICT_LINT } : {}),
  });

  for (const d of generated.diagnostics) output.error(formatDiagnostic(d, source));
  output.log(summarize(file, generated.plan.artifacts.length, generated.diagnostics));
  return !hasErrors(generated.diagnostics);
}
