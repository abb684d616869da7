import type { Diagnostic } from "./diagnostics.js";
import type { GenerationPlan } from "./hierarchy/ir.js";
import { parseHierarchy } from "./hierarchy/parse.js";
import { writeConversionPlanJson } from "./json/write.js";
import type { ConversionTarget, EmitOptions, LintOptions } from "./passes/contracts.js";
import { planConversions } from "./passes/derive.js";
import { emitConversionProgram } from "./passes/emit.js";
import { lintHierarchy } from "./passes/lint.js";
import { writeRustProgram } from "./rust/write.js";

export type GenerateOptions = EmitOptions & {
  readonly source: string;
  readonly fileName: string;
  readonly target?: ConversionTarget;
  readonly lint?: LintOptions;
};

export type GenerateOutput = {
  readonly plan: GenerationPlan;
  readonly diagnostics: readonly Diagnostic[];
  readonly output: string;
};

/**
 * Parse -> plan -> lint -> emit.
 *
 * Structural errors throw `CompileError`; lint findings are returned in
 * `diagnostics` and never stop emission.
 */
export function generateTransitiveConversions(opts: GenerateOptions): GenerateOutput {
  const hierarchy = parseHierarchy(opts.source, opts.fileName);
  const plan = planConversions(hierarchy);
  const diagnostics = lintHierarchy(plan, opts.lint);

  const target = opts.target ?? "rust";
  const output =
    target === "json"
      ? writeConversionPlanJson(plan)
      : writeRustProgram(emitConversionProgram(plan), {
          header: opts.header,
          spanComments: opts.spanComments ?? false,
        });

  return Object.freeze({ plan, diagnostics, output });
}
