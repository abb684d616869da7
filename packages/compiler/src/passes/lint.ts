import type { Diagnostic, Severity } from "../diagnostics.js";
import type { ConversionEdge, GenerationPlan, Span } from "../hierarchy/ir.js";
import { walkNodes } from "../hierarchy/ir.js";
import { constrainedBindingParams } from "./bindings.js";
import type { LintOptions } from "./contracts.js";

export const DEFAULT_LINT_OPTIONS: Required<LintOptions> = Object.freeze({
  unusedBindings: "warn",
  duplicateLabels: "warn",
});

function diagnostic(
  severity: Severity,
  code: Diagnostic["code"],
  message: string,
  span: Span
): Diagnostic | undefined {
  if (severity === "off") return undefined;
  return Object.freeze({ code, severity: severity === "error" ? "error" : "warning", message, span });
}

function lintUnusedBindings(edge: ConversionEdge, severity: Severity): Diagnostic[] {
  const used = new Set([...edge.ancestor.label.idents, ...edge.descendant.label.idents]);
  const out: Diagnostic[] = [];
  for (const param of constrainedBindingParams(edge.bindings)) {
    if (used.has(param.name)) continue;
    const d = diagnostic(
      severity,
      "UPC2001",
      `Binding parameter '${param.name}' does not appear in the conversion from '${edge.descendant.label.text}' to '${edge.ancestor.label.text}'; rustc rejects unconstrained impl parameters (E0207).`,
      edge.descendant.label.span
    );
    if (d) out.push(d);
  }
  return out;
}

function lintDuplicateLabels(plan: GenerationPlan, severity: Severity): Diagnostic[] {
  const seen = new Map<string, Span>();
  const out: Diagnostic[] = [];
  for (const node of walkNodes(plan.hierarchy.roots)) {
    const first = seen.get(node.label.text);
    if (!first) {
      seen.set(node.label.text, node.label.span);
      continue;
    }
    const d = diagnostic(
      severity,
      "UPC2002",
      `Type label '${node.label.text}' appears more than once (first at offset ${first.start}); the generated conversions would conflict.`,
      node.label.span
    );
    if (d) out.push(d);
  }
  return out;
}

/**
 * Non-fatal checks over a plan. Generation never depends on the outcome;
 * callers decide what an `error` severity means for them.
 */
export function lintHierarchy(plan: GenerationPlan, options: LintOptions = {}): readonly Diagnostic[] {
  const unusedBindings = options.unusedBindings ?? DEFAULT_LINT_OPTIONS.unusedBindings;
  const duplicateLabels = options.duplicateLabels ?? DEFAULT_LINT_OPTIONS.duplicateLabels;
  const out: Diagnostic[] = [];
  out.push(...lintDuplicateLabels(plan, duplicateLabels));
  for (const edge of plan.edges) out.push(...lintUnusedBindings(edge, unusedBindings));
  return Object.freeze(out);
}
