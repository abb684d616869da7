import type { GenerationPlan } from "../hierarchy/ir.js";
import { bindingParamTexts } from "../passes/bindings.js";

export type ConversionPlanJson = {
  readonly schema: 1;
  readonly kind: "conversion-plan";
  readonly bindings: readonly string[];
  readonly conversions: readonly {
    readonly ancestor: string;
    readonly intermediate: string;
    readonly descendant: string;
    readonly path: readonly string[];
  }[];
};

export function toConversionPlanJson(plan: GenerationPlan): ConversionPlanJson {
  return {
    schema: 1,
    kind: "conversion-plan",
    bindings: bindingParamTexts(plan.hierarchy.bindings),
    conversions: plan.artifacts.map((a) => ({
      ancestor: a.ancestor,
      intermediate: a.intermediate,
      descendant: a.descendant,
      path: a.path,
    })),
  };
}

export function writeConversionPlanJson(plan: GenerationPlan): string {
  return JSON.stringify(toConversionPlanJson(plan), null, 2) + "\n";
}
