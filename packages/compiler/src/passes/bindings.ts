import type { BindingParam, BindingSet } from "../hierarchy/ir.js";

/**
 * Returns the binding set every derived conversion is parameterized by.
 *
 * The set is forwarded as-is: the same (frozen) object reaches every edge and
 * every emitted item. Nothing is inferred, narrowed per branch, reordered or
 * deduplicated.
 */
export function propagateBindings(bindings: BindingSet): BindingSet {
  if (Object.isFrozen(bindings) && Object.isFrozen(bindings.params)) return bindings;
  return Object.freeze({ params: Object.freeze([...bindings.params]), span: bindings.span });
}

export function bindingParamTexts(bindings: BindingSet): readonly string[] {
  return bindings.params.map((p) => p.text);
}

/** Params that rustc requires to appear in an impl header (E0207). */
export function constrainedBindingParams(bindings: BindingSet): readonly BindingParam[] {
  return bindings.params.filter((p) => p.kind !== "lifetime");
}
