import type {
  BindingSet,
  ConversionArtifact,
  ConversionEdge,
  GenerationPlan,
  Hierarchy,
  HierarchyNode,
} from "../hierarchy/ir.js";
import { propagateBindings } from "./bindings.js";
import { freezeReadonlyArray } from "./contracts.js";

function pushEdgesThrough(
  ancestor: HierarchyNode,
  intermediate: HierarchyNode,
  descendants: readonly HierarchyNode[],
  bindings: BindingSet,
  out: ConversionEdge[]
): void {
  for (const descendant of descendants) {
    // Deeper descendants first, then the node itself.
    pushEdgesThrough(ancestor, intermediate, descendant.children, bindings, out);
    out.push(Object.freeze({ ancestor, intermediate, descendant, bindings }));
  }
}

function walkSubtree(parent: HierarchyNode, bindings: BindingSet, out: ConversionEdge[]): void {
  // Child subtrees go first so that every `descendant -> intermediate` hop an
  // edge at this level relies on has already been derived.
  for (const child of parent.children) walkSubtree(child, bindings, out);
  for (const child of parent.children) {
    pushEdgesThrough(parent, child, child.children, bindings, out);
  }
}

/**
 * Derives one edge per (ancestor, descendant) pair at tree-distance two or
 * more. Distance-one pairs are the caller's direct conversions and are never
 * produced. The order is a depth-first, declaration-order post-order walk.
 */
export function deriveConversionEdges(hierarchy: Hierarchy): readonly ConversionEdge[] {
  const bindings = propagateBindings(hierarchy.bindings);
  const out: ConversionEdge[] = [];
  for (const root of hierarchy.roots) walkSubtree(root, bindings, out);
  return freezeReadonlyArray(out);
}

function collectParents(roots: readonly HierarchyNode[]): ReadonlyMap<HierarchyNode, HierarchyNode> {
  const parents = new Map<HierarchyNode, HierarchyNode>();
  const stack = [...roots];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    for (const child of node.children) {
      parents.set(child, node);
      stack.push(child);
    }
  }
  return parents;
}

function hopChain(edge: ConversionEdge, parents: ReadonlyMap<HierarchyNode, HierarchyNode>): readonly string[] {
  const path = [edge.descendant.label.text];
  let cur: HierarchyNode | undefined = edge.descendant;
  while (cur && cur !== edge.ancestor) {
    cur = parents.get(cur);
    if (cur) path.push(cur.label.text);
  }
  return Object.freeze(path);
}

export function toConversionArtifact(
  edge: ConversionEdge,
  parents: ReadonlyMap<HierarchyNode, HierarchyNode>
): ConversionArtifact {
  return Object.freeze({
    ancestor: edge.ancestor.label.text,
    intermediate: edge.intermediate.label.text,
    descendant: edge.descendant.label.text,
    path: hopChain(edge, parents),
    bindings: edge.bindings,
    span: edge.descendant.label.span,
  });
}

/** Derives the edges of a hierarchy and describes each as a target-independent artifact. */
export function planConversions(hierarchy: Hierarchy): GenerationPlan {
  const edges = deriveConversionEdges(hierarchy);
  const parents = collectParents(hierarchy.roots);
  const artifacts = freezeReadonlyArray(edges.map((edge) => toConversionArtifact(edge, parents)));
  return Object.freeze({ hierarchy, edges, artifacts });
}
