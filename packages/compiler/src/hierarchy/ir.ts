export type Span = {
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
};

/**
 * An opaque type expression taken verbatim from the hierarchy description.
 *
 * `text` is what gets quoted into generated code. `idents` and `lifetimes` are
 * only consulted by lints; no pass interprets the structure of a label.
 */
export type TypeLabel = {
  readonly text: string;
  readonly idents: readonly string[];
  readonly lifetimes: readonly string[];
  readonly span: Span;
};

export type HierarchyNode = {
  readonly label: TypeLabel;
  readonly children: readonly HierarchyNode[];
};

export type BindingParamKind = "lifetime" | "type" | "const";

export type BindingParam = {
  readonly kind: BindingParamKind;
  readonly name: string;
  readonly bounds?: string;
  readonly text: string;
  readonly span: Span;
};

export type BindingSet = {
  readonly params: readonly BindingParam[];
  readonly span: Span;
};

export type Hierarchy = {
  readonly fileName: string;
  readonly bindings: BindingSet;
  readonly roots: readonly HierarchyNode[];
};

export type ConversionEdge = {
  readonly ancestor: HierarchyNode;
  // Immediate child of `ancestor` on the path down to `descendant`.
  readonly intermediate: HierarchyNode;
  readonly descendant: HierarchyNode;
  readonly bindings: BindingSet;
};

export type ConversionArtifact = {
  readonly ancestor: string;
  readonly intermediate: string;
  readonly descendant: string;
  // Labels from `descendant` up to `ancestor`, both included.
  readonly path: readonly string[];
  readonly bindings: BindingSet;
  readonly span: Span;
};

export type GenerationPlan = {
  readonly hierarchy: Hierarchy;
  readonly edges: readonly ConversionEdge[];
  readonly artifacts: readonly ConversionArtifact[];
};

export function mergeSpans(first: Span, last: Span): Span {
  return Object.freeze({ fileName: first.fileName, start: first.start, end: last.end });
}

export function hierarchyNode(label: TypeLabel, children: readonly HierarchyNode[] = []): HierarchyNode {
  return Object.freeze({ label, children: Object.freeze([...children]) });
}

/** Pre-order walk over every node of the forest, children in declaration order. */
export function* walkNodes(roots: readonly HierarchyNode[]): Generator<HierarchyNode> {
  for (const root of roots) {
    yield root;
    yield* walkNodes(root.children);
  }
}
