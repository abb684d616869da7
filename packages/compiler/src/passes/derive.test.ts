import { expect } from "chai";

import type { ConversionEdge, Hierarchy, HierarchyNode } from "../hierarchy/ir.js";
import { parseHierarchy } from "../hierarchy/parse.js";
import { deriveConversionEdges, planConversions } from "./derive.js";

const FOREST = ["[]", "A {", "  B { E, F { J, K } },", "  C { G },", "  D { H, I { L } },", "}", ""].join("\n");

function triples(edges: readonly ConversionEdge[]): string[][] {
  return edges.map((e) => [e.ancestor.label.text, e.intermediate.label.text, e.descendant.label.text]);
}

/** Every (ancestor, descendant) pair at distance >= 2, computed from root paths. */
function expectedPairs(h: Hierarchy): Set<string> {
  const out = new Set<string>();
  const visit = (node: HierarchyNode, ancestors: readonly HierarchyNode[]): void => {
    ancestors.slice(0, -1).forEach((a) => out.add(`${a.label.text}<-${node.label.text}`));
    for (const child of node.children) visit(child, [...ancestors, node]);
  };
  for (const root of h.roots) visit(root, []);
  return out;
}

function isChildOf(child: HierarchyNode, parent: HierarchyNode): boolean {
  return parent.children.includes(child);
}

describe("@upcast/compiler pair deriver", () => {
  it("derives a three-level forest in post-order", () => {
    const edges = deriveConversionEdges(parseHierarchy(FOREST, "h.upcast"));
    expect(triples(edges)).to.deep.equal([
      ["B", "F", "J"],
      ["B", "F", "K"],
      ["D", "I", "L"],
      ["A", "B", "E"],
      ["A", "B", "J"],
      ["A", "B", "K"],
      ["A", "B", "F"],
      ["A", "C", "G"],
      ["A", "D", "H"],
      ["A", "D", "L"],
      ["A", "D", "I"],
    ]);
  });

  it("derives exactly the distance-two-or-more pairs of that forest", () => {
    const edges = deriveConversionEdges(parseHierarchy(FOREST, "h.upcast"));
    const pairs = edges.map((e) => `${e.ancestor.label.text}<-${e.descendant.label.text}`).sort();
    expect(pairs).to.deep.equal(
      ["A<-E", "A<-F", "A<-J", "A<-K", "A<-G", "A<-H", "A<-I", "A<-L", "B<-J", "B<-K", "D<-L"].sort()
    );
  });

  it("derives every hop of an edge before the edge itself", () => {
    const edges = deriveConversionEdges(parseHierarchy(FOREST, "h.upcast"));
    edges.forEach((edge, i) => {
      if (isChildOf(edge.descendant, edge.intermediate)) return;
      const hop = edges.findIndex((e) => e.ancestor === edge.intermediate && e.descendant === edge.descendant);
      expect(hop, `${triples([edge]).join()}`).to.be.within(0, i - 1);
    });
  });

  it("is complete, unique and never regenerates a direct edge", () => {
    const sources = [
      FOREST,
      "[] A { B { C { D { E } } } }",
      "[] A { B, C { D, E { F } } }, G { H { I } }",
      "['a, T] Root<'a, T> { Left { L1 { L2 }, L3 }, Right<T> { R1 } }",
    ];
    for (const source of sources) {
      const h = parseHierarchy(source, "h.upcast");
      const edges = deriveConversionEdges(h);
      const derived = edges.map((e) => `${e.ancestor.label.text}<-${e.descendant.label.text}`);

      expect(new Set(derived).size, source).to.equal(derived.length);
      expect(new Set(derived), source).to.deep.equal(expectedPairs(h));
      for (const edge of edges) {
        expect(isChildOf(edge.descendant, edge.ancestor), source).to.equal(false);
        expect(isChildOf(edge.intermediate, edge.ancestor), source).to.equal(true);
      }
    }
  });

  it("counts pairs along a chain", () => {
    const edges = deriveConversionEdges(parseHierarchy("[] A { B { C { D { E } } } }", "h.upcast"));
    expect(edges.length).to.equal(6);
  });

  it("hands the same binding set to every edge", () => {
    const h = parseHierarchy("['a, T: Clone] Root<'a, T> { Mid<T> { Leaf<'a> { Deep } } }", "h.upcast");
    const edges = deriveConversionEdges(h);
    expect(edges.length).to.equal(3);
    for (const edge of edges) expect(edge.bindings).to.equal(h.bindings);
  });

  it("yields nothing for roots and single-level branches", () => {
    expect(deriveConversionEdges(parseHierarchy("[] A", "h.upcast"))).to.deep.equal([]);
    expect(deriveConversionEdges(parseHierarchy("[] A { B }", "h.upcast"))).to.deep.equal([]);
    expect(deriveConversionEdges(parseHierarchy("[] A { B, C }", "h.upcast"))).to.deep.equal([]);
    expect(deriveConversionEdges(parseHierarchy("[]", "h.upcast"))).to.deep.equal([]);
    expect(triples(deriveConversionEdges(parseHierarchy("[] A { B { C } }", "h.upcast")))).to.deep.equal([
      ["A", "B", "C"],
    ]);
  });

  it("is deterministic", () => {
    const first = planConversions(parseHierarchy(FOREST, "h.upcast"));
    const second = planConversions(parseHierarchy(FOREST, "h.upcast"));
    expect(first.artifacts.map((a) => a.path)).to.deep.equal(second.artifacts.map((a) => a.path));
    expect(triples(first.edges)).to.deep.equal(triples(second.edges));
  });
});

describe("@upcast/compiler conversion plan", () => {
  it("describes each edge with its hop chain", () => {
    const plan = planConversions(parseHierarchy(FOREST, "h.upcast"));
    expect(plan.artifacts.length).to.equal(plan.edges.length);

    const byPair = new Map(plan.artifacts.map((a) => [`${a.ancestor}<-${a.descendant}`, a] as const));
    expect(byPair.get("A<-J")?.path).to.deep.equal(["J", "F", "B", "A"]);
    expect(byPair.get("A<-J")?.intermediate).to.equal("B");
    expect(byPair.get("D<-L")?.path).to.deep.equal(["L", "I", "D"]);
    expect(byPair.get("A<-L")?.path).to.deep.equal(["L", "I", "D", "A"]);
    expect(byPair.get("A<-E")?.path).to.deep.equal(["E", "B", "A"]);
  });

  it("points each artifact at its descendant label", () => {
    const plan = planConversions(parseHierarchy("[] A { B { C } }", "h.upcast"));
    expect(plan.artifacts[0]?.span).to.deep.equal({ fileName: "h.upcast", start: 11, end: 12 });
  });
});
