import type { ConversionEdge, GenerationPlan } from "../hierarchy/ir.js";
import type { RustItem, RustProgram } from "../rust/ir.js";
import { identExpr, opaqueType, pathType, qualifiedCall } from "../rust/ir.js";

const FROM_TRAIT_PATH = ["", "core", "convert", "From"] as const;
const VALUE_PARAM = "g";

/**
 * Lowers one derived edge to
 *
 *   impl<BINDINGS> ::core::convert::From<Descendant> for Ancestor {
 *     fn from(g: Descendant) -> Self {
 *       <Ancestor>::from(<Intermediate>::from(g))
 *     }
 *   }
 *
 * Both hops are invoked, never defined here. Whether they exist is left to
 * the Rust compiler.
 */
export function emitConversionItem(edge: ConversionEdge): RustItem {
  const { ancestor, intermediate, descendant, bindings } = edge;
  const descendantType = opaqueType(descendant.label.text, descendant.label.span);
  const ancestorType = opaqueType(ancestor.label.text, ancestor.label.span);
  const intermediateType = opaqueType(intermediate.label.text, intermediate.label.span);

  return {
    kind: "impl",
    span: descendant.label.span,
    generics: bindings.params.map((p) => ({ text: p.text, span: p.span })),
    traitType: pathType(FROM_TRAIT_PATH, [descendantType]),
    selfType: ancestorType,
    origin: {
      descendant: descendant.label.text,
      intermediate: intermediate.label.text,
      ancestor: ancestor.label.text,
    },
    items: [
      {
        kind: "fn",
        name: "from",
        params: [{ name: VALUE_PARAM, type: descendantType }],
        ret: pathType(["Self"]),
        body: [
          {
            kind: "tail",
            expr: qualifiedCall(ancestorType, "from", [
              qualifiedCall(intermediateType, "from", [identExpr(VALUE_PARAM)]),
            ]),
          },
        ],
      },
    ],
  };
}

export function emitConversionProgram(plan: GenerationPlan): RustProgram {
  return { kind: "program", items: plan.edges.map(emitConversionItem) };
}
