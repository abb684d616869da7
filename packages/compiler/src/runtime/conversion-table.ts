import { CompileError, fail } from "../diagnostics.js";
import type { ConversionArtifact, GenerationPlan } from "../hierarchy/ir.js";

export type Conversion = (value: unknown) => unknown;

/** A caller-supplied conversion along one tree edge (child -> parent). */
export type DirectConversion = {
  readonly from: string;
  readonly to: string;
  readonly convert: Conversion;
};

export type ConversionPair = {
  readonly from: string;
  readonly to: string;
  readonly kind: "direct" | "composed";
  // False when a hop it composes through is missing; resolving it throws UPC3001.
  readonly resolvable: boolean;
};

export type ConversionTable = {
  has(from: string, to: string): boolean;
  resolve(from: string, to: string): Conversion;
  convert(from: string, to: string, value: unknown): unknown;
  pairs(): readonly ConversionPair[];
};

function pairKey(from: string, to: string): string {
  return JSON.stringify([from, to]);
}

/**
 * Realizes a plan as in-process handlers.
 *
 * Composed handlers look their two hops up when they are first resolved, not
 * when the table is built, so a missing direct conversion only surfaces
 * (as UPC3001) once something asks for a conversion that needs it.
 */
export function createConversionTable(
  plan: GenerationPlan,
  directs: readonly DirectConversion[]
): ConversionTable {
  const composedByKey = new Map<string, ConversionArtifact>();
  for (const artifact of plan.artifacts) {
    const key = pairKey(artifact.descendant, artifact.ancestor);
    if (composedByKey.has(key)) {
      fail(
        "UPC3002",
        `Conversion from '${artifact.descendant}' to '${artifact.ancestor}' is generated more than once.`,
        artifact.span
      );
    }
    composedByKey.set(key, artifact);
  }

  const directByKey = new Map<string, DirectConversion>();
  for (const direct of directs) {
    const key = pairKey(direct.from, direct.to);
    const generated = composedByKey.get(key);
    if (generated) {
      fail(
        "UPC3002",
        `Conversion from '${direct.from}' to '${direct.to}' is generated by the hierarchy and cannot also be registered directly.`,
        generated.span
      );
    }
    if (directByKey.has(key)) {
      throw new CompileError(
        "UPC3002",
        `Conversion from '${direct.from}' to '${direct.to}' is registered more than once.`
      );
    }
    directByKey.set(key, direct);
  }

  const resolved = new Map<string, Conversion>();

  const lookup = (from: string, to: string): Conversion | undefined => {
    const key = pairKey(from, to);
    const cached = resolved.get(key);
    if (cached) return cached;
    const direct = directByKey.get(key);
    if (direct) return direct.convert;
    const artifact = composedByKey.get(key);
    if (!artifact) return undefined;
    const composed = compose(artifact);
    resolved.set(key, composed);
    return composed;
  };

  const requireHop = (artifact: ConversionArtifact, from: string, to: string): Conversion =>
    lookup(from, to) ??
    fail(
      "UPC3001",
      `Missing conversion from '${from}' to '${to}', needed by the generated conversion from '${artifact.descendant}' to '${artifact.ancestor}'.`,
      artifact.span
    );

  const compose = (artifact: ConversionArtifact): Conversion => {
    const toIntermediate = requireHop(artifact, artifact.descendant, artifact.intermediate);
    const toAncestor = requireHop(artifact, artifact.intermediate, artifact.ancestor);
    return (value) => toAncestor(toIntermediate(value));
  };

  const resolvable = new Map<string, boolean>();

  const isResolvable = (from: string, to: string): boolean => {
    const key = pairKey(from, to);
    if (directByKey.has(key)) return true;
    const known = resolvable.get(key);
    if (known !== undefined) return known;
    const artifact = composedByKey.get(key);
    const ok =
      artifact !== undefined &&
      isResolvable(artifact.descendant, artifact.intermediate) &&
      isResolvable(artifact.intermediate, artifact.ancestor);
    resolvable.set(key, ok);
    return ok;
  };

  const resolve = (from: string, to: string): Conversion => {
    const found = lookup(from, to);
    if (!found) {
      throw new CompileError("UPC3001", `No conversion from '${from}' to '${to}' is registered or generated.`);
    }
    return found;
  };

  return Object.freeze({
    has: (from: string, to: string) => directByKey.has(pairKey(from, to)) || composedByKey.has(pairKey(from, to)),
    resolve,
    convert: (from: string, to: string, value: unknown) => resolve(from, to)(value),
    pairs: () =>
      Object.freeze([
        ...directs.map((d): ConversionPair => ({ from: d.from, to: d.to, kind: "direct", resolvable: true })),
        ...plan.artifacts.map(
          (a): ConversionPair => ({
            from: a.descendant,
            to: a.ancestor,
            kind: "composed",
            resolvable: isResolvable(a.descendant, a.ancestor),
          })
        ),
      ]),
  });
}
