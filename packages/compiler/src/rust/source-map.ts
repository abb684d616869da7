import type { Span } from "../hierarchy/ir.js";
import { SPAN_COMMENT_PREFIX } from "./write.js";

/** A derived conversion `from -> to`, composed as `from -> via -> to`. */
export type MappedConversion = {
  readonly from: string;
  readonly via: string;
  readonly to: string;
};

export type ConversionHop = {
  readonly from: string;
  readonly to: string;
};

export type RustSourceMapEntry = {
  // Line of the marker; the impl follows it.
  readonly rustLine: number;
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
  readonly conversion?: MappedConversion;
  // 1-based, inclusive columns of the inner `<via>::from(..)` call.
  readonly innerCall?: { readonly line: number; readonly startColumn: number; readonly endColumn: number };
};

export type RustSourceMap = {
  readonly schema: 1;
  readonly kind: "rust-source-map";
  readonly entries: readonly RustSourceMapEntry[];
};

export type RustOrigin = {
  readonly span: Span;
  readonly conversion?: MappedConversion;
  readonly hop?: ConversionHop;
};

type ParsedMarker = {
  readonly span: Span;
  readonly conversion?: MappedConversion;
};

function parseMarker(line: string): ParsedMarker | undefined {
  const trimmed = line.trimStart();
  if (!trimmed.startsWith(SPAN_COMMENT_PREFIX)) return undefined;
  let payload: unknown;
  try {
    payload = JSON.parse(trimmed.slice(SPAN_COMMENT_PREFIX.length));
  } catch {
    return undefined;
  }
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) return undefined;

  const fields = new Map(Object.entries(payload));
  const file = fields.get("file");
  const start = fields.get("start");
  const end = fields.get("end");
  if (typeof file !== "string" || typeof start !== "number" || typeof end !== "number") return undefined;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) return undefined;
  const span: Span = { fileName: file, start, end };

  const from = fields.get("from");
  const via = fields.get("via");
  const to = fields.get("to");
  if (typeof from === "string" && typeof via === "string" && typeof to === "string") {
    return { span, conversion: { from, via, to } };
  }
  return { span };
}

/** Finds `<to>::from(<via>::from(..))` on one line and returns the inner call's columns. */
function findInnerCall(
  line: string,
  conversion: MappedConversion
): { readonly startColumn: number; readonly endColumn: number } | undefined {
  const trimmed = line.trimStart();
  const outer = `<${conversion.to}>::from(`;
  if (!trimmed.startsWith(`${outer}<${conversion.via}>::from(`) || !trimmed.endsWith("))")) return undefined;
  const indent = line.length - trimmed.length;
  return { startColumn: indent + outer.length + 1, endColumn: line.trimEnd().length - 1 };
}

/** Collects the `// upcast-span:` markers written ahead of each generated impl. */
export function buildRustSourceMap(rust: string): RustSourceMap {
  const entries: RustSourceMapEntry[] = [];
  const lines = rust.split(/\r?\n/g);

  lines.forEach((line, i) => {
    const marker = parseMarker(line);
    if (!marker) return;
    const { conversion } = marker;
    let innerCall: RustSourceMapEntry["innerCall"];
    if (conversion) {
      for (let j = i + 1; j < lines.length; j++) {
        const next = lines[j] ?? "";
        if (parseMarker(next)) break;
        const found = findInnerCall(next, conversion);
        if (found) {
          innerCall = { line: j + 1, ...found };
          break;
        }
      }
    }
    entries.push({
      rustLine: i + 1,
      fileName: marker.span.fileName,
      start: marker.span.start,
      end: marker.span.end,
      ...(conversion ? { conversion } : {}),
      ...(innerCall ? { innerCall } : {}),
    });
  });

  return Object.freeze({ schema: 1, kind: "rust-source-map", entries: Object.freeze(entries) });
}

function hopAt(
  entry: RustSourceMapEntry,
  rustLine: number,
  rustColumn: number | undefined
): ConversionHop | undefined {
  const { conversion, innerCall } = entry;
  if (!conversion || !innerCall || rustColumn === undefined || innerCall.line !== rustLine) return undefined;
  if (rustColumn >= innerCall.startColumn && rustColumn <= innerCall.endColumn) {
    return { from: conversion.from, to: conversion.via };
  }
  return { from: conversion.via, to: conversion.to };
}

/**
 * Maps a position in generated Rust (e.g. from a rustc error about a missing
 * `From` impl) back to the hierarchy span of the nearest preceding marker.
 * When the position falls on the composed call, `hop` names the conversion
 * that call needs: the inner call needs `from -> via`, the outer one
 * `via -> to`.
 */
export function mapRustLineToHierarchy(
  map: RustSourceMap,
  rustLine: number,
  rustColumn?: number
): RustOrigin | undefined {
  let best: RustSourceMapEntry | undefined;
  for (const entry of map.entries) {
    if (entry.rustLine > rustLine) break;
    best = entry;
  }
  if (!best) return undefined;
  const hop = hopAt(best, rustLine, rustColumn);
  return {
    span: { fileName: best.fileName, start: best.start, end: best.end },
    ...(best.conversion ? { conversion: best.conversion } : {}),
    ...(hop ? { hop } : {}),
  };
}
