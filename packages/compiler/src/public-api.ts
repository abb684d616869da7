export type { CompilerDiagnosticCode, Diagnostic, Severity } from "./diagnostics.js";
export { CompileError, COMPILER_DIAGNOSTIC_CODES, hasErrors } from "./diagnostics.js";
export type {
  BindingParam,
  BindingSet,
  ConversionArtifact,
  ConversionEdge,
  GenerationPlan,
  Hierarchy,
  HierarchyNode,
  Span,
  TypeLabel,
} from "./hierarchy/ir.js";
export { walkNodes } from "./hierarchy/ir.js";
export { parseHierarchy } from "./hierarchy/parse.js";
export type { ConversionTarget, EmitOptions, LintOptions } from "./passes/contracts.js";
export { bindingParamTexts, propagateBindings } from "./passes/bindings.js";
export { deriveConversionEdges, planConversions } from "./passes/derive.js";
export { emitConversionItem, emitConversionProgram } from "./passes/emit.js";
export { DEFAULT_LINT_OPTIONS, lintHierarchy } from "./passes/lint.js";
export type { RustItem, RustProgram } from "./rust/ir.js";
export { writeRustProgram } from "./rust/write.js";
export type {
  ConversionHop,
  MappedConversion,
  RustOrigin,
  RustSourceMap,
  RustSourceMapEntry,
} from "./rust/source-map.js";
export { buildRustSourceMap, mapRustLineToHierarchy } from "./rust/source-map.js";
export type { ConversionPlanJson } from "./json/write.js";
export { toConversionPlanJson, writeConversionPlanJson } from "./json/write.js";
export type { Conversion, ConversionPair, ConversionTable, DirectConversion } from "./runtime/conversion-table.js";
export { createConversionTable } from "./runtime/conversion-table.js";
export type { GenerateOptions, GenerateOutput } from "./generate.js";
export { generateTransitiveConversions } from "./generate.js";
