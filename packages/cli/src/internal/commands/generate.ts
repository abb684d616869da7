import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, relative, resolve } from "node:path";

import {
  buildRustSourceMap,
  type Diagnostic,
  generateTransitiveConversions,
  hasErrors,
} from "@upcast/compiler";

import { loadProjectContext } from "../config.js";
import { consoleOutput, type CommandOutput, formatDiagnostic } from "../report.js";

export type GenerateArgs = {
  readonly dir: string;
  readonly output?: CommandOutput;
};

export type GenerateResult = {
  readonly outPath: string;
  readonly mapPath?: string;
  readonly conversions: number;
  readonly diagnostics: readonly Diagnostic[];
  readonly ok: boolean;
};

function normalizePath(p: string): string {
  return p.replaceAll("\\", "/");
}

export async function runGenerate(args: GenerateArgs): Promise<GenerateResult> {
  const output = args.output ?? consoleOutput;
  const ctx = loadProjectContext(args.dir);
  const project = ctx.project;

  const inputPath = resolve(ctx.projectRoot, project.input);
  const outPath = resolve(ctx.projectRoot, project.out);
  // Spans are reported relative to where the command ran.
  const fileName = normalizePath(relative(resolve(args.dir), inputPath));
  const source = readFileSync(inputPath, "utf-8");

  const generated = generateTransitiveConversions({
    source,
    fileName,
    target: project.target ?? "rust",
    header: project.header,
    spanComments: project.spanComments ?? project.sourceMap ?? false,
    lint: project.lint,
  });

  for (const d of generated.diagnostics) output.error(formatDiagnostic(d, source));

  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, generated.output, "utf-8");

  let mapPath: string | undefined;
  if (project.sourceMap) {
    mapPath = `${outPath}.map.json`;
    writeFileSync(mapPath, JSON.stringify(buildRustSourceMap(generated.output), null, 2) + "\n", "utf-8");
  }

  const conversions = generated.plan.artifacts.length;
  output.log(`Wrote ${normalizePath(relative(ctx.projectRoot, outPath))} (${conversions} conversions).`);

  return {
    outPath,
    ...(mapPath === undefined ? {} : { mapPath }),
    conversions,
    diagnostics: generated.diagnostics,
    ok: !hasErrors(generated.diagnostics),
  };
}
