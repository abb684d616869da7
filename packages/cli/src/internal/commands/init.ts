import { existsSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { PROJECT_CONFIG_FILE, type ProjectConfig, writeProjectConfig } from "../config.js";
import { consoleOutput, type CommandOutput } from "../report.js";

export type InitArgs = {
  readonly dir: string;
  readonly output?: CommandOutput;
};

const SAMPLE_INPUT = "hierarchy.upcast";

const SAMPLE_HIERARCHY = [
  "// Each block lists the types that convert directly into the type before it.",
  "// `upcast generate` writes the conversions that skip one or more levels.",
  "[]",
  "AppError {",
  "  ConfigError { MissingKey, BadValue },",
  "  StorageError {",
  "    IoError,",
  "    QueryError { Timeout, Syntax },",
  "  },",
  "}",
  "",
].join("\n");

export async function runInit(args: InitArgs): Promise<void> {
  const root = resolve(args.dir);
  const output = args.output ?? consoleOutput;
  const configPath = join(root, PROJECT_CONFIG_FILE);
  const inputPath = join(root, SAMPLE_INPUT);

  for (const path of [configPath, inputPath]) {
    if (existsSync(path)) {
      throw new Error(`Refusing to overwrite existing '${path}'.`);
    }
  }

  const project: ProjectConfig = {
    schema: 1,
    input: SAMPLE_INPUT,
    out: "src/conversions.rs",
    header: ["// Generated by `upcast generate`. Edit hierarchy.upcast instead."],
    spanComments: true,
    sourceMap: true,
    lint: { unusedBindings: "warn", duplicateLabels: "error" },
  };
  writeProjectConfig(configPath, project);
  writeFileSync(inputPath, SAMPLE_HIERARCHY, "utf-8");

  output.log(`Created ${PROJECT_CONFIG_FILE} and ${SAMPLE_INPUT}.`);
}
