import { readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import type { ConversionTarget, LintOptions, Severity } from "@upcast/compiler";

export const PROJECT_CONFIG_FILE = "upcast.json";

export type ProjectConfig = {
  readonly schema: 1;
  readonly input: string;
  readonly out: string;
  readonly target?: ConversionTarget;
  readonly header?: readonly string[];
  readonly spanComments?: boolean;
  readonly sourceMap?: boolean;
  readonly lint?: LintOptions;
};

export type ProjectContext = {
  readonly projectRoot: string;
  readonly project: ProjectConfig;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(
  value: Record<string, unknown>,
  allowed: readonly string[],
  label: string
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${label} must be a boolean.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${label} must be an array of strings.`);
  }
  return value.map((entry, i) => {
    if (typeof entry !== "string") throw new Error(`${label}[${i}] must be a string.`);
    return entry;
  });
}

function asSeverity(value: unknown, label: string): Severity {
  if (value !== "off" && value !== "warn" && value !== "error") {
    throw new Error(`${label} must be 'off', 'warn' or 'error'.`);
  }
  return value;
}

function parseLintOptions(value: unknown): LintOptions {
  const lint = asRecord(value, "upcast.json: 'lint'");
  assertKnownKeys(lint, ["unusedBindings", "duplicateLabels"], "upcast.json: 'lint'");
  return {
    ...(lint.unusedBindings === undefined
      ? {}
      : { unusedBindings: asSeverity(lint.unusedBindings, "upcast.json: 'lint.unusedBindings'") }),
    ...(lint.duplicateLabels === undefined
      ? {}
      : { duplicateLabels: asSeverity(lint.duplicateLabels, "upcast.json: 'lint.duplicateLabels'") }),
  };
}

export function parseProjectConfig(value: unknown): ProjectConfig {
  const root = asRecord(value, "upcast.json");
  assertKnownKeys(
    root,
    ["schema", "input", "out", "target", "header", "spanComments", "sourceMap", "lint"],
    "upcast.json"
  );

  if (root.schema !== 1) {
    throw new Error("Unsupported upcast.json schema.");
  }

  const input = asString(root.input, "upcast.json: 'input'");
  const out = asString(root.out, "upcast.json: 'out'");

  const target = root.target;
  if (target !== undefined && target !== "rust" && target !== "json") {
    throw new Error(`upcast.json: 'target' must be 'rust' or 'json'.`);
  }

  const header = root.header === undefined ? undefined : asStringArray(root.header, "upcast.json: 'header'");
  const spanComments =
    root.spanComments === undefined ? undefined : asBoolean(root.spanComments, "upcast.json: 'spanComments'");
  const sourceMap = root.sourceMap === undefined ? undefined : asBoolean(root.sourceMap, "upcast.json: 'sourceMap'");
  const lint = root.lint === undefined ? undefined : parseLintOptions(root.lint);

  if (sourceMap) {
    if (target === "json") {
      throw new Error("upcast.json: 'sourceMap' requires target 'rust'.");
    }
    if (spanComments === false) {
      throw new Error("upcast.json: 'sourceMap' requires 'spanComments'.");
    }
  }
  if (target === "json") {
    if (header !== undefined) throw new Error("upcast.json: 'header' requires target 'rust'.");
    if (spanComments !== undefined) throw new Error("upcast.json: 'spanComments' requires target 'rust'.");
  }

  return {
    schema: 1,
    input,
    out,
    ...(target === undefined ? {} : { target }),
    ...(header === undefined ? {} : { header }),
    ...(spanComments === undefined ? {} : { spanComments }),
    ...(sourceMap === undefined ? {} : { sourceMap }),
    ...(lint === undefined ? {} : { lint }),
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export function writeProjectConfig(path: string, value: ProjectConfig): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

export function findProjectRoot(fromDir: string): string {
  let cur = resolve(fromDir);
  while (true) {
    const candidate = join(cur, PROJECT_CONFIG_FILE);
    try {
      readFileSync(candidate, "utf-8");
      return cur;
    } catch {
      // continue
    }
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  throw new Error("Could not find upcast.json in this directory or any parent.");
}

export function loadProjectConfig(path: string): ProjectConfig {
  return parseProjectConfig(readJson(path));
}

export function loadProjectContext(fromDir: string): ProjectContext {
  const projectRoot = findProjectRoot(fromDir);
  const project = loadProjectConfig(join(projectRoot, PROJECT_CONFIG_FILE));
  return { projectRoot, project };
}
