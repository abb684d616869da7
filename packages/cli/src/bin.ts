#!/usr/bin/env tsx
import { argv, cwd, exit } from "node:process";
import { readFileSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { CompileError } from "@upcast/compiler";

import { runCheck } from "./internal/commands/check.js";
import { runGenerate } from "./internal/commands/generate.js";
import { runInit } from "./internal/commands/init.js";
import { runPairs } from "./internal/commands/pairs.js";
import { formatCompileError } from "./internal/report.js";

export type Cmd = "init" | "generate" | "check" | "pairs" | "help";

function usage(): void {
  console.log(
    [
      "upcast v0",
      "",
      "Usage:",
      "  upcast init",
      "  upcast generate",
      "  upcast check <file> [--strict]",
      "  upcast pairs <file>",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "init" || cmd === "generate" || cmd === "check" || cmd === "pairs" || cmd === "help") return cmd;
  return "help";
}

function readSource(fileName: string): string | undefined {
  try {
    return readFileSync(resolve(cwd(), fileName), "utf-8");
  } catch {
    // The location is dropped when the source can't be read.
    return undefined;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof CompileError) {
    return formatCompileError(err, err.span ? readSource(err.span.fileName) : undefined);
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "init":
        await runInit({ dir: cwd() });
        return;
      case "generate": {
        const result = await runGenerate({ dir: cwd() });
        if (!result.ok) exit(1);
        return;
      }
      case "check": {
        const ok = await runCheck({ dir: cwd(), argv: argv.slice(3) });
        if (!ok) exit(1);
        return;
      }
      case "pairs":
        await runPairs({ dir: cwd(), argv: argv.slice(3) });
        return;
      default:
        usage();
        exit(1);
    }
  } catch (err: unknown) {
    console.error(describeError(err));
    exit(1);
  }
}

// npm links the bin, so compare real paths.
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  void main();
}
