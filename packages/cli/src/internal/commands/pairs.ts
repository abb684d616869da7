import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { parseHierarchy, planConversions } from "@upcast/compiler";

import { consoleOutput, type CommandOutput } from "../report.js";

export type PairsArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly output?: CommandOutput;
};

export async function runPairs(args: PairsArgs): Promise<void> {
  const output = args.output ?? consoleOutput;
  const [file, ...rest] = args.argv;
  if (file === undefined || rest.length > 0) throw new Error("Usage: upcast pairs <file>");

  const source = readFileSync(resolve(args.dir, file), "utf-8");
  const plan = planConversions(parseHierarchy(source, file));
  for (const a of plan.artifacts) {
    output.log(`${a.descendant} -> ${a.ancestor} via ${a.intermediate}`);
  }
}
