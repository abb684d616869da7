import type { CommandOutput } from "./report.js";

export type CapturedOutput = CommandOutput & {
  readonly logs: string[];
  readonly errors: string[];
};

export function captureOutput(): CapturedOutput {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (line) => logs.push(line),
    error: (line) => errors.push(line),
  };
}
