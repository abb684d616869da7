import { expect } from "chai";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { captureOutput } from "../testing.js";
import { runCheck } from "./check.js";

const UNUSED_T =
  "h.upcast:1:13: {severity}: UPC2001: Binding parameter 'T' does not appear in the conversion from 'C' to 'A'; rustc rejects unconstrained impl parameters (E0207).";

function withFile(text: string): string {
  const dir = mkdtempSync(join(tmpdir(), "upcast-check-"));
  writeFileSync(join(dir, "h.upcast"), text, "utf-8");
  return dir;
}

describe("@upcast/cli check", () => {
  it("prints findings and a summary", async () => {
    const dir = withFile("[T] A { B { C } }\n");
    const output = captureOutput();
    const ok = await runCheck({ dir, argv: ["h.upcast"], output });

    expect(ok).to.equal(true);
    expect(output.errors).to.deep.equal([UNUSED_T.replace("{severity}", "warning")]);
    expect(output.logs).to.deep.equal(["h.upcast: 1 conversion, 0 errors, 1 warning."]);
  });

  it("turns findings into errors with --strict", async () => {
    const dir = withFile("[T] A { B { C } }\n");
    const output = captureOutput();
    const ok = await runCheck({ dir, argv: ["--strict", "h.upcast"], output });

    expect(ok).to.equal(false);
    expect(output.errors).to.deep.equal([UNUSED_T.replace("{severity}", "error")]);
    expect(output.logs).to.deep.equal(["h.upcast: 1 conversion, 1 error, 0 warnings."]);
  });

  it("reports a clean file", async () => {
    const dir = withFile("[] A { B { C, D } }\n");
    const output = captureOutput();
    expect(await runCheck({ dir, argv: ["h.upcast"], output })).to.equal(true);
    expect(output.logs).to.deep.equal(["h.upcast: 2 conversions, 0 errors, 0 warnings."]);
  });

  it("rejects bad arguments", async () => {
    const dir = withFile("[]\n");
    for (const [argv, message] of [
      [[], "Usage: upcast check <file> [--strict]"],
      [["a.upcast", "b.upcast"], "check: expected a single input file."],
      [["--fast", "h.upcast"], "check: unknown option '--fast'."],
    ] as const) {
      let err: unknown;
      try {
        await runCheck({ dir, argv, output: captureOutput() });
      } catch (e) {
        err = e;
      }
      expect(err).to.be.instanceOf(Error);
      if (err instanceof Error) expect(err.message).to.equal(message);
    }
  });
});
