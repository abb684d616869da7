import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { findProjectRoot, loadProjectConfig, loadProjectContext, parseProjectConfig } from "./config.js";
import { runInit } from "./commands/init.js";
import { captureOutput } from "./testing.js";

describe("@upcast/cli config", () => {
  it("findProjectRoot picks the nearest project root", () => {
    const root = mkdtempSync(join(tmpdir(), "upcast-config-project-"));
    const nested = join(root, "packages", "demo");
    const deep = join(nested, "src", "docs");
    mkdirSync(deep, { recursive: true });
    writeFileSync(join(root, "upcast.json"), "{}\n", "utf-8");
    writeFileSync(join(nested, "upcast.json"), "{}\n", "utf-8");

    expect(findProjectRoot(deep)).to.equal(nested);
  });

  it("findProjectRoot fails outside any project", () => {
    const root = mkdtempSync(join(tmpdir(), "upcast-config-none-"));
    // Assumes no upcast.json above the system temp dir.
    expect(() => findProjectRoot(root)).to.throw("Could not find upcast.json in this directory or any parent.");
  });

  it("loads a strict project config and rejects unknown keys", () => {
    const root = mkdtempSync(join(tmpdir(), "upcast-config-strict-"));
    const path = join(root, "upcast.json");
    writeFileSync(path, JSON.stringify({ schema: 1, input: "h.upcast", out: "out.rs", extra: true }) + "\n", "utf-8");
    expect(() => loadProjectConfig(path)).to.throw("upcast.json: unknown key 'extra'.");

    writeFileSync(path, JSON.stringify({ schema: 1, input: "h.upcast", out: "out.rs" }) + "\n", "utf-8");
    expect(loadProjectConfig(path)).to.deep.equal({ schema: 1, input: "h.upcast", out: "out.rs" });
  });

  it("keeps every optional setting", () => {
    const config = parseProjectConfig({
      schema: 1,
      input: "h.upcast",
      out: "out.rs",
      target: "rust",
      header: ["// one", ""],
      spanComments: true,
      sourceMap: true,
      lint: { unusedBindings: "off", duplicateLabels: "error" },
    });
    expect(config).to.deep.equal({
      schema: 1,
      input: "h.upcast",
      out: "out.rs",
      target: "rust",
      header: ["// one", ""],
      spanComments: true,
      sourceMap: true,
      lint: { unusedBindings: "off", duplicateLabels: "error" },
    });
  });

  it("rejects invalid values", () => {
    const base = { schema: 1, input: "h.upcast", out: "out.rs" };
    expect(() => parseProjectConfig([])).to.throw("upcast.json must be a JSON object.");
    expect(() => parseProjectConfig({ ...base, schema: 2 })).to.throw("Unsupported upcast.json schema.");
    expect(() => parseProjectConfig({ ...base, input: "" })).to.throw("upcast.json: 'input' must be a non-empty string.");
    expect(() => parseProjectConfig({ ...base, target: "c" })).to.throw("upcast.json: 'target' must be 'rust' or 'json'.");
    expect(() => parseProjectConfig({ ...base, header: ["ok", 3] })).to.throw("upcast.json: 'header'[1] must be a string.");
    expect(() => parseProjectConfig({ ...base, spanComments: "yes" })).to.throw(
      "upcast.json: 'spanComments' must be a boolean."
    );
    expect(() => parseProjectConfig({ ...base, lint: { unusedBindings: "loud" } })).to.throw(
      "upcast.json: 'lint.unusedBindings' must be 'off', 'warn' or 'error'."
    );
    expect(() => parseProjectConfig({ ...base, lint: { shadowing: "warn" } })).to.throw(
      "upcast.json: 'lint': unknown key 'shadowing'."
    );
  });

  it("requires span comments and a Rust target for source maps", () => {
    const base = { schema: 1, input: "h.upcast", out: "out.rs", sourceMap: true };
    expect(() => parseProjectConfig({ ...base, target: "json" })).to.throw(
      "upcast.json: 'sourceMap' requires target 'rust'."
    );
    expect(() => parseProjectConfig({ ...base, spanComments: false })).to.throw(
      "upcast.json: 'sourceMap' requires 'spanComments'."
    );
  });

  it("rejects Rust-only settings for the JSON target", () => {
    const base = { schema: 1, input: "h.upcast", out: "plan.json", target: "json" };
    expect(() => parseProjectConfig({ ...base, header: ["// h"] })).to.throw(
      "upcast.json: 'header' requires target 'rust'."
    );
    expect(() => parseProjectConfig({ ...base, spanComments: true })).to.throw(
      "upcast.json: 'spanComments' requires target 'rust'."
    );
    expect(() => parseProjectConfig({ ...base, spanComments: false })).to.throw(
      "upcast.json: 'spanComments' requires target 'rust'."
    );
    expect(parseProjectConfig(base)).to.deep.equal(base);
  });

  it("loads the context written by init", async () => {
    const root = mkdtempSync(join(tmpdir(), "upcast-config-init-"));
    await runInit({ dir: root, output: captureOutput() });
    const nested = join(root, "src");
    mkdirSync(nested, { recursive: true });

    const ctx = loadProjectContext(nested);
    expect(ctx.projectRoot).to.equal(root);
    expect(ctx.project.input).to.equal("hierarchy.upcast");
    expect(ctx.project.sourceMap).to.equal(true);
  });
});
