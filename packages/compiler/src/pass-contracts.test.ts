import { expect } from "chai";
import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

describe("@upcast/compiler pass contracts", () => {
  function srcRoot(): string {
    const here = fileURLToPath(import.meta.url);
    return resolve(dirname(here));
  }

  function readTsSource(path: string): { readonly text: string; readonly sf: ts.SourceFile } {
    const text = readFileSync(path, "utf-8");
    const sf = ts.createSourceFile(path, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
    return { text, sf };
  }

  function getFunctionBodyText(path: string, name: string): string {
    const { text, sf } = readTsSource(path);
    const found = sf.statements.find(
      (st): st is ts.FunctionDeclaration => ts.isFunctionDeclaration(st) && st.name?.text === name
    );
    expect(found, `Function '${name}' must exist in ${path}`).to.not.equal(undefined);
    const body = found?.body;
    if (!body) return expect.fail(`Function '${name}' in ${path} must have a body`);
    return text.slice(body.pos, body.end);
  }

  function importSpecifiers(path: string): readonly string[] {
    const { sf } = readTsSource(path);
    const out: string[] = [];
    for (const st of sf.statements) {
      if (ts.isImportDeclaration(st) && ts.isStringLiteral(st.moduleSpecifier)) out.push(st.moduleSpecifier.text);
      if (ts.isExportDeclaration(st) && st.moduleSpecifier && ts.isStringLiteral(st.moduleSpecifier)) {
        out.push(st.moduleSpecifier.text);
      }
    }
    return out;
  }

  it("keeps generateTransitiveConversions pass boundaries explicit", () => {
    const body = getFunctionBodyText(join(srcRoot(), "generate.ts"), "generateTransitiveConversions");
    expect(body).to.contain("const hierarchy = parseHierarchy(opts.source, opts.fileName);");
    expect(body).to.contain("const plan = planConversions(hierarchy);");
    expect(body).to.contain("const diagnostics = lintHierarchy(plan, opts.lint);");
    expect(body).to.contain("writeConversionPlanJson(plan)");
    expect(body).to.contain("writeRustProgram(emitConversionProgram(plan), {");

    expect(body).to.not.contain("tokenize(");
    expect(body).to.not.contain("deriveConversionEdges(");
    expect(body).to.not.contain("walkNodes(");
  });

  it("keeps derivation independent of any output target", () => {
    for (const file of ["passes/derive.ts", "passes/bindings.ts", "passes/lint.ts"]) {
      const specifiers = importSpecifiers(join(srcRoot(), file));
      expect(specifiers.filter((s) => s.startsWith("../rust/") || s.startsWith("../json/")), file).to.deep.equal([]);
    }
  });

  it("keeps the emitter free of parsing and derivation", () => {
    const specifiers = importSpecifiers(join(srcRoot(), "passes", "emit.ts"));
    expect(specifiers).to.not.include("../hierarchy/parse.js");
    expect(specifiers).to.not.include("./derive.js");
  });

  it("keeps the runtime table on the plan, not the emitted text", () => {
    const specifiers = importSpecifiers(join(srcRoot(), "runtime", "conversion-table.ts"));
    expect(specifiers.filter((s) => s.startsWith("../rust/") || s.startsWith("../json/"))).to.deep.equal([]);
  });

  it("threads a single binding set through derivation", () => {
    const body = getFunctionBodyText(join(srcRoot(), "passes", "derive.ts"), "deriveConversionEdges");
    expect(body).to.contain("const bindings = propagateBindings(hierarchy.bindings);");
    expect(body.match(/propagateBindings\(/g)?.length).to.equal(1);
  });
});
