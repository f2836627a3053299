import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { copyFileSync, mkdirSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { apiDirective, apiPackageDirective, type DirectiveEnv } from "../src/directive.js";
import { IrNotFoundError } from "../src/errors.js";
import { CrossReferenceRegistry } from "../src/registry.js";
import { fixturePath } from "./helpers.js";

describe("directives", () => {
  let srcdir: string;

  beforeEach(() => {
    srcdir = mkdtempSync(join(tmpdir(), "pyapi-ref-"));
  });

  afterEach(() => {
    rmSync(srcdir, { recursive: true, force: true });
  });

  function envWithIr(docname: string, registry = new CrossReferenceRegistry()): DirectiveEnv {
    mkdirSync(join(srcdir, "api"), { recursive: true });
    copyFileSync(fixturePath, join(srcdir, "api", "api_reference.json"));
    return { srcdir, docname, registry, warnings: [] };
  }

  it("renders one module and registers it against the page", () => {
    const env = envWithIr("reference");
    const nodes = apiDirective(env, "mixed.main_mod");

    expect(nodes).toHaveLength(4);
    expect(env.registry.get("mixed.main_mod.C")?.docname).toBe("reference");
    expect(env.registry.has("mixed.main_mod")).toBe(false);
    expect(env.warnings).toEqual([]);
  });

  it("renders a package as one section per module", () => {
    const env = envWithIr("reference");
    const nodes = apiPackageDirective(env, "mixed");
    expect(nodes.map((n) => (n.type === "section" ? n.id : n.type))).toEqual([
      "module-mixed",
      "module-mixed.main_mod",
      "module-mixed.main_mod.sub",
    ]);
  });

  it("shares one registry across pages", () => {
    const registry = new CrossReferenceRegistry();
    apiDirective(envWithIr("one", registry), "mixed");
    const second = envWithIr("two", registry);
    apiDirective(second, "mixed");

    expect(registry.get("mixed.add")?.docname).toBe("one");
    expect(second.warnings).toEqual(["duplicate object description of mixed.add"]);
  });

  it("degrades a missing module to an error node", () => {
    expect(apiDirective(envWithIr("reference"), "mixed.b")).toEqual([
      { type: "error", message: "Module not found: mixed.b" },
    ]);
  });

  it("throws when the IR can't be found", () => {
    const env: DirectiveEnv = { srcdir, docname: "reference", registry: new CrossReferenceRegistry() };
    expect(() => apiDirective(env, "mixed")).toThrow(IrNotFoundError);
  });
});
