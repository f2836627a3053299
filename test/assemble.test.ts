import { describe, it, expect } from "vitest";
import { dedent, modulesUnder, renderModule, renderModulePage, renderPackage } from "../src/assemble.js";
import { parseDocPackage } from "../src/ir.js";
import { createRenderContext } from "../src/registry.js";
import { literal, textOf, xref, type BlockNode, type DescNode, type SectionNode } from "../src/tree.js";
import { loadFixture } from "./helpers.js";

const pkg = loadFixture();

function sectionById(nodes: readonly BlockNode[], id: string): SectionNode {
  const found = nodes.find((n): n is SectionNode => n.type === "section" && n.id === id);
  if (!found) throw new Error(`no section ${id}`);
  return found;
}

function descs(nodes: readonly BlockNode[]): DescNode[] {
  return nodes.filter((n): n is DescNode => n.type === "desc");
}

const signatureText = (desc: DescNode, index = 0) => textOf(desc.signatures[index].children);

describe("renderModule", () => {
  it("puts sections in a fixed order and skips empty groups", () => {
    const nodes = renderModule(pkg, "mixed.main_mod", createRenderContext("page"));
    expect(nodes.map((n) => (n.type === "section" ? n.id : n.type))).toEqual([
      "mixed.main_mod-functions",
      "mixed.main_mod-classes",
      "mixed.main_mod-type-aliases",
      "mixed.main_mod-variables",
    ]);
    expect(nodes.map((n) => (n.type === "section" ? n.title : undefined))).toEqual([
      "Functions",
      "Classes",
      "Type Aliases",
      "Variables",
    ]);
  });

  it("leads with the module docstring and lists submodules", () => {
    const nodes = renderModule(pkg, "mixed", createRenderContext("page"));
    expect(nodes[0]).toEqual({ type: "prose", markdown: "Top-level package." });

    const submodules = sectionById(nodes, "mixed-submodules");
    expect(submodules.children).toEqual([
      {
        type: "bulletList",
        classes: ["submodules"],
        items: [
          {
            type: "listItem",
            children: [
              {
                type: "paragraph",
                children: [
                  { type: "strong", text: "module " },
                  {
                    type: "reference",
                    uri: "mixed.main_mod.html",
                    title: "Link to mixed.main_mod module",
                    children: [literal("main_mod", ["xref", "py", "py-mod"])],
                  },
                ],
              },
              { type: "prose", markdown: "Main module." },
            ],
          },
        ],
      },
    ]);
  });

  it("writes function signatures with types, defaults and return types", () => {
    const [add] = descs(sectionById(renderModule(pkg, "mixed", createRenderContext("page")), "mixed-functions").children);
    expect(add.objtype).toBe("function");
    expect(signatureText(add)).toBe("add(a: int, b: int = 1) -> int");

    const [make] = descs(
      sectionById(renderModule(pkg, "mixed.main_mod", createRenderContext("page")), "mixed.main_mod-functions").children
    );
    expect(signatureText(make)).toBe("async make(c: C = C.C1) -> Optional[numpy.ndarray]");
    expect(make.signatures[0].id).toBe("mixed.main_mod.make");
    expect(make.signatures[0].module).toBe("mixed.main_mod");
  });

  it("nests methods and attributes in the class body", () => {
    const nodes = renderModule(pkg, "mixed.main_mod", createRenderContext("page"));
    const [cls] = descs(sectionById(nodes, "mixed.main_mod-classes").children);

    expect(signatureText(cls)).toBe("class C");
    expect(cls.content[0]).toEqual({ type: "prose", markdown: "An enum." });

    const [method, attribute] = descs(cls.content);
    expect(method.objtype).toBe("method");
    expect(signatureText(method)).toBe("value() -> int");
    expect(attribute.objtype).toBe("attribute");
    expect(signatureText(attribute)).toBe("C1: C");
    expect(attribute.signatures[0].id).toBe("mixed.main_mod.C.C1");
    expect(attribute.content).toEqual([{ type: "prose", markdown: "First variant." }]);
  });

  it("describes type aliases and variables as data", () => {
    const nodes = renderModule(pkg, "mixed.main_mod", createRenderContext("page"));
    const [alias] = descs(sectionById(nodes, "mixed.main_mod-type-aliases").children);
    const [variable] = descs(sectionById(nodes, "mixed.main_mod-variables").children);

    expect(alias.objtype).toBe("data");
    expect(signatureText(alias)).toBe("type MaybeInt = int | None");
    expect(variable.objtype).toBe("data");
    expect(signatureText(variable)).toBe("VERSION: str");
  });

  it("registers every described symbol against the page", () => {
    const ctx = createRenderContext("page");
    renderModule(pkg, "mixed.main_mod", ctx);

    expect(ctx.registry.size).toBe(6);
    expect(ctx.registry.has("mixed.main_mod")).toBe(false);
    expect(ctx.registry.get("mixed.main_mod.C")?.objtype).toBe("class");
    expect(ctx.registry.get("mixed.main_mod.C.value")?.objtype).toBe("method");
    expect(ctx.registry.get("mixed.main_mod.C.C1")?.objtype).toBe("attribute");
    expect(ctx.registry.get("mixed.main_mod.make")).toEqual({
      fqn: "mixed.main_mod.make",
      objtype: "function",
      docname: "page",
      anchor: "mixed.main_mod.make",
    });
    expect(ctx.registry.get("mixed.main_mod.MaybeInt")?.objtype).toBe("data");
    expect(ctx.registry.get("mixed.main_mod.VERSION")?.objtype).toBe("data");
    expect(ctx.warnings).toEqual([]);
  });

  it("warns about symbols described twice and keeps the first", () => {
    const ctx = createRenderContext("first");
    renderModule(pkg, "mixed.main_mod", ctx);
    ctx.docname = "second";
    renderModule(pkg, "mixed.main_mod", ctx);

    expect(ctx.warnings).toHaveLength(6);
    expect(ctx.warnings).toContain("duplicate object description of mixed.main_mod.make");
    expect(ctx.registry.get("mixed.main_mod.make")?.docname).toBe("first");
  });

  it("returns an error node for a module that isn't there", () => {
    expect(renderModule(pkg, "mixed.b", createRenderContext("page"))).toEqual([
      { type: "error", message: "Module not found: mixed.b" },
    ]);
    expect(renderModule(pkg, "toString", createRenderContext("page"))).toEqual([
      { type: "error", message: "Module not found: toString" },
    ]);
  });

  it("adds a contents table when asked", () => {
    const nodes = renderModule(pkg, "mixed", createRenderContext("page"), { contentsTable: true });
    expect(nodes[1]).toEqual({
      type: "table",
      classes: ["contents-table"],
      header: ["Name", "Description"],
      rows: [
        {
          cells: [
            [{ type: "reference", uri: "mixed.main_mod.html", title: "Link to mixed.main_mod module", children: [literal("main_mod")] }],
            [{ type: "text", text: "Main module." }],
          ],
        },
        {
          cells: [
            [xref("func", "mixed.add", [literal("add")], true)],
            [{ type: "text", text: "Add two numbers." }],
          ],
        },
      ],
    });
  });
});

describe("module links", () => {
  it("point wherever the caller puts module documentation", () => {
    const nodes = renderModule(pkg, "mixed", createRenderContext("page"), { moduleUri: (fqn) => `#module-${fqn}` });
    const submodules = sectionById(nodes, "mixed-submodules");
    const [list] = submodules.children;
    if (list.type !== "bulletList") throw new Error("expected a list");
    const [paragraphNode] = list.items[0].children;
    if (paragraphNode.type !== "paragraph") throw new Error("expected a paragraph");

    expect(paragraphNode.children[1]).toEqual({
      type: "reference",
      uri: "#module-mixed.main_mod",
      title: "Link to mixed.main_mod module",
      children: [literal("main_mod", ["xref", "py", "py-mod"])],
    });
  });
});

describe("renderModulePage", () => {
  it("wraps the module in its anchored section and registers it", () => {
    const ctx = createRenderContext("page");
    const [page] = renderModulePage(pkg, "mixed.main_mod.sub", ctx);

    expect(page).toEqual({
      type: "section",
      id: "module-mixed.main_mod.sub",
      title: "mixed.main_mod.sub",
      children: [{ type: "prose", markdown: "Nested." }],
    });
    expect(ctx.registry.get("mixed.main_mod.sub")).toEqual({
      fqn: "mixed.main_mod.sub",
      objtype: "module",
      docname: "page",
      anchor: "module-mixed.main_mod.sub",
    });
  });

  it("registers nothing for a missing module", () => {
    const ctx = createRenderContext("page");
    const [page] = renderModulePage(pkg, "mixed.b", ctx);

    expect(page).toEqual({
      type: "section",
      id: "module-mixed.b",
      title: "mixed.b",
      children: [{ type: "error", message: "Module not found: mixed.b" }],
    });
    expect(ctx.registry.size).toBe(0);
  });
});

describe("overloads, deprecation and bases", () => {
  const small = parseDocPackage(
    {
      name: "p",
      modules: {
        p: {
          items: [
            {
              kind: "Function",
              name: "f",
              signatures: [
                { parameters: [{ name: "x", type_: { display: "int" } }] },
                { parameters: [{ name: "x", type_: { display: "str" } }], return_type: { display: "str" } },
              ],
              deprecated: { since: "0.3", note: "use g" },
            },
            { kind: "Function", name: "g" },
            {
              kind: "Class",
              name: "D",
              bases: [
                { display: "Base", link_target: { kind: "Class", fqn: "p.Base" } },
                { display: "typing.Generic[T]", children: [{ display: "T" }] },
              ],
            },
          ],
        },
      },
    },
    "inline"
  );

  it("gives every overload a line and only the first the anchor", () => {
    const nodes = renderModule(small, "p", createRenderContext("p"));
    const [f, g] = descs(sectionById(nodes, "p-functions").children);

    expect(f.signatures.map((s) => s.first)).toEqual([true, false]);
    expect(f.signatures.map((s) => s.id)).toEqual(["p.f", "p.f"]);
    expect(signatureText(f, 0)).toBe("f(x: int)");
    expect(signatureText(f, 1)).toBe("f(x: str) -> str");
    expect(signatureText(g)).toBe("g()");
  });

  it("puts a deprecation notice before the docstring", () => {
    const nodes = renderModule(small, "p", createRenderContext("p"));
    const [f] = descs(sectionById(nodes, "p-functions").children);
    expect(f.content).toEqual([
      { type: "admonition", kind: "deprecated", children: [{ type: "text", text: "Deprecated since 0.3: use g" }] },
    ]);
  });

  it("lists base classes after the class name", () => {
    const nodes = renderModule(small, "p", createRenderContext("p"));
    const [d] = descs(sectionById(nodes, "p-classes").children);
    expect(signatureText(d)).toBe("class D(Base, typing.Generic[T])");
  });
});

describe("renderPackage", () => {
  it("renders the package and everything under it, sorted", () => {
    const nodes = renderPackage(pkg, "mixed", createRenderContext("page"));
    const sections = nodes.filter((n): n is SectionNode => n.type === "section");

    expect(sections.map((s) => s.id)).toEqual(["module-mixed", "module-mixed.main_mod", "module-mixed.main_mod.sub"]);
    expect(sections.map((s) => s.title)).toEqual(["mixed Package", "mixed.main_mod Module", "mixed.main_mod.sub Module"]);
    expect(sections[2].children).toEqual([{ type: "prose", markdown: "Nested." }]);
  });

  it("registers each module against the section it builds", () => {
    const ctx = createRenderContext("page");
    renderPackage(pkg, "mixed", ctx);
    expect(ctx.registry.get("mixed.main_mod")?.anchor).toBe("module-mixed.main_mod");
    expect(ctx.registry.get("mixed")?.objtype).toBe("module");
    expect(ctx.registry.has("mixedup")).toBe(false);
  });

  it("matches whole name components only", () => {
    expect(modulesUnder(pkg, "mixed")).not.toContain("mixedup");
    expect(modulesUnder(pkg, "mixedup")).toEqual(["mixedup"]);
    expect(modulesUnder(pkg, "nothing")).toEqual([]);
  });
});

describe("dedent", () => {
  it("removes the common indentation", () => {
    expect(dedent("  a\n    b\n\n  c")).toBe("a\n  b\n\nc");
    expect(dedent("a\n  b")).toBe("a\n  b");
  });
});
