/// # site generation
///
/// a whole package in, a set of html pages out:
///
/// - one page per module (`pkg.sub.html`), or with `separatePages: false`
///   a single page holding the whole package;
/// - an `index.html` with a title, an intro paragraph and a list of every
///   module.
///
/// the build runs in two passes. first every page is assembled into a
/// tree, each into its own registry, and the registries are merged. then,
/// with every symbol known, the pages are rendered to html concurrently;
/// that's the pass that resolves cross-references, including the ones that
/// point at other pages.

import { modulesUnder, renderModulePage, renderPackage, type AssembleOptions } from "./assemble.js";
import { defaultExternalDocs, indexTitle, introMessage, type DocGenConfig } from "./config.js";
import { createXrefResolver, pageFileName, renderPage } from "./html/index.js";
import type { DocPackage } from "./ir.js";
import { CrossReferenceRegistry, createRenderContext, type RenderContext } from "./registry.js";
import { literal, paragraph, section, text, xref, type BlockNode, type ListItemNode } from "./tree.js";
import { TypeStringCache } from "./type-string.js";

export interface PageTree {
  docname: string;
  title: string;
  nodes: BlockNode[];
}

export interface SiteResult {
  /// output file name (relative to the output directory) → html
  files: Map<string, string>;
  registry: CrossReferenceRegistry;
  warnings: string[];
}

export const indexDocname = "index";

/// the packages to document when the IR doesn't name one: every distinct
/// top-level module.
export function rootPackages(pkg: DocPackage): string[] {
  if (pkg.name) return [pkg.name];
  return [...new Set(Object.keys(pkg.modules).map((name) => name.split(".")[0]))].sort();
}

/// with one page per module, module links go to that page. when every
/// module is on the page being built (a single-page site, a package on its
/// own) they go to the module's section.
function assembleOptions(config: DocGenConfig, singlePage = !config.separatePages): AssembleOptions {
  return singlePage
    ? { contentsTable: config.contentsTable, moduleUri: (fqn) => `#module-${fqn}` }
    : { contentsTable: config.contentsTable };
}

function assemblePages(pkg: DocPackage, config: DocGenConfig, registry: CrossReferenceRegistry, warnings: string[]): PageTree[] {
  const cache = new TypeStringCache();
  const options = assembleOptions(config);
  const pages: PageTree[] = [];

  const build = (docname: string, title: string, render: (ctx: RenderContext) => BlockNode[]) => {
    const ctx = createRenderContext(docname, new CrossReferenceRegistry(), cache);
    const nodes = render(ctx);
    warnings.push(...ctx.warnings);
    for (const fqn of registry.merge(ctx.registry)) {
      warnings.push(`${fqn} is documented on more than one page; keeping the first`);
    }
    pages.push({ docname, title, nodes });
  };

  if (config.separatePages) {
    for (const moduleName of Object.keys(pkg.modules).sort()) {
      build(moduleName, moduleName, (ctx) => renderModulePage(pkg, moduleName, ctx, options));
    }
  } else {
    const docname = pkg.name || "api";
    build(docname, indexTitle(config, pkg.name), (ctx) => rootPackages(pkg).flatMap((root) => renderPackage(pkg, root, ctx, options)));
  }

  return pages;
}

export function indexTree(pkg: DocPackage, config: DocGenConfig): BlockNode[] {
  const children: BlockNode[] = [];
  const intro = introMessage(config);
  if (intro) children.push(paragraph([text(intro)]));

  const modules = rootPackages(pkg).flatMap((root) => modulesUnder(pkg, root));
  const items: ListItemNode[] = modules.map((name) => ({
    type: "listItem",
    children: [paragraph([xref("mod", name, [literal(name)], true)])],
  }));
  if (items.length > 0) {
    children.push(section("modules", "Modules", [{ type: "bulletList", classes: ["modules"], items }]));
  }

  return [section(indexDocname, indexTitle(config, pkg.name), children)];
}

export async function generateSite(pkg: DocPackage, config: DocGenConfig): Promise<SiteResult> {
  const registry = new CrossReferenceRegistry();
  const warnings: string[] = [];
  const pages = assemblePages(pkg, config, registry, warnings);
  pages.push({ docname: indexDocname, title: indexTitle(config, pkg.name), nodes: indexTree(pkg, config) });

  const externalDocs = { ...defaultExternalDocs, ...config.externalDocs };
  const rendered = await Promise.all(
    pages.map(async (page) => {
      const resolve = createXrefResolver({ registry, docname: page.docname, externalDocs });
      const html = await renderPage(page.nodes, resolve, { title: page.title, cssFile: config.cssFile });
      return [pageFileName(page.docname), html] as const;
    })
  );

  return { files: new Map(rendered), registry, warnings };
}

/// ## standalone pages
///
/// a single module or package rendered on its own, the way `pyapi-ref
/// module` and `pyapi-ref package` print it. links have to land where the
/// full site would put their targets, so the whole site is assembled first
/// and its registry consulted after the page's own symbols.

export interface StandalonePage {
  html: string;
  warnings: string[];
}

export function siteRegistry(pkg: DocPackage, config: DocGenConfig): CrossReferenceRegistry {
  const registry = new CrossReferenceRegistry();
  assemblePages(pkg, config, registry, []);
  return registry;
}

export async function renderStandalone(
  pkg: DocPackage,
  config: DocGenConfig,
  name: string,
  mode: "module" | "package"
): Promise<StandalonePage> {
  const ctx = createRenderContext(name);
  const options = assembleOptions(config, mode === "package" || !config.separatePages);
  const nodes = mode === "module" ? renderModulePage(pkg, name, ctx, options) : renderPackage(pkg, name, ctx, options);

  const registry = new CrossReferenceRegistry();
  registry.merge(ctx.registry);
  registry.merge(siteRegistry(pkg, config));

  const resolve = createXrefResolver({
    registry,
    docname: name,
    externalDocs: { ...defaultExternalDocs, ...config.externalDocs },
  });
  const html = await renderPage(nodes, resolve, { title: name, cssFile: config.cssFile });
  return { html, warnings: ctx.warnings };
}
