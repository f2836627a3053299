/// # html backend
///
/// the entry points for turning documentation tree nodes into html:
///
/// - `renderHtml` renders a run of blocks to an html fragment.
/// - `wrapHtml` puts a fragment into a complete page.
/// - `renderPage` does both.
///
/// cross-references are resolved through the `XrefResolver` passed in, so
/// a page can only be rendered once every page's symbols are registered.

import type { BlockNode } from "../tree.js";
import { defaultCss } from "./styles.js";
import { escapeHtml } from "./inline.js";
import { initMarked } from "./prose.js";
import { renderBlocks } from "./render.js";
import type { HtmlOptions, XrefResolver } from "./types.js";

export type { HtmlOptions, ResolvedLink, XrefResolver } from "./types.js";
export { createXrefResolver, externalUrl, pageFileName, type ResolverOptions } from "./resolve.js";
export { escapeHtml, sanitizeId, renderInline, renderInlines } from "./inline.js";
export { initMarked, renderProse } from "./prose.js";

export async function renderHtml(nodes: readonly BlockNode[], resolve: XrefResolver): Promise<string> {
  await initMarked();
  return renderBlocks(nodes, { resolve, level: 1 });
}

/// every page is self-contained unless `cssFile` is given, in which case
/// it links that stylesheet instead of inlining ours.
export function wrapHtml(body: string, options: HtmlOptions = {}): string {
  const title = options.title ?? "API Reference";
  const css = options.cssFile ? `<link rel="stylesheet" href="${escapeHtml(options.cssFile)}">` : `<style>${defaultCss}</style>`;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  ${css}
</head>
<body>
<header class="watermark">
  <a href="index.html" class="watermark-left">index</a>
  <span class="watermark-right">pyapi-ref</span>
</header>
<main class="apiref">
${body}
</main>
</body>
</html>`;
}

export async function renderPage(nodes: readonly BlockNode[], resolve: XrefResolver, options: HtmlOptions = {}): Promise<string> {
  return wrapHtml(await renderHtml(nodes, resolve), options);
}
