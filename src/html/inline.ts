/// # inline rendering
///
/// turns inline tree nodes (text runs, literals, signature parts and
/// cross-references) into html. the only decision of any interest is what
/// a pending cross-reference becomes: an `<a>` when the resolver knows
/// where it points, an inert `<span>` when it doesn't. a dead link is
/// worse than no link.

import type { InlineNode, ParameterNode } from "../tree.js";
import type { XrefResolver } from "./types.js";

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

/// html ids are allowed almost anything, but fragment urls aren't. dots
/// survive (fqns keep reading like fqns); the rest becomes a dash.
export function sanitizeId(s: string): string {
  return s.replace(/[^a-zA-Z0-9._-]/g, "-");
}

function classAttr(classes: readonly string[] | undefined): string {
  return classes && classes.length > 0 ? ` class="${escapeHtml(classes.join(" "))}"` : "";
}

function renderParameter(param: ParameterNode, resolve: XrefResolver): string {
  return `<em class="sig-param">${renderInlines(param.children, resolve)}</em>`;
}

export function renderInline(node: InlineNode, resolve: XrefResolver): string {
  switch (node.type) {
    case "text":
      return escapeHtml(node.text);
    case "literal":
      return `<code${classAttr(node.classes)}>${escapeHtml(node.text)}</code>`;
    case "strong":
      return `<strong>${escapeHtml(node.text)}</strong>`;
    case "inline":
      return `<span${classAttr(node.classes)}>${renderInlines(node.children, resolve)}</span>`;
    case "xref": {
      const inner = renderInlines(node.children, resolve);
      const link = resolve(node);
      if (!link) {
        return `<span class="xref unresolved">${inner}</span>`;
      }
      const kind = link.external ? "external" : "internal";
      const title = link.title ? ` title="${escapeHtml(link.title)}"` : "";
      return `<a class="reference ${kind}" href="${escapeHtml(link.href)}"${title}>${inner}</a>`;
    }
    case "reference": {
      const title = node.title ? ` title="${escapeHtml(node.title)}"` : "";
      return `<a class="reference" href="${escapeHtml(node.uri)}"${title}>${renderInlines(node.children, resolve)}</a>`;
    }
    case "annotation":
      return `<em class="sig-annotation">${renderInlines(node.children, resolve)}</em>`;
    case "name":
      return `<span class="sig-name"><code>${escapeHtml(node.text)}</code></span>`;
    case "parameterList": {
      const params = node.parameters.map((param) => renderParameter(param, resolve)).join(", ");
      return `<span class="sig-paren">(</span>${params}<span class="sig-paren">)</span>`;
    }
    case "returns":
      return ` <span class="sig-return"><span class="sig-return-icon">&#x2192;</span> ${renderInlines(node.children, resolve)}</span>`;
  }
}

export function renderInlines(nodes: readonly InlineNode[], resolve: XrefResolver): string {
  return nodes.map((node) => renderInline(node, resolve)).join("");
}
