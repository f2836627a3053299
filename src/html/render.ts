/// # block rendering
///
/// walks the block nodes of the documentation tree and writes html. it's
/// async only because prose goes through marked and shiki; everything
/// else is string building.

import type { BlockNode, DescNode, SignatureNode, TableNode } from "../tree.js";
import { escapeHtml, renderInlines, sanitizeId } from "./inline.js";
import { renderProse } from "./prose.js";
import type { XrefResolver } from "./types.js";

/// section nesting decides the heading level; a page's outermost section
/// gets `<h1>`, and nothing goes deeper than `<h6>`.
export interface BlockRenderState {
  resolve: XrefResolver;
  level: number;
}

/// only the first signature of an overloaded function carries the id, so
/// a page never has two elements with the same one.
function renderSignature(sig: SignatureNode, state: BlockRenderState): string {
  const id = sanitizeId(sig.id);
  const idAttr = sig.first ? ` id="${escapeHtml(id)}"` : "";
  const headerLink = sig.first ? `<a class="headerlink" href="#${escapeHtml(id)}" title="Link to this definition">&#xb6;</a>` : "";
  return `<dt class="sig"${idAttr}>${renderInlines(sig.children, state.resolve)}${headerLink}</dt>`;
}

async function renderDesc(desc: DescNode, state: BlockRenderState): Promise<string> {
  let html = `<dl class="py ${desc.objtype}">`;
  for (const sig of desc.signatures) {
    html += renderSignature(sig, state);
  }
  html += `<dd>${await renderBlocks(desc.content, state)}</dd>`;
  html += "</dl>";
  return html;
}

function renderTable(table: TableNode, state: BlockRenderState): string {
  let html = `<table class="${escapeHtml(table.classes.join(" "))}">`;
  if (table.header) {
    html += `<thead><tr><th>${escapeHtml(table.header[0])}</th><th>${escapeHtml(table.header[1])}</th></tr></thead>`;
  }
  html += "<tbody>";
  for (const row of table.rows) {
    const [left, right] = row.cells;
    html += `<tr><td>${renderInlines(left, state.resolve)}</td><td>${renderInlines(right, state.resolve)}</td></tr>`;
  }
  html += "</tbody></table>";
  return html;
}

export async function renderBlock(node: BlockNode, state: BlockRenderState): Promise<string> {
  switch (node.type) {
    case "section": {
      const level = Math.min(state.level, 6);
      const heading = node.title ? `<h${level}>${escapeHtml(node.title)}</h${level}>` : "";
      const body = await renderBlocks(node.children, { ...state, level: state.level + 1 });
      return `<section id="${escapeHtml(sanitizeId(node.id))}">${heading}${body}</section>`;
    }
    case "paragraph":
      return `<p>${renderInlines(node.children, state.resolve)}</p>`;
    case "prose":
      return renderProse(node.markdown);
    case "error":
      return `<div class="error"><p>${escapeHtml(node.message)}</p></div>`;
    case "admonition":
      return `<div class="admonition ${node.kind}"><p>${renderInlines(node.children, state.resolve)}</p></div>`;
    case "bulletList": {
      let html = `<ul class="${escapeHtml(node.classes.join(" "))}">`;
      for (const item of node.items) {
        html += `<li>${await renderBlocks(item.children, state)}</li>`;
      }
      return html + "</ul>";
    }
    case "table":
      return renderTable(node, state);
    case "desc":
      return renderDesc(node, state);
  }
}

export async function renderBlocks(nodes: readonly BlockNode[], state: BlockRenderState): Promise<string> {
  let html = "";
  for (const node of nodes) {
    html += await renderBlock(node, state);
  }
  return html;
}
