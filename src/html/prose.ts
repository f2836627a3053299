/// # prose rendering
///
/// docstrings are markdown. they go through
/// [marked](https://github.com/markedjs/marked), and fenced code inside
/// them is highlighted by [shiki](https://shiki.matsu.io/) through the
/// `marked-shiki` plugin.

import { Marked } from "marked";
import markedShiki from "marked-shiki";
import { createHighlighter, type BundledLanguage } from "shiki";
import { escapeHtml } from "./inline.js";

let pipeline: Promise<Marked> | null = null;

async function buildMarked(): Promise<Marked> {
  const highlighter = await createHighlighter({
    themes: ["github-light"],
    langs: ["python", "rust", "bash", "json", "toml"],
  });

  /// an unlabeled fence is python; a language we didn't load falls back
  /// to plain text.
  const instance = new Marked();
  instance.use(
    markedShiki({
      highlight(code, lang) {
        const language = lang || "python";
        const loaded = highlighter.getLoadedLanguages();
        const actual = loaded.includes(language as BundledLanguage) ? language : "plaintext";
        return highlighter.codeToHtml(code, { lang: actual, theme: "github-light" });
      },
    })
  );
  return instance;
}

/// the highlighter loads its grammars once. pages are rendered
/// concurrently, so the pending build is what gets shared: every caller,
/// including the ones that arrive before it finishes, awaits the same
/// pipeline. docstrings of a python extension mostly show python, with the
/// odd shell session or rust snippet.
export function initMarked(): Promise<Marked> {
  pipeline ??= buildMarked();
  return pipeline;
}

/// markdown that marked can't handle is shown as the raw docstring in a
/// single paragraph, so a bad docstring costs its formatting and nothing
/// else.
export async function renderProse(markdown: string): Promise<string> {
  try {
    const instance = await initMarked();
    const html = await instance.parse(markdown);
    return `<div class="prose">${html}</div>`;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return `<div class="prose prose-raw" data-error="${escapeHtml(reason)}"><p>${escapeHtml(markdown)}</p></div>`;
  }
}
