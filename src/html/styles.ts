/// # stylesheet
///
/// inlined into every page unless `cssFile` points somewhere else. the
/// layout is a single reading column; object descriptions are definition
/// lists with a shaded signature line, and prose code fences keep shiki's
/// github-light colors.

export const defaultCss = `
body {
  font-family: system-ui, sans-serif;
  margin: 0;
  padding: 2rem 1rem;
  line-height: 1.6;
  color: #24292e;
}

.watermark {
  position: absolute;
  top: 0;
  left: 0;
  right: 0;
  display: flex;
  justify-content: space-between;
  padding: 0.5rem 1rem;
  font-size: 12px;
  color: #ccc;
}

.watermark a {
  color: #999;
  text-decoration: none;
}

.watermark-right {
  font-style: italic;
}

.apiref {
  font-size: 15px;
  max-width: 90ch;
  margin: 0 auto;
}

.apiref h1 { font-size: 1.8rem; border-bottom: 1px solid #eee; padding-bottom: 0.3rem; }
.apiref h2 { font-size: 1.4rem; margin-top: 2rem; }
.apiref h3 { font-size: 1.1rem; }

a { color: #0366d6; text-decoration: none; }
a:hover { text-decoration: underline; }

code, .sig {
  font-family: 'SF Mono', 'Fira Code', 'Consolas', monospace;
  font-size: 0.9em;
}

/* prose */
.prose p { margin: 0.75rem 0; }
.prose code { background: #f6f8fa; padding: 0.2em 0.4em; border-radius: 3px; }
.prose pre {
  font-size: 14px;
  line-height: 1.5;
  background: #f6f8fa;
  padding: 1rem;
  border-radius: 6px;
  overflow-x: auto;
}
.prose pre code { background: none; padding: 0; }
.prose blockquote {
  margin: 1rem 0;
  padding: 0.5rem 1rem;
  border-left: 4px solid #dfe2e5;
  color: #6a737d;
}

/* object descriptions */
dl.py { margin: 1rem 0 1.5rem; }
dl.py > dt.sig {
  background: #f6f8fa;
  border-left: 3px solid #6f42c1;
  padding: 0.3rem 0.6rem;
  margin-top: 0.25rem;
}
dl.py > dd { margin: 0.5rem 0 0 1.5rem; }
dl.py.method > dt.sig, dl.py.attribute > dt.sig { border-left-color: #005cc5; }

.sig-name { font-weight: 600; color: #6f42c1; }
.sig-annotation { color: #d73a49; font-style: normal; }
.sig-param { font-style: normal; }
.sig-return-icon { color: #6a737d; }
.default-value { color: #005cc5; }
.type-expr code { color: #6f42c1; }
.xref.unresolved { color: inherit; }

.headerlink { visibility: hidden; margin-left: 0.3rem; color: #aaa; }
dt.sig:hover .headerlink { visibility: visible; }

/* admonitions and errors */
.admonition {
  border-left: 4px solid #f0ad4e;
  background: #fcf8f2;
  padding: 0.4rem 0.8rem;
  margin: 0.5rem 0;
}
.error {
  border-left: 4px solid #d73a49;
  background: #ffeef0;
  padding: 0.4rem 0.8rem;
  color: #86181d;
}

/* two-column tables */
table.contents-table { border-collapse: collapse; width: 100%; margin: 1rem 0; }
table.contents-table th, table.contents-table td {
  border: 1px solid #dfe2e5;
  padding: 0.4rem 0.75rem;
  text-align: left;
  vertical-align: top;
}
table.contents-table th { background: #f6f8fa; }

ul.submodules, ul.modules { list-style: none; padding-left: 0; }
`;
