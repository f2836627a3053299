/// # html generation (re-export)
///
/// the html backend lives in `./html/index.ts`; this barrel lets consumers
/// import it as one module.

export {
  renderHtml,
  renderPage,
  wrapHtml,
  createXrefResolver,
  externalUrl,
  pageFileName,
  escapeHtml,
  sanitizeId,
  renderInline,
  renderInlines,
  initMarked,
  renderProse,
  type HtmlOptions,
  type ResolvedLink,
  type ResolverOptions,
  type XrefResolver,
} from "./html/index.js";
