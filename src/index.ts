/// # pyapi-ref
///
/// api reference pages for python extension modules. a stub generator
/// describes the extension's public surface (modules, functions, classes,
/// type aliases, variables, and the types in their signatures) as a JSON
/// IR; this library turns that IR into a cross-linked documentation tree
/// and the tree into html.
///
/// the pieces, bottom up:
///
/// 1. **classification**: which bare or dotted names in a type string link
///    to external docs (`classify.ts`).
/// 2. **flat type strings**: splitting a display string into text and
///    links (`type-string.ts`).
/// 3. **type expressions**: rendering the IR's nested types with brackets,
///    separators and links in the right places (`type-expr.ts`).
/// 4. **default values**: rebuilding a default's text with its embedded
///    references linked (`default-value.ts`).
/// 5. **assembly**: one module's items into sections of object
///    descriptions, with every symbol registered for cross-referencing
///    (`assemble.ts`).
///
/// around them sit the IR loader, the directives, the html backend, and a
/// site generator that ties it all together.

export { classify, type Classification } from "./classify.js";
export { parseTypeString, typeStringNodes, fragmentNodes, TypeStringCache, type TypeFragment } from "./type-string.js";
export { renderTypeExpression, refTypeFor, isTopLevelUnion, genericBase } from "./type-expr.js";
export { reconstructDefault, defaultValueNodes, defaultDisplay, type DefaultFragment } from "./default-value.js";
export {
  renderModule,
  renderModuleBody,
  renderModulePage,
  registerModule,
  renderPackage,
  modulesUnder,
  groupItems,
  dedent,
  type AssembleOptions,
} from "./assemble.js";
export { CrossReferenceRegistry, createRenderContext, type RegistryEntry, type RenderContext } from "./registry.js";
export { apiDirective, apiPackageDirective, loadEnvPackage, type DirectiveEnv } from "./directive.js";
export {
  loadDocPackage,
  parseDocPackage,
  locateIrFile,
  irSearchPaths,
  type DocPackage,
  type DocModule,
  type DocItem,
  type TypeExpression,
  type LinkTarget,
  type DefaultValue,
  type TypeRef,
} from "./ir.js";
export { loadConfig, parseConfig, defaultConfig, type DocGenConfig } from "./config.js";
export { generateSite, indexTree, renderStandalone, siteRegistry, type SiteResult, type StandalonePage } from "./site.js";
export { ApiRefError, IrNotFoundError, IrFormatError, ConfigError } from "./errors.js";
export { textOf, type BlockNode, type InlineNode } from "./tree.js";
export { renderHtml, renderPage, wrapHtml, createXrefResolver, type HtmlOptions, type XrefResolver } from "./html.js";
