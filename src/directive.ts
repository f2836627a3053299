/// # directives
///
/// the two entry points a documentation page uses to pull in API docs:
///
/// - `apiDirective(env, "pkg.sub")` renders one module's full reference.
/// - `apiPackageDirective(env, "pkg")` renders `pkg` and every module
///   under it, each in its own titled section, sorted by name.
///
/// both find the IR from the docs source directory on every call. a
/// missing IR throws; everything after that degrades in place.

import type { AssembleOptions } from "./assemble.js";
import { renderModule, renderPackage } from "./assemble.js";
import { defaultIrFileName, loadDocPackage, locateIrFile, type DocPackage } from "./ir.js";
import { createRenderContext, type CrossReferenceRegistry, type RenderContext } from "./registry.js";
import type { BlockNode } from "./tree.js";
import type { TypeStringCache } from "./type-string.js";

export interface DirectiveEnv {
  /// docs source directory; the IR is looked up under `api/` here first
  srcdir: string;
  /// the page being rendered, which symbols get registered against
  docname: string;
  registry: CrossReferenceRegistry;
  cache?: TypeStringCache;
  irFileName?: string;
  options?: AssembleOptions;
  /// non-fatal problems found while rendering are appended here
  warnings?: string[];
}

export function loadEnvPackage(env: DirectiveEnv): DocPackage {
  return loadDocPackage(locateIrFile(env.srcdir, env.irFileName ?? defaultIrFileName));
}

function withContext(env: DirectiveEnv, render: (ctx: RenderContext) => BlockNode[]): BlockNode[] {
  const ctx = createRenderContext(env.docname, env.registry, env.cache);
  const nodes = render(ctx);
  env.warnings?.push(...ctx.warnings);
  return nodes;
}

export function apiDirective(env: DirectiveEnv, moduleName: string): BlockNode[] {
  const pkg = loadEnvPackage(env);
  return withContext(env, (ctx) => renderModule(pkg, moduleName, ctx, env.options));
}

export function apiPackageDirective(env: DirectiveEnv, packageName: string): BlockNode[] {
  const pkg = loadEnvPackage(env);
  return withContext(env, (ctx) => renderPackage(pkg, packageName, ctx, env.options));
}
