/// # link resolution
///
/// pending cross-references are resolved at html time, once every page has
/// registered its symbols. two places are consulted, in order:
///
/// 1. the registry: our own symbols. a target on the current page links to
///    its anchor; one on another page links to `<page>.html#anchor`.
/// 2. the external documentation map: for `typing.Optional`, find the
///    longest registered module prefix (`typing`) and fill its url
///    template.
///
/// anything else stays unlinked.

import type { CrossReferenceRegistry } from "../registry.js";
import type { XrefResolver } from "./types.js";
import { sanitizeId } from "./inline.js";

export interface ResolverOptions {
  registry: CrossReferenceRegistry;
  /// the page being rendered
  docname: string;
  /// module prefix → url template containing `{target}`
  externalDocs?: Readonly<Record<string, string>>;
}

/// pages are flat in the output directory, named after their docname.
export function pageFileName(docname: string): string {
  return `${docname}.html`;
}

export function externalUrl(target: string, externalDocs: Readonly<Record<string, string>>): string | undefined {
  const parts = target.split(".");
  for (let k = parts.length; k > 0; k--) {
    const prefix = parts.slice(0, k).join(".");
    if (Object.hasOwn(externalDocs, prefix)) {
      return externalDocs[prefix].replaceAll("{target}", target);
    }
  }
  return undefined;
}

export function createXrefResolver({ registry, docname, externalDocs = {} }: ResolverOptions): XrefResolver {
  return (node) => {
    const entry = registry.get(node.target);
    if (entry) {
      const anchor = sanitizeId(entry.anchor);
      const href = entry.docname === docname ? `#${anchor}` : `${pageFileName(entry.docname)}#${anchor}`;
      return { href, title: entry.fqn, external: false };
    }

    const url = externalUrl(node.target, externalDocs);
    if (url) {
      return { href: url, title: `(in external documentation) ${node.target}`, external: true };
    }

    return undefined;
  };
}
