/// # shared types
///
/// the html backend's options and the shape of a resolved link.

import type { XrefNode } from "../tree.js";

export interface HtmlOptions {
  /// page title; defaults to "API Reference"
  title?: string;
  /// link this stylesheet instead of inlining the default styles
  cssFile?: string;
}

export interface ResolvedLink {
  href: string;
  title?: string;
  /// the target lives in someone else's documentation
  external: boolean;
}

/// given a pending cross-reference, where should it point? `undefined`
/// means nowhere we know of.
export type XrefResolver = (node: XrefNode) => ResolvedLink | undefined;
