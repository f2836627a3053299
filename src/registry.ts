/// # cross-reference registry
///
/// every documented symbol is registered under its fully-qualified name
/// together with the page and anchor it was rendered to. the html backend
/// resolves pending cross-references against this table, which is what
/// lets the page for `pkg.a` link into the page for `pkg.b`.
///
/// fqns are unique across a package, so the registry never has to pick a
/// winner: it only inserts. the first registration of an fqn stands, and a
/// second one is reported back to the caller instead of overwriting it.
/// pages can be rendered each into their own registry and merged after.

import type { ObjType } from "./tree.js";
import { TypeStringCache } from "./type-string.js";

export interface RegistryEntry {
  fqn: string;
  objtype: ObjType;
  /// the page the symbol lives on, without extension (`pkg.sub`)
  docname: string;
  anchor: string;
}

export class CrossReferenceRegistry {
  private entries = new Map<string, RegistryEntry>();

  /// returns false, and changes nothing, if the fqn is already registered.
  register(entry: RegistryEntry): boolean {
    if (this.entries.has(entry.fqn)) return false;
    this.entries.set(entry.fqn, entry);
    return true;
  }

  get(fqn: string): RegistryEntry | undefined {
    return this.entries.get(fqn);
  }

  has(fqn: string): boolean {
    return this.entries.has(fqn);
  }

  get size(): number {
    return this.entries.size;
  }

  all(): IterableIterator<RegistryEntry> {
    return this.entries.values();
  }

  /// copy every entry of `other` in. returns the fqns that were already
  /// present here and were left alone.
  merge(other: CrossReferenceRegistry): string[] {
    const duplicates: string[] = [];
    for (const entry of other.all()) {
      if (!this.register(entry)) duplicates.push(entry.fqn);
    }
    return duplicates;
  }
}

/// ## RenderContext
///
/// what one render call needs besides the IR: which page it is producing,
/// where to register symbols, and the shared type string cache. anything
/// that went wrong without being fatal is noted in `warnings`.

export interface RenderContext {
  docname: string;
  registry: CrossReferenceRegistry;
  cache: TypeStringCache;
  warnings: string[];
}

export function createRenderContext(
  docname: string,
  registry: CrossReferenceRegistry = new CrossReferenceRegistry(),
  cache: TypeStringCache = new TypeStringCache()
): RenderContext {
  return { docname, registry, cache, warnings: [] };
}
