/// # flat type strings
///
/// sometimes all the IR gives us for a type is its display string:
/// `Optional[numpy.ndarray]`, `Callable[[int], None]`. no children, no link.
/// this module scans such a string once, left to right, and splits it into
/// fragments: punctuation and whitespace pass through as text, identifiers
/// are looked up with `classify` and become links where we know where they
/// point.
///
/// there's no type grammar here. `[` is just a character.

import { classify } from "./classify.js";
import { literal, text, xref, type InlineNode } from "./tree.js";

export type TypeFragment =
  | { kind: "text"; text: string }
  | {
      kind: "link";
      text: string;
      reftype: "data" | "class";
      target: string;
      /// the identifier was written with its module (`numpy.ndarray`)
      qualified: boolean;
    };

const separators = new Set(["[", "]", "(", ")", ",", "|"]);

function isWhitespace(ch: string): boolean {
  return ch.trim() === "";
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || (ch >= "0" && ch <= "9") || ch === ".";
}

/// ## parseTypeString
///
/// identifiers are `[A-Za-z_][A-Za-z0-9_.]*`, which takes dotted names in
/// one piece. any other character that isn't whitespace or a separator
/// (a quote in `Literal["a"]`, a digit, `-`) is passed through one at a
/// time, so no input is ever dropped: joining the fragments' text gives
/// back the input.

export function parseTypeString(source: string): TypeFragment[] {
  const fragments: TypeFragment[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (isWhitespace(ch) || separators.has(ch)) {
      fragments.push({ kind: "text", text: ch });
      i++;
      continue;
    }

    if (!isIdentStart(ch)) {
      fragments.push({ kind: "text", text: ch });
      i++;
      continue;
    }

    let end = i + 1;
    while (end < source.length && isIdentPart(source[end])) end++;
    const name = source.slice(i, end);
    i = end;

    const classification = classify(name);
    if (classification.kind === "plain") {
      fragments.push({ kind: "text", text: name });
    } else {
      fragments.push({
        kind: "link",
        text: name,
        reftype: classification.kind,
        target: classification.target,
        qualified: name.includes("."),
      });
    }
  }

  return fragments;
}

/// ## caching
///
/// the same handful of type strings (`int`, `Optional[str]`, `list[float]`)
/// turn up in hundreds of signatures across a package. the cache is keyed
/// by the input string and hands back frozen arrays, so a cached result can
/// be shared between callers and is indistinguishable from a fresh parse.

export class TypeStringCache {
  private entries = new Map<string, readonly TypeFragment[]>();

  parse(source: string): readonly TypeFragment[] {
    const hit = this.entries.get(source);
    if (hit) return hit;
    const fragments = Object.freeze(parseTypeString(source).map((fragment) => Object.freeze(fragment)));
    this.entries.set(source, fragments);
    return fragments;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/// ## fragments to tree nodes
///
/// a qualified name is shown as a literal inside the link, the way it was
/// written; a bare name like `Optional` keeps its text styling.

export function fragmentNodes(fragments: readonly TypeFragment[]): InlineNode[] {
  return fragments.map((fragment): InlineNode => {
    if (fragment.kind === "text") {
      return text(fragment.text);
    }
    const label = fragment.qualified ? literal(fragment.text) : text(fragment.text);
    return xref(fragment.reftype, fragment.target, [label]);
  });
}

export function typeStringNodes(source: string, cache?: TypeStringCache): InlineNode[] {
  return fragmentNodes(cache ? cache.parse(source) : parseTypeString(source));
}
