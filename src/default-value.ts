/// # default values
///
/// a parameter's default is usually just text: `1`, `"abc"`, `None`. but
/// sometimes it names one of our own symbols, like `C.C1` (an enum variant)
/// in `C.C1(5)`. for those the producer sends the display text plus a list
/// of references, each with an offset into the text, and we rebuild the
/// text with the references turned into links.
///
/// the walk goes from the last reference backwards, prepending to the
/// output as it goes. every piece of text between references comes out
/// exactly as it was in `display`, so joining the fragments gives back the
/// display string.

import type { DefaultValue, LinkTarget, TypeRef } from "./ir.js";
import { literal, type InlineNode } from "./tree.js";
import { linkTo } from "./type-expr.js";

export type DefaultFragment = { kind: "text"; text: string } | { kind: "link"; text: string; target: LinkTarget };

interface Span {
  start: number;
  end: number;
  ref: TypeRef;
}

/// a producer bug can hand us references that start outside the display
/// string, run off its end, or overlap each other. we don't throw: a
/// reference starting out of range is dropped, one running past the end is
/// cut at the end, and of two overlapping references the later one (by
/// offset) is kept.
function usableSpans(display: string, refs: readonly TypeRef[]): Span[] {
  const spans: Span[] = [];
  const sorted = [...refs].sort((a, b) => b.offset - a.offset);
  let boundary = display.length;

  for (const ref of sorted) {
    if (ref.offset < 0 || ref.offset >= display.length || ref.text.length === 0) continue;
    const start = ref.offset;
    const end = Math.min(start + ref.text.length, display.length);
    if (end > boundary) continue;
    spans.push({ start, end, ref });
    boundary = start;
  }

  return spans;
}

/// ## reconstructDefault
///
/// a reference's text is read back from `display` at its span rather than
/// taken from `ref.text`, which for a well-formed IR is the same string.

export function reconstructDefault(value: DefaultValue): DefaultFragment[] {
  if (value.kind === "Simple") {
    return [{ kind: "text", text: value.value }];
  }

  const { display } = value;
  const fragments: DefaultFragment[] = [];
  let consumed = display.length;

  for (const { start, end, ref } of usableSpans(display, value.type_refs)) {
    if (end < consumed) {
      fragments.unshift({ kind: "text", text: display.slice(end, consumed) });
    }
    const spanText = display.slice(start, end);
    fragments.unshift(
      ref.link_target ? { kind: "link", text: spanText, target: ref.link_target } : { kind: "text", text: spanText }
    );
    consumed = start;
  }

  if (consumed > 0) {
    fragments.unshift({ kind: "text", text: display.slice(0, consumed) });
  }

  return fragments;
}

/// the display string of a default, whichever shape it came in.
export function defaultDisplay(value: DefaultValue): string {
  return value.kind === "Simple" ? value.value : value.display;
}

export function defaultValueNodes(value: DefaultValue): InlineNode[] {
  return reconstructDefault(value).map((fragment) =>
    fragment.kind === "link" ? linkTo(fragment.target, fragment.text) : literal(fragment.text, ["default-value"])
  );
}
