/// # type expressions
///
/// a `TypeExpression` from the IR is a small tree: display text, maybe a
/// link for the head of the type, and its arguments as children. rendering
/// it means walking that tree and deciding, at every node, where the
/// brackets and separators go and which parts become links.
///
/// four cases, tried in order:
///
/// 1. **linked, with children**: a generic whose base is one of our own
///    types. the base (display up to the first `[`) links to the target,
///    then `[`, the children joined by `", "`, then `]`.
/// 2. **linked, no children**: the whole display links to the target.
/// 3. **children, no link**: a union if the display has `" | "` outside any
///    brackets (children joined by `" | "`, no brackets); otherwise an
///    external generic, where the base goes through the flat string parser.
/// 4. **neither**: the whole display goes through the flat string parser.

import type { LinkTarget, TypeExpression } from "./ir.js";
import type { RefType } from "./tree.js";
import { inline, literal, text, xref, type InlineNode } from "./tree.js";
import { typeStringNodes, type TypeStringCache } from "./type-string.js";

const refTypeByKind: Record<LinkTarget["kind"], RefType> = {
  Class: "class",
  Function: "func",
  TypeAlias: "data",
  Variable: "data",
  Module: "mod",
};

/// members of a class (enum variants, class attributes) link as `attr`
/// whatever the kind of their owner.
export function refTypeFor(target: LinkTarget): RefType {
  return target.attribute ? "attr" : refTypeByKind[target.kind];
}

export function linkTo(target: LinkTarget, label: string): InlineNode {
  return xref(refTypeFor(target), target.fqn, [literal(label)], true);
}

const unionSeparator = " | ";

/// does `display` contain `" | "` with no enclosing bracket? `list[int | str]`
/// is a generic, `list[int] | None` is a union.
export function isTopLevelUnion(display: string): boolean {
  let depth = 0;
  for (let i = 0; i < display.length; i++) {
    const ch = display[i];
    if (ch === "[" || ch === "(") depth++;
    else if (ch === "]" || ch === ")") depth = Math.max(0, depth - 1);
    else if (depth === 0 && display.startsWith(unionSeparator, i)) return true;
  }
  return false;
}

/// the name a generic is written under: everything before the first `[`,
/// or the whole display if there is none.
export function genericBase(display: string): string {
  const bracket = display.indexOf("[");
  return bracket === -1 ? display : display.slice(0, bracket);
}

function joinChildren(children: TypeExpression[], separator: string, cache: TypeStringCache | undefined): InlineNode[] {
  const nodes: InlineNode[] = [];
  children.forEach((child, index) => {
    if (index > 0) nodes.push(text(separator));
    nodes.push(renderTypeParts(child, cache));
  });
  return nodes;
}

function renderTypeParts(expr: TypeExpression, cache: TypeStringCache | undefined): InlineNode {
  const { display, link_target: target, children } = expr;

  if (target && children.length > 0) {
    return inline(
      ["type-generic"],
      [linkTo(target, genericBase(display)), text("["), ...joinChildren(children, ", ", cache), text("]")]
    );
  }

  if (target) {
    return linkTo(target, display);
  }

  if (children.length > 0) {
    if (isTopLevelUnion(display)) {
      return inline(["type-union"], joinChildren(children, unionSeparator, cache));
    }
    return inline(
      ["type-generic"],
      [...typeStringNodes(genericBase(display), cache), text("["), ...joinChildren(children, ", ", cache), text("]")]
    );
  }

  return inline(["type-leaf"], typeStringNodes(display, cache));
}

/// ## renderTypeExpression
///
/// the result is always a single `inline` node with class `type-expr`, so
/// a backend can style a whole type at once. rendering is a pure function
/// of the expression; passing a cache only saves re-scanning repeated
/// strings.

export function renderTypeExpression(expr: TypeExpression, cache?: TypeStringCache): InlineNode {
  return inline(["type-expr"], [renderTypeParts(expr, cache)]);
}
