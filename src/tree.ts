/// # the documentation tree
///
/// the assembler doesn't write html. it builds a tree of plain objects that
/// any backend can walk: sections with titles and anchors, object
/// descriptions with signature lines, inline runs of text, literals and
/// links, and the odd two-column table. `src/html/` is one such backend.
///
/// the vocabulary borrows from what documentation tools usually call their
/// "description" nodes: a `desc` is one documented object, holding one or
/// more `signature` lines and a body.

/// what kind of object a cross-reference expects to land on. `data` covers
/// variables, constants and type aliases; `attr` is a member of a class.
export type RefType = "class" | "func" | "data" | "attr" | "mod";

export type ObjType = "module" | "function" | "method" | "class" | "attribute" | "data";

export interface TextNode {
  type: "text";
  text: string;
}

/// monospace text: type names, values.
export interface LiteralNode {
  type: "literal";
  text: string;
  classes?: string[];
}

export interface StrongNode {
  type: "strong";
  text: string;
}

/// a plain inline container, mostly there to carry css classes.
export interface InlineGroup {
  type: "inline";
  classes: string[];
  children: InlineNode[];
}

/// a cross-reference that hasn't been resolved to a url yet. the backend
/// looks `target` up in the registry (our own symbols) or in its map of
/// external documentation. `explicit` means the children were chosen by the
/// producer and must be shown as-is rather than re-derived from the target.
export interface XrefNode {
  type: "xref";
  reftype: RefType;
  target: string;
  explicit: boolean;
  children: InlineNode[];
}

/// a link whose url is already known.
export interface ReferenceNode {
  type: "reference";
  uri: string;
  title?: string;
  children: InlineNode[];
}

/// ### signature parts

export interface AnnotationNode {
  type: "annotation";
  children: InlineNode[];
}

export interface NameNode {
  type: "name";
  text: string;
}

export interface ParameterNode {
  type: "parameter";
  children: InlineNode[];
}

export interface ParameterListNode {
  type: "parameterList";
  parameters: ParameterNode[];
}

export interface ReturnsNode {
  type: "returns";
  children: InlineNode[];
}

export type InlineNode =
  | TextNode
  | LiteralNode
  | StrongNode
  | InlineGroup
  | XrefNode
  | ReferenceNode
  | AnnotationNode
  | NameNode
  | ParameterListNode
  | ReturnsNode;

/// ### blocks

export interface SectionNode {
  type: "section";
  id: string;
  title?: string;
  children: BlockNode[];
}

export interface ParagraphNode {
  type: "paragraph";
  children: InlineNode[];
}

/// free-form documentation in markdown, handed to the backend's prose
/// renderer untouched.
export interface ProseNode {
  type: "prose";
  markdown: string;
}

/// a recoverable problem, shown in place of whatever couldn't be rendered.
export interface ErrorNode {
  type: "error";
  message: string;
}

export interface AdmonitionNode {
  type: "admonition";
  kind: "deprecated";
  children: InlineNode[];
}

export interface ListItemNode {
  type: "listItem";
  children: BlockNode[];
}

export interface BulletListNode {
  type: "bulletList";
  classes: string[];
  items: ListItemNode[];
}

export interface TableRowNode {
  cells: [InlineNode[], InlineNode[]];
}

export interface TableNode {
  type: "table";
  classes: string[];
  header?: [string, string];
  rows: TableRowNode[];
}

/// one signature line of a documented object. overloaded functions get
/// several; only the first carries the anchor.
export interface SignatureNode {
  type: "signature";
  id: string;
  module: string;
  fullname: string;
  first: boolean;
  children: InlineNode[];
}

export interface DescNode {
  type: "desc";
  objtype: ObjType;
  signatures: SignatureNode[];
  content: BlockNode[];
}

export type BlockNode =
  | SectionNode
  | ParagraphNode
  | ProseNode
  | ErrorNode
  | AdmonitionNode
  | BulletListNode
  | TableNode
  | DescNode;

/// ## builders
///
/// small constructors so the assembler reads like the tree it builds.

export const text = (value: string): TextNode => ({ type: "text", text: value });

export const literal = (value: string, classes?: string[]): LiteralNode =>
  classes ? { type: "literal", text: value, classes } : { type: "literal", text: value };

export const inline = (classes: string[], children: InlineNode[]): InlineGroup => ({ type: "inline", classes, children });

export const xref = (reftype: RefType, target: string, children: InlineNode[], explicit = false): XrefNode => ({
  type: "xref",
  reftype,
  target,
  explicit,
  children,
});

export const paragraph = (children: InlineNode[]): ParagraphNode => ({ type: "paragraph", children });

export const section = (id: string, title: string | undefined, children: BlockNode[]): SectionNode =>
  title === undefined ? { type: "section", id, children } : { type: "section", id, title, children };

/// ## textOf
///
/// the visible text of a run of inline nodes, links flattened. handy for
/// tests and for plain-text fallbacks like page titles.

export function textOf(nodes: readonly InlineNode[]): string {
  let out = "";
  for (const node of nodes) {
    switch (node.type) {
      case "text":
      case "literal":
      case "strong":
      case "name":
        out += node.text;
        break;
      case "inline":
      case "xref":
      case "reference":
      case "annotation":
        out += textOf(node.children);
        break;
      case "returns":
        out += ` -> ${textOf(node.children)}`;
        break;
      case "parameterList":
        out += `(${node.parameters.map((p) => textOf(p.children)).join(", ")})`;
        break;
    }
  }
  return out;
}
