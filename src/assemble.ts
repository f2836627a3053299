/// # assembling module documentation
///
/// this is where a whole IR module turns into documentation. items are
/// grouped by kind, keeping their order within each group, and each group
/// becomes a titled section: submodules, functions, classes, type aliases,
/// variables, always in that order and only when the group has members.
///
/// every object we describe is also registered in the render context's
/// registry under its fully-qualified name, so other pages can link to it.

import type {
  Deprecated,
  DocClass,
  DocFunction,
  DocItem,
  DocModule,
  DocPackage,
  DocSubmodule,
  DocTypeAlias,
  DocVariable,
  FunctionLike,
  Parameter,
  Signature,
} from "./ir.js";
import type { RenderContext } from "./registry.js";
import { defaultValueNodes } from "./default-value.js";
import { renderTypeExpression } from "./type-expr.js";
import {
  inline,
  literal,
  paragraph,
  section,
  text,
  xref,
  type AdmonitionNode,
  type BlockNode,
  type DescNode,
  type InlineNode,
  type ListItemNode,
  type ReferenceNode,
  type ObjType,
  type ParameterNode,
  type ProseNode,
  type RefType,
  type SignatureNode,
  type TableNode,
  type TableRowNode,
} from "./tree.js";

export interface AssembleOptions {
  /// put a two-column table of the module's members (name, summary line)
  /// right after the module docstring.
  contentsTable?: boolean;
  /// where a link to a module's own documentation points. defaults to
  /// `<fqn>.html`, the page the site generator writes for it.
  moduleUri?: (fqn: string) => string;
}

/// ## docstrings
///
/// docstrings arrive with the indentation they had in the source. indented
/// markdown is a code block, so the common leading whitespace goes first.

export function dedent(source: string): string {
  const lines = source.split("\n");
  let indent = Infinity;
  for (const line of lines) {
    if (line.trim() === "") continue;
    indent = Math.min(indent, line.length - line.trimStart().length);
  }
  if (indent === Infinity || indent === 0) return source;
  return lines.map((line) => (line.trim() === "" ? "" : line.slice(indent))).join("\n");
}

export function proseNode(doc: string): ProseNode {
  return { type: "prose", markdown: dedent(doc).trim() };
}

function summaryLine(doc: string): string {
  return (
    dedent(doc)
      .split("\n")
      .map((line) => line.trim())
      .find((line) => line !== "") ?? ""
  );
}

/// ## grouping

interface ItemGroups {
  modules: DocSubmodule[];
  functions: DocFunction[];
  classes: DocClass[];
  typeAliases: DocTypeAlias[];
  variables: DocVariable[];
}

export function groupItems(items: readonly DocItem[]): ItemGroups {
  const groups: ItemGroups = { modules: [], functions: [], classes: [], typeAliases: [], variables: [] };
  for (const item of items) {
    switch (item.kind) {
      case "Module":
        groups.modules.push(item);
        break;
      case "Function":
        groups.functions.push(item);
        break;
      case "Class":
        groups.classes.push(item);
        break;
      case "TypeAlias":
        groups.typeAliases.push(item);
        break;
      case "Variable":
        groups.variables.push(item);
        break;
      default:
        item satisfies never;
    }
  }
  return groups;
}

function registerSymbol(ctx: RenderContext, fqn: string, objtype: ObjType, anchor: string = fqn): void {
  const added = ctx.registry.register({ fqn, objtype, docname: ctx.docname, anchor });
  if (!added) {
    ctx.warnings.push(`duplicate object description of ${fqn}`);
  }
}

/// ## signatures

function signatureNode(moduleName: string, fullname: string, first: boolean, children: InlineNode[]): SignatureNode {
  return { type: "signature", id: fullname, module: moduleName, fullname, first, children };
}

function keywordAnnotation(keyword: string): InlineNode {
  return { type: "annotation", children: [inline(["k"], [text(keyword)]), inline(["w"], [text(" ")])] };
}

function parameterNode(param: Parameter, ctx: RenderContext): ParameterNode {
  const children: InlineNode[] = [text(param.name), text(": "), renderTypeExpression(param.type_, ctx.cache)];
  if (param.default) {
    children.push(text(" = "), ...defaultValueNodes(param.default));
  }
  return { type: "parameter", children };
}

/// a function with no recorded signature still gets one line, `name()`,
/// so it has somewhere to anchor.
const bareSignature: Signature = { parameters: [], return_type: null };

function callableSignatures(func: FunctionLike, moduleName: string, fullname: string, ctx: RenderContext): SignatureNode[] {
  const signatures = func.signatures.length > 0 ? func.signatures : [bareSignature];
  return signatures.map((sig, index) => {
    const children: InlineNode[] = [];
    if (func.is_async) children.push(keywordAnnotation("async"));
    children.push({ type: "name", text: func.name });
    children.push({ type: "parameterList", parameters: sig.parameters.map((param) => parameterNode(param, ctx)) });
    if (sig.return_type) {
      children.push({ type: "returns", children: [renderTypeExpression(sig.return_type, ctx.cache)] });
    }
    return signatureNode(moduleName, fullname, index === 0, children);
  });
}

function deprecationNotice(deprecated: Deprecated): AdmonitionNode {
  const since = deprecated.since ? ` since ${deprecated.since}` : "";
  const note = deprecated.note ? `: ${deprecated.note}` : "";
  return { type: "admonition", kind: "deprecated", children: [text(`Deprecated${since}${note}`)] };
}

function bodyOf(doc: string, deprecated?: Deprecated | null): BlockNode[] {
  const content: BlockNode[] = [];
  if (deprecated) content.push(deprecationNotice(deprecated));
  if (doc) content.push(proseNode(doc));
  return content;
}

/// ## one builder per item kind

function buildCallable(func: FunctionLike, objtype: "function" | "method", moduleName: string, fullname: string, ctx: RenderContext): DescNode {
  registerSymbol(ctx, fullname, objtype);
  return {
    type: "desc",
    objtype,
    signatures: callableSignatures(func, moduleName, fullname, ctx),
    content: bodyOf(func.doc, func.deprecated),
  };
}

export function buildFunction(func: DocFunction, moduleName: string, ctx: RenderContext): DescNode {
  return buildCallable(func, "function", moduleName, `${moduleName}.${func.name}`, ctx);
}

/// a class's methods and attributes are nested descriptions in its body,
/// each registered under `Class.member`.
export function buildClass(cls: DocClass, moduleName: string, ctx: RenderContext): DescNode {
  const fullname = `${moduleName}.${cls.name}`;
  registerSymbol(ctx, fullname, "class");

  const children: InlineNode[] = [keywordAnnotation("class"), { type: "name", text: cls.name }];
  if (cls.bases.length > 0) {
    children.push(text("("));
    cls.bases.forEach((base, index) => {
      if (index > 0) children.push(text(", "));
      children.push(renderTypeExpression(base, ctx.cache));
    });
    children.push(text(")"));
  }

  const content = bodyOf(cls.doc, cls.deprecated);

  for (const method of cls.methods) {
    content.push(buildCallable(method, "method", moduleName, `${fullname}.${method.name}`, ctx));
  }

  for (const attr of cls.attributes) {
    const attrFullname = `${fullname}.${attr.name}`;
    registerSymbol(ctx, attrFullname, "attribute");
    const attrChildren: InlineNode[] = [{ type: "name", text: attr.name }];
    if (attr.type_) {
      attrChildren.push(text(": "), renderTypeExpression(attr.type_, ctx.cache));
    }
    content.push({
      type: "desc",
      objtype: "attribute",
      signatures: [signatureNode(moduleName, attrFullname, true, attrChildren)],
      content: bodyOf(attr.doc),
    });
  }

  return {
    type: "desc",
    objtype: "class",
    signatures: [signatureNode(moduleName, fullname, true, children)],
    content,
  };
}

export function buildTypeAlias(alias: DocTypeAlias, moduleName: string, ctx: RenderContext): DescNode {
  const fullname = `${moduleName}.${alias.name}`;
  registerSymbol(ctx, fullname, "data");
  const children: InlineNode[] = [
    { type: "annotation", children: [text("type ")] },
    { type: "name", text: alias.name },
    text(" = "),
    renderTypeExpression(alias.definition, ctx.cache),
  ];
  return {
    type: "desc",
    objtype: "data",
    signatures: [signatureNode(moduleName, fullname, true, children)],
    content: bodyOf(alias.doc),
  };
}

export function buildVariable(variable: DocVariable, moduleName: string, ctx: RenderContext): DescNode {
  const fullname = `${moduleName}.${variable.name}`;
  registerSymbol(ctx, fullname, "data");
  const children: InlineNode[] = [{ type: "name", text: variable.name }];
  if (variable.type_) {
    children.push(text(": "), renderTypeExpression(variable.type_, ctx.cache));
  }
  return {
    type: "desc",
    objtype: "data",
    signatures: [signatureNode(moduleName, fullname, true, children)],
    content: bodyOf(variable.doc),
  };
}

export const moduleFileUri = (fqn: string): string => `${fqn}.html`;

/// a direct link, not a pending cross-reference: it resolves whether or
/// not the module's page has been rendered into the same registry.
function moduleLink(fqn: string, label: string, options: AssembleOptions, classes?: string[]): ReferenceNode {
  const uri = (options.moduleUri ?? moduleFileUri)(fqn);
  return { type: "reference", uri, title: `Link to ${fqn} module`, children: [literal(label, classes)] };
}

/// submodules aren't described here, only listed with a link to their own
/// documentation.
export function buildSubmodule(submodule: DocSubmodule, options: AssembleOptions = {}): ListItemNode {
  const link = moduleLink(submodule.fqn, submodule.name, options, ["xref", "py", "py-mod"]);
  const children: BlockNode[] = [paragraph([{ type: "strong", text: "module " }, link])];
  if (submodule.doc) children.push(proseNode(submodule.doc));
  return { type: "listItem", children };
}

/// ## contents table

function contentsRow(reftype: RefType, fqn: string, name: string, doc: string): TableRowNode {
  return { cells: [[xref(reftype, fqn, [literal(name)], true)], [text(summaryLine(doc))]] };
}

function moduleRow(submodule: DocSubmodule, options: AssembleOptions): TableRowNode {
  return { cells: [[moduleLink(submodule.fqn, submodule.name, options)], [text(summaryLine(submodule.doc))]] };
}

function contentsTable(groups: ItemGroups, moduleName: string, options: AssembleOptions): TableNode | undefined {
  const rows: TableRowNode[] = [
    ...groups.modules.map((m) => moduleRow(m, options)),
    ...groups.functions.map((f) => contentsRow("func", `${moduleName}.${f.name}`, f.name, f.doc)),
    ...groups.classes.map((c) => contentsRow("class", `${moduleName}.${c.name}`, c.name, c.doc)),
    ...groups.typeAliases.map((a) => contentsRow("data", `${moduleName}.${a.name}`, a.name, a.doc)),
    ...groups.variables.map((v) => contentsRow("data", `${moduleName}.${v.name}`, v.name, v.doc)),
  ];
  if (rows.length === 0) return undefined;
  return { type: "table", classes: ["contents-table"], header: ["Name", "Description"], rows };
}

/// ## renderModule

export function renderModuleBody(module: DocModule, moduleName: string, ctx: RenderContext, options: AssembleOptions = {}): BlockNode[] {
  const result: BlockNode[] = [];
  if (module.doc) result.push(proseNode(module.doc));

  const groups = groupItems(module.items);

  if (options.contentsTable) {
    const table = contentsTable(groups, moduleName, options);
    if (table) result.push(table);
  }

  if (groups.modules.length > 0) {
    result.push(
      section(`${moduleName}-submodules`, "Submodules", [{ type: "bulletList", classes: ["submodules"], items: groups.modules.map((m) => buildSubmodule(m, options)) }])
    );
  }
  if (groups.functions.length > 0) {
    result.push(section(`${moduleName}-functions`, "Functions", groups.functions.map((f) => buildFunction(f, moduleName, ctx))));
  }
  if (groups.classes.length > 0) {
    result.push(section(`${moduleName}-classes`, "Classes", groups.classes.map((c) => buildClass(c, moduleName, ctx))));
  }
  if (groups.typeAliases.length > 0) {
    result.push(
      section(`${moduleName}-type-aliases`, "Type Aliases", groups.typeAliases.map((a) => buildTypeAlias(a, moduleName, ctx)))
    );
  }
  if (groups.variables.length > 0) {
    result.push(section(`${moduleName}-variables`, "Variables", groups.variables.map((v) => buildVariable(v, moduleName, ctx))));
  }

  return result;
}

/// a module that isn't in the package is a problem with this one page,
/// not with the build: it turns into an error node.
export function renderModule(pkg: DocPackage, moduleName: string, ctx: RenderContext, options: AssembleOptions = {}): BlockNode[] {
  if (!Object.hasOwn(pkg.modules, moduleName)) {
    return [{ type: "error", message: `Module not found: ${moduleName}` }];
  }
  return renderModuleBody(pkg.modules[moduleName], moduleName, ctx, options);
}

/// a module is registered only by the callers that build its
/// `module-<name>` section, so a link to it always has an anchor to land on.
export function registerModule(ctx: RenderContext, moduleName: string): void {
  registerSymbol(ctx, moduleName, "module", `module-${moduleName}`);
}

/// one module as a page of its own: the module's section, titled with its
/// name, around `renderModule`.
export function renderModulePage(pkg: DocPackage, moduleName: string, ctx: RenderContext, options: AssembleOptions = {}): BlockNode[] {
  if (Object.hasOwn(pkg.modules, moduleName)) registerModule(ctx, moduleName);
  return [section(`module-${moduleName}`, moduleName, renderModule(pkg, moduleName, ctx, options))];
}

/// ## renderPackage
///
/// every module equal to `packageName` or nested under it, sorted by name,
/// each in its own section.

export function modulesUnder(pkg: DocPackage, packageName: string): string[] {
  return Object.keys(pkg.modules)
    .sort()
    .filter((name) => name === packageName || name.startsWith(`${packageName}.`));
}

export function renderPackage(pkg: DocPackage, packageName: string, ctx: RenderContext, options: AssembleOptions = {}): BlockNode[] {
  return modulesUnder(pkg, packageName).map((name) => {
    const title = name === packageName ? `${name} Package` : `${name} Module`;
    registerModule(ctx, name);
    return section(`module-${name}`, title, renderModuleBody(pkg.modules[name], name, ctx, options));
  });
}
