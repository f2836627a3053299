/// # the IR
///
/// the stub generator serializes everything it knows about an extension
/// module's public surface into one JSON document: a package holding a
/// map from fully-qualified module name to module, each module holding an
/// ordered list of items tagged by `kind`.
///
/// we don't trust that document blindly. every shape below is a zod schema,
/// and the types the rest of the code works with are inferred from them,
/// so "the field was missing" is handled once, here, with a default.

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { IrFormatError, IrNotFoundError } from "./errors.js";

export const ItemKindSchema = z.enum(["Class", "Function", "TypeAlias", "Variable", "Module"]);
export type ItemKind = z.infer<typeof ItemKindSchema>;

/// `attribute` is set when the link points at a member of a class (an enum
/// variant like `C.C1`, say) rather than at the class itself.
export const LinkTargetSchema = z.object({
  kind: ItemKindSchema,
  fqn: z.string(),
  attribute: z.boolean().default(false),
  doc_module: z.string().optional(),
});
export type LinkTarget = z.infer<typeof LinkTargetSchema>;

/// ## type expressions
///
/// a type as the producer saw it: the display text it would print, an
/// optional link for the head of the type, and the type arguments (or
/// union members) as children. the schema is recursive, so the input and
/// output types are spelled out by hand.

export interface TypeExpression {
  display: string;
  link_target?: LinkTarget | null;
  children: TypeExpression[];
}

interface TypeExpressionInput {
  display: string;
  link_target?: z.input<typeof LinkTargetSchema> | null;
  children?: TypeExpressionInput[];
}

export const TypeExpressionSchema: z.ZodType<TypeExpression, z.ZodTypeDef, TypeExpressionInput> = z.lazy(() =>
  z.object({
    display: z.string(),
    link_target: LinkTargetSchema.nullish(),
    children: z.array(TypeExpressionSchema).default([]),
  })
);

/// ## default values
///
/// `offset` counts UTF-16 code units into `display`, which is what string
/// indexing gives us on this side.

export const TypeRefSchema = z.object({
  offset: z.number().int(),
  text: z.string(),
  link_target: LinkTargetSchema.nullish(),
});
export type TypeRef = z.infer<typeof TypeRefSchema>;

const SimpleDefaultSchema = z.object({
  kind: z.literal("Simple"),
  value: z.string(),
});

const ExpressionDefaultSchema = z.object({
  kind: z.literal("Expression"),
  display: z.string(),
  type_refs: z.array(TypeRefSchema).default([]),
});

/// producers have written defaults three ways over time: a bare string,
/// an externally tagged object (`{"Simple": {"value": "1"}}`), and an
/// internally tagged one (`{"kind": "Simple", "value": "1"}`). the first
/// two are rewritten into the third before validation.
function normalizeDefault(raw: unknown): unknown {
  if (typeof raw === "string") {
    return { kind: "Simple", value: raw };
  }
  if (typeof raw === "object" && raw !== null && !("kind" in raw)) {
    for (const tag of ["Simple", "Expression"] as const) {
      if (tag in raw) {
        const inner: unknown = Object.getOwnPropertyDescriptor(raw, tag)?.value;
        if (typeof inner === "object" && inner !== null) {
          return { kind: tag, ...inner };
        }
      }
    }
  }
  return raw;
}

export const DefaultValueSchema = z.preprocess(
  normalizeDefault,
  z.discriminatedUnion("kind", [SimpleDefaultSchema, ExpressionDefaultSchema])
);
export type DefaultValue = z.infer<typeof DefaultValueSchema>;

/// ## items

/// an empty docstring and a missing one mean the same thing downstream.
const DocText = z
  .string()
  .nullish()
  .transform((doc) => doc ?? "");

export const DeprecatedSchema = z.object({
  since: z.string().nullish(),
  note: z.string().nullish(),
});
export type Deprecated = z.infer<typeof DeprecatedSchema>;

export const ParameterSchema = z.object({
  name: z.string(),
  type_: TypeExpressionSchema,
  default: DefaultValueSchema.nullish(),
});
export type Parameter = z.infer<typeof ParameterSchema>;

export const SignatureSchema = z.object({
  parameters: z.array(ParameterSchema).default([]),
  return_type: TypeExpressionSchema.nullish(),
});
export type Signature = z.infer<typeof SignatureSchema>;

const functionShape = {
  name: z.string(),
  doc: DocText,
  signatures: z.array(SignatureSchema).default([]),
  is_async: z.boolean().default(false),
  deprecated: DeprecatedSchema.nullish(),
};

/// methods are functions without the `kind` tag.
export const MethodSchema = z.object(functionShape);
export type FunctionLike = z.infer<typeof MethodSchema>;

export const AttributeSchema = z.object({
  name: z.string(),
  doc: DocText,
  type_: TypeExpressionSchema.nullish(),
});
export type Attribute = z.infer<typeof AttributeSchema>;

export const FunctionItemSchema = z.object({ kind: z.literal("Function"), ...functionShape });

export const ClassItemSchema = z.object({
  kind: z.literal("Class"),
  name: z.string(),
  doc: DocText,
  bases: z.array(TypeExpressionSchema).default([]),
  methods: z.array(MethodSchema).default([]),
  attributes: z.array(AttributeSchema).default([]),
  deprecated: DeprecatedSchema.nullish(),
});

export const TypeAliasItemSchema = z.object({
  kind: z.literal("TypeAlias"),
  name: z.string(),
  doc: DocText,
  definition: TypeExpressionSchema,
});

export const VariableItemSchema = z.object({
  kind: z.literal("Variable"),
  name: z.string(),
  doc: DocText,
  type_: TypeExpressionSchema.nullish(),
});

export const ModuleItemSchema = z.object({
  kind: z.literal("Module"),
  name: z.string(),
  fqn: z.string(),
  doc: DocText,
});

export const DocItemSchema = z.discriminatedUnion("kind", [
  FunctionItemSchema,
  ClassItemSchema,
  TypeAliasItemSchema,
  VariableItemSchema,
  ModuleItemSchema,
]);
export type DocItem = z.infer<typeof DocItemSchema>;
export type DocFunction = z.infer<typeof FunctionItemSchema>;
export type DocClass = z.infer<typeof ClassItemSchema>;
export type DocTypeAlias = z.infer<typeof TypeAliasItemSchema>;
export type DocVariable = z.infer<typeof VariableItemSchema>;
export type DocSubmodule = z.infer<typeof ModuleItemSchema>;

const knownKinds: ReadonlySet<string> = new Set(ItemKindSchema.options);

/// items whose `kind` we don't recognize are dropped before validation,
/// so a newer producer can add kinds without breaking older renderers.
function isKnownItem(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "kind" in raw && typeof raw.kind === "string" && knownKinds.has(raw.kind);
}

export const DocModuleSchema = z.object({
  name: z.string().optional(),
  doc: DocText,
  items: z.preprocess(
    (raw) => (Array.isArray(raw) ? raw.filter(isKnownItem) : raw),
    z.array(DocItemSchema)
  ),
});
export type DocModule = z.infer<typeof DocModuleSchema>;

export const DocPackageSchema = z.object({
  name: z.string().default(""),
  modules: z.record(DocModuleSchema),
});
export type DocPackage = z.infer<typeof DocPackageSchema>;

/// ## loading

export const defaultIrFileName = "api_reference.json";

/// the IR normally sits in an `api/` folder under the docs source, but a
/// flat layout with the file right in the source directory works too. the
/// first path that exists wins.
export function irSearchPaths(srcdir: string, fileName: string = defaultIrFileName): string[] {
  return [join(srcdir, "api", fileName), join(srcdir, fileName)];
}

export function locateIrFile(srcdir: string, fileName: string = defaultIrFileName): string {
  const candidates = irSearchPaths(srcdir, fileName);
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new IrNotFoundError(candidates);
  }
  return found;
}

export function parseDocPackage(raw: unknown, source: string): DocPackage {
  const result = DocPackageSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new IrFormatError(source, `${where}${issue?.message ?? "schema mismatch"}`, result.error);
  }
  return result.data;
}

export function loadDocPackage(path: string): DocPackage {
  const text = readFileSync(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new IrFormatError(path, "not valid JSON", err);
  }
  return parseDocPackage(raw, path);
}
