/// # configuration
///
/// everything the site generator can be told, with the defaults it uses
/// when told nothing. the file is plain JSON (`pyapi-ref.config.json`
/// in the docs directory, or wherever `--config` points), checked with zod.

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/// where links to external names go, by module prefix. `{target}` is
/// replaced with the fully-qualified name being linked. the longest
/// matching prefix wins, so `numpy.typing` beats `numpy`.
export const defaultExternalDocs: Readonly<Record<string, string>> = {
  typing: "https://docs.python.org/3/library/typing.html#{target}",
  typing_extensions: "https://typing-extensions.readthedocs.io/en/latest/index.html#{target}",
  collections: "https://docs.python.org/3/library/collections.html#{target}",
  "collections.abc": "https://docs.python.org/3/library/collections.abc.html#{target}",
  decimal: "https://docs.python.org/3/library/decimal.html#{target}",
  datetime: "https://docs.python.org/3/library/datetime.html#{target}",
  pathlib: "https://docs.python.org/3/library/pathlib.html#{target}",
  numpy: "https://numpy.org/doc/stable/reference/generated/{target}.html",
  "numpy.typing": "https://numpy.org/doc/stable/reference/typing.html#{target}",
};

export const DocGenConfigSchema = z.object({
  /// directory the html pages are written to
  outputDir: z.string().default("docs/api"),
  /// file name of the IR, looked up under `<srcdir>/api/` then `<srcdir>/`
  jsonOutput: z.string().default("api_reference.json"),
  /// one page per module; otherwise a single page for the whole package
  separatePages: z.boolean().default(true),
  /// paragraph under the index title. `""` leaves it out.
  introMessage: z.string().optional(),
  /// index page title. `""` means plain "API Reference".
  indexTitle: z.string().optional(),
  contentsTable: z.boolean().default(false),
  /// merged over `defaultExternalDocs`
  externalDocs: z.record(z.string()).default({}),
  /// link this stylesheet instead of inlining the default one
  cssFile: z.string().optional(),
});

export type DocGenConfig = z.infer<typeof DocGenConfigSchema>;

export const configFileName = "pyapi-ref.config.json";

export function defaultConfig(): DocGenConfig {
  return DocGenConfigSchema.parse({});
}

export function parseConfig(raw: unknown, source: string): DocGenConfig {
  const result = DocGenConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(source, `${where}${issue?.message ?? "schema mismatch"}`, result.error);
  }
  return result.data;
}

export function readConfigFile(path: string): DocGenConfig {
  if (!existsSync(path)) {
    throw new ConfigError(path, "file does not exist");
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(path, "not valid JSON", err);
  }
  return parseConfig(raw, path);
}

/// an explicit path must exist. without one, we look for the config file
/// in `searchDir` and fall back to the defaults if there's nothing there.
export function loadConfig(searchDir: string, explicitPath?: string): DocGenConfig {
  if (explicitPath) return readConfigFile(explicitPath);
  const candidate = join(searchDir, configFileName);
  return existsSync(candidate) ? readConfigFile(candidate) : defaultConfig();
}

/// the index page's title, as configured or derived from the package name.
export function indexTitle(config: DocGenConfig, packageName: string): string {
  if (config.indexTitle === undefined) {
    return packageName ? `${packageName} API Reference` : "API Reference";
  }
  return config.indexTitle === "" ? "API Reference" : config.indexTitle;
}

export const defaultIntroMessage = "This is the API reference documentation generated from the extension's type information.";

export function introMessage(config: DocGenConfig): string | undefined {
  if (config.introMessage === undefined) return defaultIntroMessage;
  return config.introMessage === "" ? undefined : config.introMessage;
}
