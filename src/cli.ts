#!/usr/bin/env node

/// # CLI
///
/// ```bash
/// pyapi-ref html docs/                    # site from docs/api/api_reference.json
/// pyapi-ref html api_reference.json out/  # site from an explicit IR file
/// pyapi-ref module docs/ pkg.sub          # one module's page → stdout
/// pyapi-ref package docs/ pkg             # a package and its submodules → stdout
/// ```
///
/// `--config <file>` points at a config file; without it,
/// `pyapi-ref.config.json` is picked up from the docs directory (or the
/// IR file's directory) when present.

import { existsSync, mkdirSync, statSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { loadConfig, type DocGenConfig } from "./config.js";
import { ApiRefError, IrNotFoundError } from "./errors.js";
import { loadDocPackage, locateIrFile, type DocPackage } from "./ir.js";
import { generateSite, renderStandalone } from "./site.js";

const args = process.argv.slice(2);

if (args.length < 2) {
  console.log(`pyapi-ref - api reference pages from a stub generator's IR

usage:
  pyapi-ref html <docs-dir | ir.json> [outdir]      generate the whole site
  pyapi-ref module <docs-dir | ir.json> <module>    render one module to stdout
  pyapi-ref package <docs-dir | ir.json> <package>  render a package to stdout

options:
  --config <file>   configuration file (default: pyapi-ref.config.json beside the IR)
`);
  process.exit(1);
}

const [command, target, ...rest] = args;
const configFlag = rest.indexOf("--config");
const configPath = configFlag === -1 ? undefined : rest[configFlag + 1];
const positional = rest.filter((arg, i) => !arg.startsWith("--") && !(configFlag !== -1 && i === configFlag + 1));

/// a directory is a docs source tree and the IR is searched for in it; a
/// file is taken to be the IR itself.
function loadInputs(input: string): { pkg: DocPackage; config: DocGenConfig } {
  if (!existsSync(input)) throw new IrNotFoundError([input]);
  const isDir = statSync(input).isDirectory();
  const baseDir = isDir ? input : dirname(input);
  const config = loadConfig(baseDir, configPath);
  const irPath = isDir ? locateIrFile(input, config.jsonOutput) : input;
  return { pkg: loadDocPackage(irPath), config };
}

async function renderSingle(input: string, name: string, mode: "module" | "package"): Promise<string> {
  const { pkg, config } = loadInputs(input);
  const page = await renderStandalone(pkg, config, name, mode);
  for (const warning of page.warnings) console.error(`warning: ${warning}`);
  return page.html;
}

try {
  switch (command) {
    case "html": {
      const { pkg, config } = loadInputs(target);
      const outputDir = positional[0] ?? resolve(config.outputDir);
      const result = await generateSite(pkg, config);

      for (const warning of result.warnings) console.error(`warning: ${warning}`);

      mkdirSync(outputDir, { recursive: true });
      for (const [fileName, html] of result.files) {
        const outPath = join(outputDir, fileName);
        writeFileSync(outPath, html);
        console.log(`wrote ${outPath}`);
      }
      break;
    }

    case "module":
    case "package": {
      const name = positional[0];
      if (!name) {
        console.error(`${command} needs a ${command} name`);
        process.exit(1);
      }
      console.log(await renderSingle(target, name, command === "module" ? "module" : "package"));
      break;
    }

    default:
      console.error(`unknown command: ${command}`);
      process.exit(1);
  }
} catch (err) {
  if (err instanceof ApiRefError) {
    console.error(`error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
