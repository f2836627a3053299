/// shared test fixtures: the sample IR and small type expression builders.

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { loadDocPackage, type DocPackage, type LinkTarget, type TypeExpression } from "../src/ir.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const fixturePath = join(__dirname, "fixtures", "api_reference.json");

export function loadFixture(): DocPackage {
  return loadDocPackage(fixturePath);
}

export function leaf(display: string, link_target?: LinkTarget): TypeExpression {
  return link_target ? { display, link_target, children: [] } : { display, children: [] };
}

export function node(display: string, children: TypeExpression[], link_target?: LinkTarget): TypeExpression {
  return link_target ? { display, link_target, children } : { display, children };
}

export function classTarget(fqn: string, attribute = false): LinkTarget {
  return { kind: "Class", fqn, attribute };
}
