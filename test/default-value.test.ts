import { describe, it, expect } from "vitest";
import { defaultDisplay, defaultValueNodes, reconstructDefault } from "../src/default-value.js";
import type { DefaultValue, TypeRef } from "../src/ir.js";
import { literal, xref } from "../src/tree.js";
import { classTarget } from "./helpers.js";

const variant = classTarget("pkg.C", true);

function expression(display: string, type_refs: TypeRef[]): DefaultValue {
  return { kind: "Expression", display, type_refs };
}

const joined = (value: DefaultValue) =>
  reconstructDefault(value)
    .map((fragment) => fragment.text)
    .join("");

describe("reconstructDefault", () => {
  it("returns a simple value as one text fragment", () => {
    expect(reconstructDefault({ kind: "Simple", value: "1" })).toEqual([{ kind: "text", text: "1" }]);
  });

  it("links a reference at the start and keeps the rest as text", () => {
    const value = expression("C.C1(5)", [{ offset: 0, text: "C.C1", link_target: variant }]);
    expect(reconstructDefault(value)).toEqual([
      { kind: "link", text: "C.C1", target: variant },
      { kind: "text", text: "(5)" },
    ]);
  });

  it("keeps the text between several references", () => {
    const a = classTarget("pkg.A.X", true);
    const b = classTarget("pkg.B.Y", true);
    const value = expression("f(A.X, B.Y)", [
      { offset: 2, text: "A.X", link_target: a },
      { offset: 7, text: "B.Y", link_target: b },
    ]);
    expect(reconstructDefault(value)).toEqual([
      { kind: "text", text: "f(" },
      { kind: "link", text: "A.X", target: a },
      { kind: "text", text: ", " },
      { kind: "link", text: "B.Y", target: b },
      { kind: "text", text: ")" },
    ]);
  });

  it("leaves a reference without a target as text", () => {
    const value = expression("x + y", [{ offset: 4, text: "y", link_target: null }]);
    expect(reconstructDefault(value)).toEqual([
      { kind: "text", text: "x + " },
      { kind: "text", text: "y" },
    ]);
  });

  it("drops references that start out of range", () => {
    const value = expression("C.C1(5)", [
      { offset: 20, text: "C.C1", link_target: variant },
      { offset: -1, text: "C", link_target: variant },
    ]);
    expect(reconstructDefault(value)).toEqual([{ kind: "text", text: "C.C1(5)" }]);
  });

  it("keeps the later of two overlapping references", () => {
    const value = expression("C.C1(5)", [
      { offset: 0, text: "C.C1", link_target: variant },
      { offset: 2, text: "C1(5", link_target: variant },
    ]);
    expect(reconstructDefault(value)).toEqual([
      { kind: "text", text: "C." },
      { kind: "link", text: "C1(5", target: variant },
      { kind: "text", text: ")" },
    ]);
  });

  it("cuts a reference that runs past the end", () => {
    const value = expression("C.C1(5)", [{ offset: 4, text: "(5)xyz", link_target: variant }]);
    expect(reconstructDefault(value)).toEqual([
      { kind: "text", text: "C.C1" },
      { kind: "link", text: "(5)", target: variant },
    ]);
  });

  it("gives back the display string whatever the references", () => {
    const cases: DefaultValue[] = [
      expression("C.C1(5)", [{ offset: 0, text: "C.C1", link_target: variant }]),
      expression("[A.X, A.Y]", [
        { offset: 1, text: "A.X", link_target: variant },
        { offset: 6, text: "A.Y", link_target: variant },
      ]),
      expression("", [{ offset: 0, text: "x", link_target: variant }]),
      expression("abc", [{ offset: 1, text: "", link_target: variant }]),
    ];
    for (const value of cases) {
      expect(joined(value)).toBe(defaultDisplay(value));
    }
  });
});

describe("defaultValueNodes", () => {
  it("turns links into cross-references and text into literals", () => {
    const value = expression("C.C1(5)", [{ offset: 0, text: "C.C1", link_target: variant }]);
    expect(defaultValueNodes(value)).toEqual([
      xref("attr", "pkg.C", [literal("C.C1")], true),
      literal("(5)", ["default-value"]),
    ]);
  });
});
