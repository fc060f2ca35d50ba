/**
 * Markup Helper Tests
 *
 * Verifies:
 * - Markdown and LaTeX escaping
 * - Only scheme-prefixed values become links
 * - Pipe tables and fixed-point numbers
 */

import { describe, it, expect } from "vitest";
import {
  escapeMarkdown,
  unescapeMarkdown,
  escapeLatex,
  linkDisplay,
  markdownLink,
  markdownTable,
  singleLine,
  formatFixed,
} from "../src/shared/markup.js";

describe("Markdown escaping", () => {
  it("escapes underscore, ampersand and percent", () => {
    expect(escapeMarkdown("a_b & 50%")).toBe("a\\_b \\& 50\\%");
  });

  it("escapes emphasis, links and table pipes", () => {
    expect(escapeMarkdown("*x* [y] |z|")).toBe("\\*x\\* \\[y\\] \\|z\\|");
  });

  it("leaves ordinary punctuation alone", () => {
    expect(escapeMarkdown("2024-001, v1.2: ok!")).toBe("2024-001, v1.2: ok!");
  });

  it("unescapeMarkdown recovers the original text", () => {
    const original = "Cost_total & 10% of $x^2 \\ {a} <b> #1 ~c `d`";
    expect(unescapeMarkdown(escapeMarkdown(original))).toBe(original);
  });
});

describe("Links", () => {
  it("linkDisplay drops the scheme", () => {
    expect(linkDisplay("https://doi.org/10.1/x")).toBe("doi.org/10.1/x");
    expect(linkDisplay("plain reference")).toBe("plain reference");
  });

  it("markdownLink escapes the text but not the target", () => {
    expect(markdownLink("https://x.org/a_b")).toBe("[x.org/a\\_b](https://x.org/a_b)");
  });

  it("markdownLink renders non-URLs as escaped text", () => {
    expect(markdownLink("J. Stat_ 12 (2020)")).toBe("J. Stat\\_ 12 (2020)");
  });

  it("markdownLink links only values that start with a scheme", () => {
    const reference = "Nature 5 (2020), https://doi.org/10.1/x";
    expect(markdownLink(reference)).toBe(reference);
    expect(markdownLink("see https://x.org/a_b")).toBe("see https://x.org/a\\_b");
  });
});

describe("Tables and numbers", () => {
  it("markdownTable renders header, alignment rule and rows", () => {
    expect(markdownTable(["A", "B"], ["left", "right"], [["1", "2"], ["", "3"]])).toBe(
      ["| A | B |", "| :--- | ---: |", "| 1 | 2 |", "|  | 3 |"].join("\n"),
    );
  });

  it("singleLine collapses whitespace", () => {
    expect(singleLine("  a\n  b\t c ")).toBe("a b c");
  });

  it("formatFixed rounds and prints nan for undefined values", () => {
    expect(formatFixed(1 / 3, 4)).toBe("0.3333");
    expect(formatFixed(3, 0)).toBe("3");
    expect(formatFixed(NaN, 4)).toBe("nan");
  });
});

describe("LaTeX escaping", () => {
  it("escapes every reserved character", () => {
    expect(escapeLatex("a_b & {c} ~ ^ \\ 100% $ #")).toBe(
      "a\\_b \\& \\{c\\} \\textasciitilde{} \\textasciicircum{} \\textbackslash{} 100\\% \\$ \\#",
    );
  });
});
