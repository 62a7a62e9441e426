import { describe, it, expect } from "vitest";
import { compileMatcher, matchValue, patternsOverlap } from "../../discrimination/value-matcher.js";

describe("compileMatcher()", () => {
  it.each([
    ["LINE#", "exact", ["LINE#"]],
    ["LINE#*", "startsWith", ["LINE#"]],
    ["*#ARCHIVED", "endsWith", ["#ARCHIVED"]],
    ["*NOTE*", "contains", ["NOTE"]],
    ["A*B*C", "glob", ["A", "B", "C"]],
    ["*", "glob", ["", ""]],
  ])("compiles %s as %s", (pattern, strategy, parts) => {
    const matcher = compileMatcher(pattern);
    expect(matcher.strategy).toBe(strategy);
    expect(matcher.parts).toEqual(parts);
  });

  it("keeps a segment separator only for exact patterns", () => {
    expect(compileMatcher("META", { segmentSeparator: "#" }).segmentSeparator).toBe("#");
    expect(compileMatcher("META*", { segmentSeparator: "#" }).segmentSeparator).toBeUndefined();
  });
});

describe("matchValue()", () => {
  it("matches prefixes, suffixes and substrings", () => {
    expect(matchValue(compileMatcher("LINE#*"), "LINE#001")).toBe(true);
    expect(matchValue(compileMatcher("LINE#*"), "META")).toBe(false);
    expect(matchValue(compileMatcher("*#ARCHIVED"), "ORDER#1#ARCHIVED")).toBe(true);
    expect(matchValue(compileMatcher("*NOTE*"), "A#NOTE#1")).toBe(true);
  });

  it("matches exact literals and, with a separator, their sub-segments", () => {
    const plain = compileMatcher("META");
    const segmented = compileMatcher("META", { segmentSeparator: "#" });
    expect(matchValue(plain, "META")).toBe(true);
    expect(matchValue(plain, "META#v2")).toBe(false);
    expect(matchValue(segmented, "META#v2")).toBe(true);
    expect(matchValue(segmented, "METADATA")).toBe(false);
  });

  it("matches globs piece by piece without reusing text", () => {
    const glob = compileMatcher("ORDER#*#LINE#*");
    expect(matchValue(glob, "ORDER#1#LINE#2")).toBe(true);
    expect(matchValue(glob, "ORDER#1")).toBe(false);
    expect(matchValue(compileMatcher("A*A"), "A")).toBe(false);
    expect(matchValue(compileMatcher("A*A"), "ABA")).toBe(true);
  });

  it("lets a lone wildcard match anything", () => {
    expect(matchValue(compileMatcher("*"), "")).toBe(true);
    expect(matchValue(compileMatcher("*"), "anything")).toBe(true);
  });
});

describe("patternsOverlap()", () => {
  it("detects patterns that can accept the same value", () => {
    expect(patternsOverlap("LINE#*", "LINE#GIFT*")).toBe(true);
    expect(patternsOverlap("META", "META")).toBe(true);
    expect(patternsOverlap("*", "NOTE#*")).toBe(true);
  });

  it("keeps disjoint prefixes apart", () => {
    expect(patternsOverlap("LINE#*", "NOTE#*")).toBe(false);
  });
});
