/**
 * Compiled wildcard patterns for sort keys and discriminator values.
 */

/** How a compiled pattern is tested. */
export type MatchStrategy = "exact" | "startsWith" | "endsWith" | "contains" | "glob";

/** A pattern compiled once at schema build. */
export interface ValueMatcher {
  readonly pattern: string;
  readonly strategy: MatchStrategy;
  /** The literal text for the simple strategies, the `*`-separated pieces for `glob`. */
  readonly parts: readonly string[];
  /**
   * For `exact` matchers: also accept values continuing with this separator,
   * so `"META"` matches `"META#v2"`.
   */
  readonly segmentSeparator: string | undefined;
}

/** Options for `compileMatcher()`. */
export interface CompileMatcherOptions {
  readonly segmentSeparator?: string | undefined;
}

/**
 * Compiles a wildcard pattern.
 *
 * | Pattern      | Strategy     |
 * |--------------|--------------|
 * | `LINE#`      | `exact`      |
 * | `LINE#*`     | `startsWith` |
 * | `*#ARCHIVED` | `endsWith`   |
 * | `*NOTE*`     | `contains`   |
 * | `A*B*C`      | `glob`       |
 *
 * @example
 * ```ts
 * const m = compileMatcher("LINE#*");
 * matchValue(m, "LINE#1"); // true
 * matchValue(m, "META");   // false
 * ```
 */
export const compileMatcher = (
  pattern: string,
  options: CompileMatcherOptions = {},
): ValueMatcher => {
  const pieces = pattern.split("*");
  const stars = pieces.length - 1;
  const inner = pattern.slice(1, -1);

  const compiled = (strategy: MatchStrategy, parts: readonly string[]): ValueMatcher =>
    Object.freeze({
      pattern,
      strategy,
      parts: Object.freeze([...parts]),
      segmentSeparator: strategy === "exact" ? options.segmentSeparator : undefined,
    });

  if (stars === 0) return compiled("exact", [pattern]);
  if (stars === 1 && pattern.endsWith("*") && pattern.length > 1) {
    return compiled("startsWith", [pattern.slice(0, -1)]);
  }
  if (stars === 1 && pattern.startsWith("*") && pattern.length > 1) {
    return compiled("endsWith", [pattern.slice(1)]);
  }
  if (
    stars === 2 &&
    pattern.length > 2 &&
    pattern.startsWith("*") &&
    pattern.endsWith("*") &&
    !inner.includes("*")
  ) {
    return compiled("contains", [inner]);
  }
  return compiled("glob", pieces);
};

const matchGlob = (pieces: readonly string[], value: string): boolean => {
  const first = pieces[0] ?? "";
  const last = pieces[pieces.length - 1] ?? "";
  if (!value.startsWith(first)) return false;

  let position = first.length;
  for (const piece of pieces.slice(1, -1)) {
    const found = value.indexOf(piece, position);
    if (found === -1) return false;
    position = found + piece.length;
  }

  return pieces.length === 1
    ? value === first
    : value.length - last.length >= position && value.endsWith(last);
};

/** Tests a value against a compiled pattern. Never throws. */
export const matchValue = (matcher: ValueMatcher, value: string): boolean => {
  const literal = matcher.parts[0] ?? "";
  switch (matcher.strategy) {
    case "exact":
      return (
        value === literal ||
        (matcher.segmentSeparator !== undefined &&
          value.startsWith(literal + matcher.segmentSeparator))
      );
    case "startsWith":
      return value.startsWith(literal);
    case "endsWith":
      return value.endsWith(literal);
    case "contains":
      return value.includes(literal);
    case "glob":
      return matchGlob(matcher.parts, value);
  }
};

/**
 * Whether two patterns can accept the same value, judged on their literal
 * text: equal patterns, or one's literal text is a prefix of the other's.
 */
export const patternsOverlap = (a: string, b: string): boolean => {
  if (a === b) return true;
  const literalA = a.replaceAll("*", "");
  const literalB = b.replaceAll("*", "");
  return literalA.startsWith(literalB) || literalB.startsWith(literalA);
};
