import { Script } from "node:vm";
import { logger } from "../config/logger.js";

export const DEFAULT_REGEX_TIMEOUT_MS = 1000;

export type PatternElement =
  | { kind: "regex"; source: string }
  | { kind: "glob"; glob: string };

export interface MatchOptions {
  /** Upper bound for a single regex evaluation. Defaults to one second. */
  regexTimeoutMs?: number;
}

// Runs in a throwaway context so the vm watchdog can interrupt a runaway backtrack.
const regexScript = new Script("new RegExp(source, 'i').test(value)", {
  filename: "mailroute-regex.vm",
});

/**
 * Split a top-level expression into its comma-separated elements.
 * Elements are trimmed and empty ones dropped.
 */
export function splitPatternList(expression: string): string[] {
  return expression
    .split(",")
    .map((element) => element.trim())
    .filter((element) => element.length > 0);
}

export function classifyPattern(element: string): PatternElement {
  if (element.length >= 2 && element.startsWith("/") && element.endsWith("/")) {
    return { kind: "regex", source: element.slice(1, -1) };
  }
  return { kind: "glob", glob: element };
}

/**
 * Compile a glob where `*` matches any run of characters (including none)
 * and every other character is literal. The whole value has to match.
 */
export function globToRegex(glob: string): RegExp {
  const escaped = glob
    .replace(/[.+?^${}()|[\]\\/]/g, String.raw`\$&`)
    .replace(/\*+/g, ".*");
  return new RegExp(`^${escaped}$`, "is");
}

function describeError(err: unknown): { code?: string; message: string } {
  if (typeof err === "object" && err !== null) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
    return { code, message };
  }
  return { message: String(err) };
}

/**
 * Test `value` against a regular expression source, case-insensitively.
 * Invalid sources and evaluations that exceed the timeout both count as a
 * non-match.
 */
export function matchesRegex(
  value: string,
  source: string,
  timeoutMs: number = DEFAULT_REGEX_TIMEOUT_MS
): boolean {
  try {
    const result: unknown = regexScript.runInNewContext(
      { source, value },
      { timeout: timeoutMs }
    );
    return result === true;
  } catch (err) {
    const { code, message } = describeError(err);
    if (code === "ERR_SCRIPT_EXECUTION_TIMEOUT") {
      logger.warn({ pattern: source, timeoutMs }, "Regex evaluation timed out, treating as no match");
    } else {
      logger.warn({ pattern: source, error: message }, "Invalid regex pattern, treating as no match");
    }
    return false;
  }
}

export function matchesGlob(value: string, glob: string): boolean {
  return globToRegex(glob).test(value);
}

export function matchesElement(
  value: string,
  element: PatternElement,
  options: MatchOptions = {}
): boolean {
  switch (element.kind) {
    case "regex":
      return matchesRegex(value, element.source, options.regexTimeoutMs);
    case "glob":
      return matchesGlob(value, element.glob);
  }
}

/**
 * Decide whether `value` satisfies a pattern expression: one or more
 * comma-separated globs or `/regex/` elements, any of which may match.
 * A missing or blank expression never matches.
 */
export function matches(
  value: string,
  expression: string | undefined,
  options: MatchOptions = {}
): boolean {
  if (!expression || expression.trim() === "") {
    return false;
  }

  return splitPatternList(expression).some((element) =>
    matchesElement(value, classifyPattern(element), options)
  );
}
