import { PathSyntaxError } from "../internal/errors.js";

/** A mapping key (string) or a sequence index (number). */
export type PathStep = string | number;

/** Location of a node; the empty path is the document root. */
export type Path = readonly PathStep[];

export const ROOT = "root";

function quoteKey(key: string): string {
  return `'${key.replace(/[\\']/g, "\\$&")}'`;
}

export function formatPath(path: Path): string {
  let out = ROOT;
  for (const step of path) {
    out += typeof step === "number" ? `[${step}]` : `[${quoteKey(step)}]`;
  }
  return out;
}

/**
 * Parses the bracketed notation written by formatPath, e.g. `root['a']["b"][2]`.
 * Keys are quoted with ' or " and may use backslash escapes; unquoted steps
 * must be non-negative integers.
 */
export function parsePath(text: string): Path {
  if (!text.startsWith(ROOT)) {
    throw new PathSyntaxError(text, 0, `expected "${ROOT}"`);
  }
  const steps: PathStep[] = [];
  let i = ROOT.length;
  while (i < text.length) {
    if (text[i] !== "[") throw new PathSyntaxError(text, i, `expected "[" but found "${text[i]}"`);
    i++;
    const quote = text[i];
    if (quote === "'" || quote === '"') {
      i++;
      let key = "";
      let closed = false;
      while (i < text.length) {
        const ch = text[i];
        if (ch === "\\") {
          if (i + 1 >= text.length) break;
          key += text[i + 1];
          i += 2;
          continue;
        }
        if (ch === quote) {
          closed = true;
          i++;
          break;
        }
        key += ch;
        i++;
      }
      if (!closed) throw new PathSyntaxError(text, i, "unterminated key");
      steps.push(key);
    } else {
      const start = i;
      while (i < text.length && text[i] >= "0" && text[i] <= "9") i++;
      if (i === start) throw new PathSyntaxError(text, start, "expected a quoted key or an index");
      steps.push(Number(text.slice(start, i)));
    }
    if (text[i] !== "]") {
      throw new PathSyntaxError(text, i, i < text.length ? `expected "]" but found "${text[i]}"` : "unexpected end of input");
    }
    i++;
  }
  return steps;
}

function compareSteps(a: PathStep, b: PathStep): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over paths. Indices compare numerically, and a path sorts after
 * every path that is a prefix of it.
 */
export function comparePaths(a: Path, b: Path): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareSteps(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

export function isPathPrefix(prefix: Path, path: Path): boolean {
  if (prefix.length > path.length) return false;
  return prefix.every((step, i) => step === path[i]);
}

export function parentPath(path: Path): Path {
  return path.slice(0, -1);
}

export function childPath(path: Path, step: PathStep): Path {
  return [...path, step];
}
