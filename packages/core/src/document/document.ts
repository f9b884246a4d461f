import { z } from "zod";
import { DocumentValidationError } from "../internal/errors.js";
import { formatPath, type PathStep } from "../path/path.js";

export type Scalar = null | boolean | number | string;
export type Sequence = Document[];
export type Mapping = { [key: string]: Document };

/** A JSON-like tree: scalars, ordered sequences and string-keyed mappings. */
export type Document = Scalar | Sequence | Mapping;

export type DocumentKind = "Null" | "Boolean" | "Number" | "String" | "Mapping" | "Sequence";

export function isMapping(value: Document): value is Mapping {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isSequence(value: Document): value is Sequence {
  return Array.isArray(value);
}

export function kindOf(value: Document): DocumentKind {
  if (value === null) return "Null";
  if (Array.isArray(value)) return "Sequence";
  switch (typeof value) {
    case "boolean":
      return "Boolean";
    case "number":
      return "Number";
    case "string":
      return "String";
    default:
      return "Mapping";
  }
}

export function hasKey(mapping: Mapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(mapping, key);
}

/** Stores `key` as an own data property, including keys such as `__proto__`. */
export function assignKey(mapping: Mapping, key: string, value: Document): void {
  Object.defineProperty(mapping, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

export function cloneDocument(value: Document): Document {
  if (isSequence(value)) return value.map(cloneDocument);
  if (isMapping(value)) {
    const out: Mapping = {};
    for (const key of Object.keys(value)) assignKey(out, key, cloneDocument(value[key]));
    return out;
  }
  return value;
}

export function documentsEqual(a: Document, b: Document): boolean {
  if (isSequence(a) && isSequence(b)) {
    return a.length === b.length && a.every((item, i) => documentsEqual(item, b[i]));
  }
  if (isMapping(a) && isMapping(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => hasKey(b, key) && documentsEqual(a[key], b[key]));
  }
  return a === b;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function findInvalid(value: unknown, steps: PathStep[]): string | null {
  if (value === null || typeof value === "string" || typeof value === "boolean") return null;
  if (typeof value === "number") return Number.isFinite(value) ? null : formatPath(steps);
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const found = findInvalid(value[i], [...steps, i]);
      if (found) return found;
    }
    return null;
  }
  if (typeof value === "object" && isPlainObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      const found = findInvalid(child, [...steps, key]);
      if (found) return found;
    }
    return null;
  }
  return formatPath(steps);
}

export function isDocument(value: unknown): value is Document {
  return findInvalid(value, []) === null;
}

/** Accepts any JSON-compatible value without copying it. */
export const documentSchema = z.custom<Document>(isDocument, {
  message: "expected null, boolean, finite number, string, array or object",
});

/**
 * Validates an untyped value (typically fresh from JSON.parse) as a Document.
 * Throws DocumentValidationError naming the first offending location.
 */
export function parseDocument(value: unknown): Document {
  if (isDocument(value)) return value;
  throw new DocumentValidationError(
    findInvalid(value, []) ?? "root",
    "expected null, boolean, finite number, string, array or object",
  );
}
