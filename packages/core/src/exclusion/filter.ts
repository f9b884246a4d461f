import { z } from "zod";
import {
  assignKey,
  hasKey,
  isMapping,
  isSequence,
  type Document,
  type Mapping,
  type Sequence,
} from "../document/document.js";
import { ExclusionListError, PathSyntaxError } from "../internal/errors.js";
import { childPath, formatPath, isPathPrefix, parsePath, type Path } from "../path/path.js";

export const exclusionListSchema = z.object({
  excluded_paths: z.array(z.string()).default([]),
  excluded_regex_paths: z.array(z.string()).default([]),
  excluded_keys: z.array(z.string()).default([]),
});

export type ExclusionListInput = z.input<typeof exclusionListSchema>;

export interface PathFilterOptions {
  paths?: readonly Path[];
  patterns?: readonly RegExp[];
  keys?: readonly string[];
}

/**
 * Decides which locations are left alone. A path is excluded when an
 * excluded path is a prefix of it, a pattern matches its rendered form, or
 * one of its mapping-key steps is an excluded key.
 */
export class PathFilter {
  private readonly paths: readonly Path[];
  private readonly patterns: readonly RegExp[];
  private readonly keys: ReadonlySet<string>;

  constructor(opts: PathFilterOptions = {}) {
    this.paths = opts.paths ?? [];
    this.patterns = opts.patterns ?? [];
    this.keys = new Set(opts.keys ?? []);
  }

  static none(): PathFilter {
    return new PathFilter();
  }

  /** Builds a filter from the on-disk exclusion list shape. */
  static fromList(raw: unknown): PathFilter {
    const parsed = exclusionListSchema.safeParse(raw);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
      throw new ExclusionListError(`Invalid exclusion list: ${msg}`);
    }
    const list = parsed.data;
    const paths = list.excluded_paths.map((p) => {
      try {
        return parsePath(p);
      } catch (err) {
        if (err instanceof PathSyntaxError) throw new ExclusionListError(err.message);
        throw err;
      }
    });
    const patterns = list.excluded_regex_paths.map((source) => {
      try {
        return new RegExp(source);
      } catch (err) {
        if (err instanceof SyntaxError) {
          throw new ExclusionListError(`Invalid exclusion pattern /${source}/: ${err.message}`);
        }
        throw err;
      }
    });
    return new PathFilter({ paths, patterns, keys: list.excluded_keys });
  }

  get isEmpty(): boolean {
    return this.paths.length === 0 && this.patterns.length === 0 && this.keys.size === 0;
  }

  matches(path: Path): boolean {
    if (this.isEmpty) return false;
    if (this.paths.some((p) => isPathPrefix(p, path))) return true;
    if (this.keys.size && path.some((step) => typeof step === "string" && this.keys.has(step))) {
      return true;
    }
    if (this.patterns.length) {
      const rendered = formatPath(path);
      return this.patterns.some((re) => re.test(rendered));
    }
    return false;
  }

  /**
   * Merges `next` over `current` at `path`, keeping the current value of
   * every excluded location inside it. Excluded keys missing from `next` are
   * carried over as well.
   */
  preserve(path: Path, current: Document, next: Document): Document {
    if (isMapping(current) && isMapping(next)) {
      const out: Mapping = {};
      for (const [key, value] of Object.entries(next)) {
        if (!hasKey(current, key)) {
          assignKey(out, key, value);
          continue;
        }
        const at = childPath(path, key);
        assignKey(out, key, this.matches(at) ? current[key] : this.preserve(at, current[key], value));
      }
      for (const [key, value] of Object.entries(current)) {
        if (!hasKey(next, key) && this.matches(childPath(path, key))) assignKey(out, key, value);
      }
      return out;
    }
    if (isSequence(current) && isSequence(next)) {
      const prior: Sequence = current;
      return next.map((item, i) => {
        if (i >= prior.length) return item;
        const at = childPath(path, i);
        return this.matches(at) ? prior[i] : this.preserve(at, prior[i], item);
      });
    }
    return next;
  }
}
