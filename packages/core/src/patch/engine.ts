import type { Document } from "../document/document.js";
import type { PathFilter } from "../exclusion/filter.js";
import { PathResolutionError } from "../internal/errors.js";
import { createPatchLogger, type Logger } from "../observability/logger.js";
import { comparePaths, formatPath, type Path } from "../path/path.js";
import { decodeDiff, type DecodeWarning } from "../diff/interchange.js";
import type { ChangeKind, ChangeRecord, Diff } from "../diff/types.js";
import { WorkingCopy, resolvePath } from "./working-copy.js";

export type PatchWarningCode =
  | "PATH_UNRESOLVED"
  | "MISSING_TARGET"
  | "TARGET_PATH_MISSING"
  | "INVALID_CHANGE";

export interface PatchWarning {
  code: PatchWarningCode;
  change: ChangeKind;
  path: string;
  message: string;
}

export interface ApplyDiffOptions {
  /** Document the diff was computed against; supplies values the diff does not carry. */
  target?: Document;
  exclude?: PathFilter;
  logger?: Logger;
}

export interface PatchResult {
  document: Document;
  warnings: PatchWarning[];
  applied: number;
  /** Rendered paths of records left out by the exclusion filter. */
  excluded: string[];
}

class SkipChange extends Error {
  constructor(
    readonly code: PatchWarningCode,
    message: string,
  ) {
    super(message);
  }
}

const byPath = (a: ChangeRecord, b: ChangeRecord) => comparePaths(a.path, b.path);

class PatchRun {
  readonly working: WorkingCopy;
  readonly warnings: PatchWarning[] = [];
  readonly excluded: string[] = [];
  applied = 0;

  constructor(
    original: Document,
    private readonly options: ApplyDiffOptions,
    private readonly log: Logger,
  ) {
    this.working = new WorkingCopy(original);
  }

  run(changes: readonly ChangeRecord[]): void {
    for (const change of changes) {
      const path = formatPath(change.path);
      if (this.options.exclude?.matches(change.path)) {
        this.excluded.push(path);
        this.log.debug({ change: change.kind, path }, "Skipped excluded change");
        continue;
      }
      try {
        this.applyOne(change);
        this.applied++;
        this.log.debug({ change: change.kind, path }, "Applied change");
      } catch (err) {
        if (err instanceof SkipChange) this.skip(change, path, err.code, err.message);
        else if (err instanceof PathResolutionError) this.skip(change, path, "PATH_UNRESOLVED", err.message);
        else throw err;
      }
    }
  }

  private skip(change: ChangeRecord, path: string, code: PatchWarningCode, message: string): void {
    this.warnings.push({ code, change: change.kind, path, message });
    this.log.warn({ change: change.kind, path, code }, message);
  }

  private applyOne(change: ChangeRecord): void {
    switch (change.kind) {
      case "removed":
        if (change.path.length === 0) throw new SkipChange("INVALID_CHANGE", "cannot remove the root");
        this.working.remove(change.path);
        return;
      case "arrayItemRemoved":
        this.requireIndex(change.path);
        this.working.remove(change.path);
        return;
      case "valueChanged":
      case "typeChanged":
        this.working.replace(change.path, this.keepExcluded(change.path, change.newValue));
        return;
      case "arrayItemAdded":
        this.requireIndex(change.path);
        this.working.insert(
          change.path,
          change.newValue !== undefined ? change.newValue : this.fromTarget(change.path),
        );
        return;
      case "added": {
        const last = change.path[change.path.length - 1];
        if (typeof last !== "string") {
          throw new SkipChange("INVALID_CHANGE", "a mapping addition must end in a key");
        }
        this.working.put(
          change.path,
          change.value !== undefined ? change.value : this.fromTarget(change.path),
        );
        return;
      }
      default: {
        const unreachable: never = change;
        throw new Error(`Unknown change kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /** Excluded locations inside a replaced subtree keep their working-copy values. */
  private keepExcluded(path: Path, value: Document): Document {
    const { exclude } = this.options;
    if (!exclude || exclude.isEmpty) return value;
    return exclude.preserve(path, this.working.read(path), value);
  }

  private requireIndex(path: Path): void {
    if (typeof path[path.length - 1] !== "number") {
      throw new SkipChange("INVALID_CHANGE", "an array change must end in an index");
    }
  }

  private fromTarget(path: Path): Document {
    const { target } = this.options;
    if (target === undefined) {
      throw new SkipChange("MISSING_TARGET", "value not recorded in the diff and no target document supplied");
    }
    try {
      return resolvePath(target, path);
    } catch (err) {
      if (err instanceof PathResolutionError) {
        throw new SkipChange("TARGET_PATH_MISSING", `target document: ${err.message}`);
      }
      throw err;
    }
  }
}

/**
 * Applies `diff` to a private copy of `original`. Removals run first, deepest
 * and highest index first; then value changes, type changes, array
 * insertions in ascending order, and mapping additions last. A record that
 * cannot be applied is skipped with a warning; the rest still run.
 */
export function applyDiff(
  original: Document,
  diff: Diff,
  options: ApplyDiffOptions = {},
): PatchResult {
  const log = options.logger ?? createPatchLogger();
  const patch = new PatchRun(original, options, log);
  const { changes } = diff;

  patch.run([...changes.removed, ...changes.arrayItemsRemoved].sort(byPath).reverse());
  patch.run(changes.valuesChanged);
  patch.run(changes.typeChanges);
  patch.run([...changes.arrayItemsAdded].sort(byPath));
  patch.run(changes.added);

  log.info(
    { applied: patch.applied, warnings: patch.warnings.length, excluded: patch.excluded.length },
    "Applied diff",
  );
  return {
    document: patch.working.document,
    warnings: patch.warnings,
    applied: patch.applied,
    excluded: patch.excluded,
  };
}

export interface ExportPatchResult extends PatchResult {
  decodeWarnings: DecodeWarning[];
}

/** Decodes a serialized diff export and applies it. */
export function applyDiffExport(
  original: Document,
  raw: unknown,
  options: ApplyDiffOptions = {},
): ExportPatchResult {
  const { diff, warnings } = decodeDiff(raw);
  return { ...applyDiff(original, diff, options), decodeWarnings: warnings };
}
