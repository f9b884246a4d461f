import {
  cloneDocument,
  hasKey,
  isMapping,
  isSequence,
  kindOf,
  type Document,
  type Mapping,
  type Sequence,
} from "../document/document.js";
import { childPath, type Path } from "../path/path.js";
import type { PathFilter } from "../exclusion/filter.js";
import { createDiffLogger, type Logger } from "../observability/logger.js";
import { DiffBuilder, type Diff } from "./types.js";

export interface ComputeDiffOptions {
  /** Identifier of the original document, usually its file name. */
  file1?: string;
  file2?: string;
  now?: () => Date;
  exclude?: PathFilter;
  logger?: Logger;
}

class DiffWalker {
  constructor(
    private readonly out: DiffBuilder,
    private readonly exclude?: PathFilter,
  ) {}

  private skip(path: Path): boolean {
    return this.exclude?.matches(path) ?? false;
  }

  walk(original: Document, modified: Document, path: Path): void {
    if (this.skip(path)) return;
    if (isMapping(original) && isMapping(modified)) {
      this.walkMappings(original, modified, path);
      return;
    }
    if (isSequence(original) && isSequence(modified)) {
      this.walkSequences(original, modified, path);
      return;
    }
    const oldType = kindOf(original);
    const newType = kindOf(modified);
    if (oldType !== newType) {
      this.out.record({
        kind: "typeChanged",
        path,
        oldValue: cloneDocument(original),
        oldType,
        newValue: cloneDocument(modified),
        newType,
      });
    } else if (original !== modified) {
      this.out.record({ kind: "valueChanged", path, oldValue: original, newValue: modified });
    }
  }

  private walkMappings(original: Mapping, modified: Mapping, path: Path): void {
    for (const key of Object.keys(original)) {
      const at = childPath(path, key);
      if (hasKey(modified, key)) {
        this.walk(original[key], modified[key], at);
      } else if (!this.skip(at)) {
        this.out.record({ kind: "removed", path: at, oldValue: cloneDocument(original[key]) });
      }
    }
    for (const key of Object.keys(modified)) {
      if (hasKey(original, key)) continue;
      const at = childPath(path, key);
      if (!this.skip(at)) this.out.record({ kind: "added", path: at });
    }
  }

  // Positional comparison: reordering shows up as changes, not as moves.
  private walkSequences(original: Sequence, modified: Sequence, path: Path): void {
    const shared = Math.min(original.length, modified.length);
    for (let i = 0; i < shared; i++) {
      this.walk(original[i], modified[i], childPath(path, i));
    }
    for (let i = shared; i < original.length; i++) {
      const at = childPath(path, i);
      if (this.skip(at)) continue;
      this.out.record({ kind: "arrayItemRemoved", path: at, oldValue: cloneDocument(original[i]) });
    }
    for (let i = shared; i < modified.length; i++) {
      const at = childPath(path, i);
      if (this.skip(at)) continue;
      this.out.record({ kind: "arrayItemAdded", path: at, newValue: cloneDocument(modified[i]) });
    }
  }
}

/**
 * Structural difference between two documents. Never mutates its inputs and
 * holds copies of the values it records, so later edits to the inputs do not
 * reach it. Apart from the timestamp the result depends only on the arguments.
 */
export function computeDiff(
  original: Document,
  modified: Document,
  options: ComputeDiffOptions = {},
): Diff {
  const builder = new DiffBuilder();
  new DiffWalker(builder, options.exclude).walk(original, modified, []);
  const now = options.now ?? (() => new Date());
  const diff = builder.build({
    comparisonTimestamp: now().toISOString(),
    file1: options.file1 ?? "original",
    file2: options.file2 ?? "modified",
  });
  (options.logger ?? createDiffLogger()).debug(
    { file1: diff.metadata.file1, file2: diff.metadata.file2, summary: diff.summary },
    "Computed diff",
  );
  return diff;
}
