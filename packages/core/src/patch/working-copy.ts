import {
  assignKey,
  cloneDocument,
  hasKey,
  isMapping,
  isSequence,
  kindOf,
  type Document,
} from "../document/document.js";
import { PathResolutionError } from "../internal/errors.js";
import { formatPath, parentPath, type Path, type PathStep } from "../path/path.js";

/** Reads the value at `path`, or throws PathResolutionError. */
export function resolvePath(doc: Document, path: Path): Document {
  let current = doc;
  for (let i = 0; i < path.length; i++) {
    current = step(current, path[i], path.slice(0, i + 1));
  }
  return current;
}

function step(node: Document, at: PathStep, path: Path): Document {
  if (typeof at === "number") {
    if (!isSequence(node)) {
      throw new PathResolutionError(formatPath(path), `expected a Sequence, found ${kindOf(node)}`);
    }
    if (at >= node.length) {
      throw new PathResolutionError(formatPath(path), `index ${at} out of range (length ${node.length})`);
    }
    return node[at];
  }
  if (!isMapping(node)) {
    throw new PathResolutionError(formatPath(path), `expected a Mapping, found ${kindOf(node)}`);
  }
  if (!hasKey(node, at)) throw new PathResolutionError(formatPath(path), "no such key");
  return node[at];
}

/**
 * Private, mutable deep copy of a document. Values handed in are cloned so
 * nothing outside the copy is ever aliased.
 */
export class WorkingCopy {
  private root: Document;

  constructor(original: Document) {
    this.root = cloneDocument(original);
  }

  get document(): Document {
    return this.root;
  }

  read(path: Path): Document {
    return resolvePath(this.root, path);
  }

  /** Overwrites an existing location; the root itself may be replaced. */
  replace(path: Path, value: Document): void {
    if (path.length === 0) {
      this.root = cloneDocument(value);
      return;
    }
    const parent = this.read(parentPath(path));
    const last = path[path.length - 1];
    step(parent, last, path);
    if (typeof last === "number" && isSequence(parent)) parent[last] = cloneDocument(value);
    else if (typeof last === "string" && isMapping(parent)) assignKey(parent, last, cloneDocument(value));
  }

  /** Deletes a mapping key, or splices an item out of a sequence. */
  remove(path: Path): void {
    if (path.length === 0) throw new PathResolutionError(formatPath(path), "cannot remove the root");
    const parent = this.read(parentPath(path));
    const last = path[path.length - 1];
    step(parent, last, path);
    if (typeof last === "number" && isSequence(parent)) parent.splice(last, 1);
    else if (typeof last === "string" && isMapping(parent)) delete parent[last];
  }

  /** Inserts into a sequence at `index <= length`. */
  insert(path: Path, value: Document): void {
    const last = path[path.length - 1];
    if (typeof last !== "number") {
      throw new PathResolutionError(formatPath(path), "expected a sequence index as the last step");
    }
    const parent = this.read(parentPath(path));
    if (!isSequence(parent)) {
      throw new PathResolutionError(formatPath(path), `expected a Sequence, found ${kindOf(parent)}`);
    }
    if (last > parent.length) {
      throw new PathResolutionError(
        formatPath(path),
        `index ${last} is past the end (length ${parent.length})`,
      );
    }
    parent.splice(last, 0, cloneDocument(value));
  }

  /** Sets a mapping key whose parent mapping already exists. */
  put(path: Path, value: Document): void {
    const last = path[path.length - 1];
    if (typeof last !== "string") {
      throw new PathResolutionError(formatPath(path), "expected a mapping key as the last step");
    }
    const parent = this.read(parentPath(path));
    if (!isMapping(parent)) {
      throw new PathResolutionError(formatPath(path), `expected a Mapping, found ${kindOf(parent)}`);
    }
    assignKey(parent, last, cloneDocument(value));
  }
}
