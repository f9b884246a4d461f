import type { Document, DocumentKind } from "../document/document.js";
import type { Path } from "../path/path.js";

/** Mapping key present only in the modified document. */
export interface AddedChange {
  readonly kind: "added";
  readonly path: Path;
  /** Only set when decoded from a legacy export that recorded the value. */
  readonly value?: Document;
}

export interface RemovedChange {
  readonly kind: "removed";
  readonly path: Path;
  /** The wire format lists removed keys by path only, so decoded records may lack it. */
  readonly oldValue?: Document;
}

export interface ValueChangedChange {
  readonly kind: "valueChanged";
  readonly path: Path;
  readonly oldValue: Document;
  readonly newValue: Document;
}

export interface TypeChangedChange {
  readonly kind: "typeChanged";
  readonly path: Path;
  readonly oldValue: Document;
  readonly oldType: DocumentKind;
  readonly newValue: Document;
  readonly newType: DocumentKind;
}

export interface ArrayItemAddedChange {
  readonly kind: "arrayItemAdded";
  readonly path: Path;
  readonly newValue?: Document;
}

export interface ArrayItemRemovedChange {
  readonly kind: "arrayItemRemoved";
  readonly path: Path;
  readonly oldValue: Document;
}

export type ChangeRecord =
  | AddedChange
  | RemovedChange
  | ValueChangedChange
  | TypeChangedChange
  | ArrayItemAddedChange
  | ArrayItemRemovedChange;

export type ChangeKind = ChangeRecord["kind"];

export interface DiffChanges {
  readonly added: readonly AddedChange[];
  readonly removed: readonly RemovedChange[];
  readonly valuesChanged: readonly ValueChangedChange[];
  readonly typeChanges: readonly TypeChangedChange[];
  readonly arrayItemsAdded: readonly ArrayItemAddedChange[];
  readonly arrayItemsRemoved: readonly ArrayItemRemovedChange[];
}

export interface DiffMetadata {
  readonly comparisonTimestamp: string;
  readonly file1: string;
  readonly file2: string;
  readonly hasDifferences: boolean;
}

export interface DiffSummary {
  readonly totalChanges: number;
  readonly additions: number;
  readonly deletions: number;
  readonly changes: number;
  readonly typeChanges: number;
  readonly arrayAdditions: number;
  readonly arrayDeletions: number;
}

export interface Diff {
  readonly metadata: DiffMetadata;
  readonly changes: DiffChanges;
  readonly summary: DiffSummary;
}

export function summarize(changes: DiffChanges): DiffSummary {
  const summary = {
    additions: changes.added.length,
    deletions: changes.removed.length,
    changes: changes.valuesChanged.length,
    typeChanges: changes.typeChanges.length,
    arrayAdditions: changes.arrayItemsAdded.length,
    arrayDeletions: changes.arrayItemsRemoved.length,
  };
  const totalChanges = Object.values(summary).reduce((a, b) => a + b, 0);
  return { totalChanges, ...summary };
}

/** All records of a diff in category order. */
export function allChanges(diff: Diff): ChangeRecord[] {
  const c = diff.changes;
  return [
    ...c.added,
    ...c.removed,
    ...c.valuesChanged,
    ...c.typeChanges,
    ...c.arrayItemsAdded,
    ...c.arrayItemsRemoved,
  ];
}

/**
 * Collects change records into their categories as they are created, then
 * freezes them into a Diff.
 */
export class DiffBuilder {
  private readonly added: AddedChange[] = [];
  private readonly removed: RemovedChange[] = [];
  private readonly valuesChanged: ValueChangedChange[] = [];
  private readonly typeChanges: TypeChangedChange[] = [];
  private readonly arrayItemsAdded: ArrayItemAddedChange[] = [];
  private readonly arrayItemsRemoved: ArrayItemRemovedChange[] = [];

  record(change: ChangeRecord): void {
    switch (change.kind) {
      case "added":
        this.added.push(change);
        return;
      case "removed":
        this.removed.push(change);
        return;
      case "valueChanged":
        this.valuesChanged.push(change);
        return;
      case "typeChanged":
        this.typeChanges.push(change);
        return;
      case "arrayItemAdded":
        this.arrayItemsAdded.push(change);
        return;
      case "arrayItemRemoved":
        this.arrayItemsRemoved.push(change);
        return;
      default: {
        const unreachable: never = change;
        throw new Error(`Unknown change kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  build(meta: Omit<DiffMetadata, "hasDifferences">): Diff {
    const changes: DiffChanges = {
      added: [...this.added],
      removed: [...this.removed],
      valuesChanged: [...this.valuesChanged],
      typeChanges: [...this.typeChanges],
      arrayItemsAdded: [...this.arrayItemsAdded],
      arrayItemsRemoved: [...this.arrayItemsRemoved],
    };
    const summary = summarize(changes);
    return {
      metadata: { ...meta, hasDifferences: summary.totalChanges > 0 },
      changes,
      summary,
    };
  }
}
