import { z } from "zod";
import { documentSchema, kindOf, type Document } from "../document/document.js";
import { DiffFormatError, PathSyntaxError } from "../internal/errors.js";
import { formatPath, parsePath, type Path } from "../path/path.js";
import { DiffBuilder, type Diff } from "./types.js";

/** Marker the legacy tree-view export wrote for the absent side of a change. */
export const NOT_PRESENT = "not present";

export const CATEGORIES = [
  "dictionary_item_added",
  "dictionary_item_removed",
  "values_changed",
  "type_changes",
  "iterable_item_added",
  "iterable_item_removed",
] as const;

export type Category = (typeof CATEGORIES)[number];

export interface LegacyEntry {
  path: string;
  old_value?: Document;
  new_value?: Document;
  value?: Document;
}

export interface DiffExport {
  metadata: {
    comparison_timestamp: string;
    file1: string;
    file2: string;
    has_differences: boolean;
  };
  differences: {
    dictionary_item_added: string[] | LegacyEntry[];
    dictionary_item_removed: string[];
    values_changed: Record<string, { old_value: Document; new_value: Document }>;
    type_changes: Record<
      string,
      { old_value: Document; old_type: string; new_value: Document; new_type: string }
    >;
    iterable_item_added: Record<string, Document> | LegacyEntry[];
    iterable_item_removed: Record<string, Document>;
  };
  summary: {
    total_changes: number;
    additions: number;
    deletions: number;
    changes: number;
    type_changes: number;
    array_additions: number;
    array_deletions: number;
  };
}

export interface DecodeWarning {
  category: string;
  path?: string;
  message: string;
}

export interface DecodedDiff {
  diff: Diff;
  warnings: DecodeWarning[];
}

/** List-form entry; an absent value is left out rather than marked. */
function listEntry(path: Path, newValue: Document | undefined): LegacyEntry {
  const text = formatPath(path);
  return newValue === undefined ? { path: text } : { path: text, new_value: newValue };
}

export function encodeDiff(diff: Diff): DiffExport {
  const { changes, metadata, summary } = diff;

  const valuesChanged: DiffExport["differences"]["values_changed"] = {};
  for (const c of changes.valuesChanged) {
    valuesChanged[formatPath(c.path)] = { old_value: c.oldValue, new_value: c.newValue };
  }
  const typeChanges: DiffExport["differences"]["type_changes"] = {};
  for (const c of changes.typeChanges) {
    typeChanges[formatPath(c.path)] = {
      old_value: c.oldValue,
      old_type: c.oldType,
      new_value: c.newValue,
      new_type: c.newType,
    };
  }
  const itemsRemoved: Record<string, Document> = {};
  for (const c of changes.arrayItemsRemoved) itemsRemoved[formatPath(c.path)] = c.oldValue;

  // A value-less array addition cannot be written in the mapping form.
  const mappedAdded: Record<string, Document> = {};
  let allValued = true;
  for (const c of changes.arrayItemsAdded) {
    if (c.newValue === undefined) allValued = false;
    else mappedAdded[formatPath(c.path)] = c.newValue;
  }
  const itemsAdded: DiffExport["differences"]["iterable_item_added"] = allValued
    ? mappedAdded
    : changes.arrayItemsAdded.map((c) => listEntry(c.path, c.newValue));

  // Key additions carry a value only when decoded from a list export.
  const keysAdded: DiffExport["differences"]["dictionary_item_added"] = changes.added.some(
    (c) => c.value !== undefined,
  )
    ? changes.added.map((c) => listEntry(c.path, c.value))
    : changes.added.map((c) => formatPath(c.path));

  return {
    metadata: {
      comparison_timestamp: metadata.comparisonTimestamp,
      file1: metadata.file1,
      file2: metadata.file2,
      has_differences: metadata.hasDifferences,
    },
    differences: {
      dictionary_item_added: keysAdded,
      dictionary_item_removed: changes.removed.map((c) => formatPath(c.path)),
      values_changed: valuesChanged,
      type_changes: typeChanges,
      iterable_item_added: itemsAdded,
      iterable_item_removed: itemsRemoved,
    },
    summary: {
      total_changes: summary.totalChanges,
      additions: summary.additions,
      deletions: summary.deletions,
      changes: summary.changes,
      type_changes: summary.typeChanges,
      array_additions: summary.arrayAdditions,
      array_deletions: summary.arrayDeletions,
    },
  };
}

const envelopeSchema = z.object({
  differences: z.record(z.string(), z.unknown()),
});

const metadataSchema = z.object({
  comparison_timestamp: z.string().default(""),
  file1: z.string().default(""),
  file2: z.string().default(""),
});

const valuePairSchema = z.object({ old_value: documentSchema, new_value: documentSchema });

const legacyEntrySchema = z.object({
  path: z.string(),
  old_value: documentSchema.optional(),
  new_value: documentSchema.optional(),
  value: documentSchema.optional(),
});

/**
 * One side of a list entry, or undefined when it was absent. The tree-view
 * export wrote both sides of every entry, with NOT_PRESENT for the missing
 * one; entries that carry a single side leave the missing one out.
 */
function sideOf(entry: LegacyEntry, side: "old_value" | "new_value"): Document | undefined {
  const primary = entry[side];
  const value = primary !== undefined ? primary : entry.value;
  const treeView = entry.old_value !== undefined && entry.new_value !== undefined;
  return treeView && value === NOT_PRESENT ? undefined : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join(", ");
}

interface EntryHandlers {
  mapped(path: Path, raw: unknown, text: string): void;
  listed(path: Path, entry: LegacyEntry, text: string): void;
  pathOnly?(path: Path): void;
}

class DiffDecoder {
  readonly warnings: DecodeWarning[] = [];
  readonly builder = new DiffBuilder();

  warn(category: string, message: string, path?: string): void {
    this.warnings.push(path === undefined ? { category, message } : { category, path, message });
  }

  private path(category: string, text: string): Path | null {
    try {
      return parsePath(text);
    } catch (err) {
      if (err instanceof PathSyntaxError) {
        this.warn(category, err.message, text);
        return null;
      }
      throw err;
    }
  }

  /** Walks the mapping form (path -> payload) or the legacy list form of a category. */
  private entries(category: Category, section: unknown, handlers: EntryHandlers): void {
    if (Array.isArray(section)) {
      for (const item of section) {
        if (typeof item === "string") {
          const path = this.path(category, item);
          if (!path) continue;
          if (handlers.pathOnly) handlers.pathOnly(path);
          else this.warn(category, "expected a change object, got a bare path", item);
          continue;
        }
        const parsed = legacyEntrySchema.safeParse(item);
        if (!parsed.success) {
          this.warn(category, `invalid entry: ${issuesOf(parsed.error)}`);
          continue;
        }
        const path = this.path(category, parsed.data.path);
        if (path) handlers.listed(path, parsed.data, parsed.data.path);
      }
      return;
    }
    if (isRecord(section)) {
      for (const [text, raw] of Object.entries(section)) {
        const path = this.path(category, text);
        if (path) handlers.mapped(path, raw, text);
      }
      return;
    }
    this.warn(category, "expected a list or a mapping; category ignored");
  }

  decodeSection(category: string, section: unknown): void {
    switch (category) {
      case "dictionary_item_added":
        return this.entries(category, section, {
          pathOnly: (path) => this.builder.record({ kind: "added", path }),
          listed: (path, entry) => {
            const value = sideOf(entry, "new_value");
            this.builder.record(value === undefined ? { kind: "added", path } : { kind: "added", path, value });
          },
          mapped: (path) => this.builder.record({ kind: "added", path }),
        });
      case "dictionary_item_removed":
        return this.entries(category, section, {
          pathOnly: (path) => this.builder.record({ kind: "removed", path }),
          listed: (path, entry) => {
            const oldValue = sideOf(entry, "old_value");
            this.builder.record(
              oldValue === undefined ? { kind: "removed", path } : { kind: "removed", path, oldValue },
            );
          },
          mapped: (path, raw, text) => {
            const parsed = documentSchema.safeParse(raw);
            if (parsed.success) this.builder.record({ kind: "removed", path, oldValue: parsed.data });
            else this.warn(category, "invalid removed value", text);
          },
        });
      case "values_changed":
      case "type_changes":
        return this.entries(category, section, this.pairHandlers(category));
      case "iterable_item_added":
        return this.entries(category, section, {
          pathOnly: (path) => this.builder.record({ kind: "arrayItemAdded", path }),
          listed: (path, entry) => {
            const newValue = sideOf(entry, "new_value");
            this.builder.record(
              newValue === undefined
                ? { kind: "arrayItemAdded", path }
                : { kind: "arrayItemAdded", path, newValue },
            );
          },
          mapped: (path, raw, text) => {
            const parsed = documentSchema.safeParse(raw);
            if (parsed.success) this.builder.record({ kind: "arrayItemAdded", path, newValue: parsed.data });
            else this.warn(category, "invalid added value", text);
          },
        });
      case "iterable_item_removed":
        return this.entries(category, section, {
          listed: (path, entry, text) => {
            const oldValue = sideOf(entry, "old_value");
            if (oldValue === undefined) this.warn(category, "missing old_value", text);
            else this.builder.record({ kind: "arrayItemRemoved", path, oldValue });
          },
          mapped: (path, raw, text) => {
            const parsed = documentSchema.safeParse(raw);
            if (parsed.success) this.builder.record({ kind: "arrayItemRemoved", path, oldValue: parsed.data });
            else this.warn(category, "invalid removed value", text);
          },
        });
      default:
        this.warn(category, "unknown category ignored");
    }
  }

  private pairHandlers(category: Category): EntryHandlers {
    return {
      listed: (path, entry, text) =>
        this.valueChange(category, path, entry.old_value, entry.new_value, text),
      mapped: (path, raw, text) => {
        const parsed = valuePairSchema.safeParse(raw);
        if (parsed.success) {
          this.valueChange(category, path, parsed.data.old_value, parsed.data.new_value, text);
        } else {
          this.warn(category, `invalid entry: ${issuesOf(parsed.error)}`, text);
        }
      },
    };
  }

  /**
   * Both scalar and type changes land here: the category is decided from the
   * values themselves, so a mislabelled entry still applies correctly.
   */
  private valueChange(
    category: string,
    path: Path,
    oldValue: Document | undefined,
    newValue: Document | undefined,
    text: string,
  ): void {
    if (oldValue === undefined || newValue === undefined) {
      this.warn(category, "both old_value and new_value are required", text);
      return;
    }
    const oldType = kindOf(oldValue);
    const newType = kindOf(newValue);
    if (oldType === newType) {
      this.builder.record({ kind: "valueChanged", path, oldValue, newValue });
    } else {
      this.builder.record({ kind: "typeChanged", path, oldValue, oldType, newValue, newType });
    }
  }
}

/**
 * Reads a serialized diff. Only a missing or non-mapping `differences`
 * section is fatal; malformed categories and records become warnings.
 */
export function decodeDiff(raw: unknown): DecodedDiff {
  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new DiffFormatError("Invalid diff export", [issuesOf(envelope.error)]);
  }
  const decoder = new DiffDecoder();
  for (const [category, section] of Object.entries(envelope.data.differences)) {
    decoder.decodeSection(category, section);
  }

  const source = isRecord(raw) ? raw.metadata : undefined;
  const meta = metadataSchema.safeParse(source ?? {});
  if (!meta.success) decoder.warn("metadata", `ignored: ${issuesOf(meta.error)}`);
  const metadata = meta.success
    ? meta.data
    : { comparison_timestamp: "", file1: "", file2: "" };

  return {
    diff: decoder.builder.build({
      comparisonTimestamp: metadata.comparison_timestamp,
      file1: metadata.file1,
      file2: metadata.file2,
    }),
    warnings: decoder.warnings,
  };
}
