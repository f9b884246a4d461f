import type { Document } from "../document/document.js";
import { formatPath } from "../path/path.js";
import type { Diff } from "../diff/types.js";

const RULE = "=".repeat(72);
const THIN_RULE = "-".repeat(72);

function show(value: Document): string {
  return JSON.stringify(value);
}

function section(title: string, lines: string[]): string[] {
  if (!lines.length) return [];
  return [`${title} (${lines.length}):`, ...lines.map((l) => `  ${l}`), ""];
}

/** Human-readable, categorized rendering of a diff. */
export function formatDiffReport(diff: Diff): string {
  const { metadata, changes, summary } = diff;
  const out = [RULE, "DOCUMENT COMPARISON", `  File 1: ${metadata.file1}`, `  File 2: ${metadata.file2}`, RULE];

  if (!metadata.hasDifferences) {
    out.push("No differences found. The documents are identical.");
    return out.join("\n") + "\n";
  }

  out.push(
    ...section(
      "Added keys",
      changes.added.map((c) => `+ ${formatPath(c.path)}`),
    ),
    ...section(
      "Removed keys",
      changes.removed.map((c) =>
        c.oldValue === undefined ? `- ${formatPath(c.path)}` : `- ${formatPath(c.path)}: ${show(c.oldValue)}`,
      ),
    ),
    ...section(
      "Changed values",
      changes.valuesChanged.map(
        (c) => `~ ${formatPath(c.path)}: ${show(c.oldValue)} -> ${show(c.newValue)}`,
      ),
    ),
    ...section(
      "Type changes",
      changes.typeChanges.map(
        (c) =>
          `~ ${formatPath(c.path)}: ${show(c.oldValue)} (${c.oldType}) -> ${show(c.newValue)} (${c.newType})`,
      ),
    ),
    ...section(
      "Added items",
      changes.arrayItemsAdded.map((c) =>
        c.newValue === undefined ? `+ ${formatPath(c.path)}` : `+ ${formatPath(c.path)}: ${show(c.newValue)}`,
      ),
    ),
    ...section(
      "Removed items",
      changes.arrayItemsRemoved.map((c) => `- ${formatPath(c.path)}: ${show(c.oldValue)}`),
    ),
    THIN_RULE,
    `SUMMARY: ${summary.totalChanges} total changes`,
  );
  return out.join("\n") + "\n";
}
