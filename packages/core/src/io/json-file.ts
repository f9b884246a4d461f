import fs from "node:fs";
import { parseDocument, type Document } from "../document/document.js";
import { decodeDiff, encodeDiff, type DecodedDiff } from "../diff/interchange.js";
import type { Diff } from "../diff/types.js";
import { PathFilter } from "../exclusion/filter.js";
import {
  DocumentLoadError,
  DocumentValidationError,
  DocumentWriteError,
  type SourceLocation,
} from "../internal/errors.js";
import { createIoLogger } from "../observability/logger.js";

const log = createIoLogger();

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function ioReason(err: unknown, missing: string): string {
  switch (errnoCode(err)) {
    case "ENOENT":
      return missing;
    case "EACCES":
    case "EPERM":
      return "permission denied";
    case "EISDIR":
      return "is a directory";
    default:
      return err instanceof Error ? err.message : String(err);
  }
}

/** Line/column of a JSON.parse failure, when the engine reports one. */
export function locateSyntaxError(text: string, message: string): SourceLocation | undefined {
  const lineCol = /line (\d+) column (\d+)/.exec(message);
  if (lineCol) return { line: Number(lineCol[1]), column: Number(lineCol[2]) };
  const pos = /position (\d+)/.exec(message);
  if (!pos) return undefined;
  const offset = Math.min(Number(pos[1]), text.length);
  const before = text.slice(0, offset).split("\n");
  return { line: before.length, column: before[before.length - 1].length + 1 };
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    throw new DocumentLoadError(filePath, ioReason(err, "file not found"), { cause: err });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new DocumentLoadError(filePath, `invalid JSON: ${err.message}`, {
        location: locateSyntaxError(text, err.message),
        cause: err,
      });
    }
    throw err;
  }
}

export async function readDocument(filePath: string): Promise<Document> {
  const raw = await readJsonFile(filePath);
  try {
    const doc = parseDocument(raw);
    log.debug({ filePath }, "Loaded document");
    return doc;
  } catch (err) {
    if (err instanceof DocumentValidationError) {
      throw new DocumentLoadError(filePath, err.message, { cause: err });
    }
    throw err;
  }
}

export async function writeJsonFile(filePath: string, value: unknown, indent = 2): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, JSON.stringify(value, null, indent) + "\n", "utf8");
  } catch (err) {
    throw new DocumentWriteError(filePath, ioReason(err, "directory not found"), { cause: err });
  }
  log.debug({ filePath }, "Wrote JSON file");
}

export async function writeDocument(filePath: string, doc: Document, indent = 2): Promise<void> {
  await writeJsonFile(filePath, doc, indent);
}

export async function readDiffExport(filePath: string): Promise<DecodedDiff> {
  return decodeDiff(await readJsonFile(filePath));
}

export async function writeDiffExport(filePath: string, diff: Diff, indent = 2): Promise<void> {
  await writeJsonFile(filePath, encodeDiff(diff), indent);
}

export async function readExclusionList(filePath: string): Promise<PathFilter> {
  return PathFilter.fromList(await readJsonFile(filePath));
}
