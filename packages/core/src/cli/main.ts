/**
 * Command line for computing and replaying document diffs.
 *
 * Commands:
 *   - diff  <file1> <file2>              [--out <file>] [--exclusions <file>] [--quiet]
 *   - apply <original> <diff> [target]   [--out <file>] [--exclusions <file>]
 *
 * Defaults (if not provided):
 *   diff   --out  ./diff_export.json     (DOCDELTA_DIFF_OUT)
 *   apply  --out  ./reconstructed.json   (DOCDELTA_RECONSTRUCT_OUT)
 *
 * Environment:
 *   DOCDELTA_INDENT sets the indentation of written JSON; LOG_LEVEL and
 *   LOG_PRETTY control diagnostics on stderr.
 */

import { loadConfig, type AppConfig } from "../config/config.js";
import { computeDiff } from "../diff/engine.js";
import type { PathFilter } from "../exclusion/filter.js";
import { DocDeltaError, UsageError } from "../internal/errors.js";
import {
  readDiffExport,
  readDocument,
  readExclusionList,
  writeDiffExport,
  writeDocument,
} from "../io/json-file.js";
import { createCliLogger } from "../observability/logger.js";
import { applyDiff } from "../patch/engine.js";
import { formatDiffReport } from "../report/text.js";
import { parseArgs, type CliArgs } from "./args.js";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const USAGE = `Usage:
  docdelta diff <file1.json> <file2.json> [--out FILE] [--exclusions FILE] [--quiet]
  docdelta apply <original.json> <diff.json> [target.json] [--out FILE] [--exclusions FILE]

Commands:
  diff    Compare two JSON documents, print the differences and export them.
  apply   Rebuild a document by applying an exported diff to the original.
          The optional target supplies values for additions the diff does not carry.
`;

const log = createCliLogger();

async function loadFilter(args: CliArgs): Promise<PathFilter | undefined> {
  return args.exclusions ? readExclusionList(args.exclusions) : undefined;
}

async function runDiff(args: CliArgs, cfg: AppConfig, io: CliIo): Promise<number> {
  if (args._.length !== 2) throw new UsageError("diff expects exactly two files");
  const [file1, file2] = args._;
  const [original, modified] = await Promise.all([readDocument(file1), readDocument(file2)]);
  const exclude = await loadFilter(args);

  const diff = computeDiff(original, modified, { file1, file2, exclude });
  const outFile = args.out ?? cfg.DOCDELTA_DIFF_OUT;
  await writeDiffExport(outFile, diff, cfg.DOCDELTA_INDENT);

  if (!args.quiet) io.stdout(formatDiffReport(diff));
  io.stdout(`Diff exported to: ${outFile}\n`);
  log.info({ file1, file2, outFile, total: diff.summary.totalChanges }, "diff complete");
  return 0;
}

async function runApply(args: CliArgs, cfg: AppConfig, io: CliIo): Promise<number> {
  if (args._.length < 2 || args._.length > 3) {
    throw new UsageError("apply expects an original, a diff and an optional target");
  }
  const [originalFile, diffFile, targetFile] = args._;
  const original = await readDocument(originalFile);
  const { diff, warnings: decodeWarnings } = await readDiffExport(diffFile);
  const target = targetFile ? await readDocument(targetFile) : undefined;
  const exclude = await loadFilter(args);

  const result = applyDiff(original, diff, { target, exclude });
  const outFile = args.out ?? cfg.DOCDELTA_RECONSTRUCT_OUT;
  await writeDocument(outFile, result.document, cfg.DOCDELTA_INDENT);

  for (const w of decodeWarnings) {
    io.stderr(`warning: [DECODE] ${w.category}${w.path ? ` ${w.path}` : ""}: ${w.message}\n`);
  }
  for (const w of result.warnings) {
    io.stderr(`warning: [${w.code}] ${w.path}: ${w.message}\n`);
  }
  io.stdout(
    `Applied ${result.applied} of ${diff.summary.totalChanges} changes` +
      ` (${result.warnings.length} skipped, ${result.excluded.length} excluded)\n`,
  );
  io.stdout(`Reconstructed document written to: ${outFile}\n`);
  return 0;
}

export async function main(
  argv: string[],
  io: CliIo = processIo,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const cfg = loadConfig(env);
  try {
    const [command, ...rest] = argv;
    const args = parseArgs(rest);
    if (!command || command === "help" || command === "--help" || command === "-h" || args.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (command === "diff") return await runDiff(args, cfg, io);
    if (command === "apply") return await runApply(args, cfg, io);
    throw new UsageError(`Unknown command: ${command}`);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof DocDeltaError) {
      io.stderr(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
