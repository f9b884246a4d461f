export {
  cloneDocument,
  documentsEqual,
  documentSchema,
  isDocument,
  isMapping,
  isSequence,
  kindOf,
  parseDocument,
  type Document,
  type DocumentKind,
  type Mapping,
  type Scalar,
  type Sequence,
} from "./document/document.js";
export {
  comparePaths,
  formatPath,
  isPathPrefix,
  parentPath,
  parsePath,
  type Path,
  type PathStep,
} from "./path/path.js";
export * from "./diff/types.js";
export { computeDiff, type ComputeDiffOptions } from "./diff/engine.js";
export {
  CATEGORIES,
  NOT_PRESENT,
  decodeDiff,
  encodeDiff,
  type DecodeWarning,
  type DecodedDiff,
  type DiffExport,
} from "./diff/interchange.js";
export {
  applyDiff,
  applyDiffExport,
  type ApplyDiffOptions,
  type ExportPatchResult,
  type PatchResult,
  type PatchWarning,
  type PatchWarningCode,
} from "./patch/engine.js";
export { resolvePath } from "./patch/working-copy.js";
export { PathFilter, exclusionListSchema, type PathFilterOptions } from "./exclusion/filter.js";
export { formatDiffReport } from "./report/text.js";
export {
  readDiffExport,
  readDocument,
  readExclusionList,
  readJsonFile,
  writeDiffExport,
  writeDocument,
} from "./io/json-file.js";
export { loadConfig, type AppConfig } from "./config/config.js";
export * from "./internal/errors.js";
export { logger, createChildLogger, type Logger } from "./observability/logger.js";
