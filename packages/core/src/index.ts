export type {
  AlignedPair,
  AlignOptions,
  DeletePair,
  InsertPair,
  LineAlignment,
  SubstitutePair,
} from "./align.js";
export { alignLines, solveAlignment } from "./align.js";
export type { LineCostModel } from "./align-cost.js";
export {
  defaultLineCostModel,
  gapCost,
  substitutionCost,
  tokenSubstitutionCost,
} from "./align-cost.js";
export type { LatticeNode, MoveKind } from "./align-lattice.js";
export { AlignmentLattice } from "./align-lattice.js";
export type { SolvedLattice } from "./align-solver.js";
export { ORIGIN, solveLattice, walkPath } from "./align-solver.js";
export type {
  Config,
  ConfigInput,
  ConfigResolution,
  ConfigSource,
  ConfigSources,
  RendererFormat,
  RendererLayout,
  TelemetryExporter,
} from "./config.js";
export {
  ConfigInputSchema,
  ConfigSchema,
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";
export type { DiffDocumentOptions } from "./diff-document.js";
export {
  buildDiffDocument,
  buildReplaceBlock,
  charSegments,
  DEFAULT_MAX_ALIGNMENT_CELLS,
} from "./diff-document.js";
export type {
  CharSegment,
  DiffBlock,
  DiffDocument,
  ReplaceRow,
} from "./diff-schema.js";
export { DiffDocumentSchema } from "./diff-schema.js";
export { EmptyReplaceBlockError } from "./errors.js";
export type {
  ExplainBlock,
  ExplainDocument,
  ExplainOptions,
  ExplainPair,
} from "./explain.js";
export { explainDiff } from "./explain.js";
export { isBinaryText, splitLines } from "./lines.js";
export { renderJson } from "./render-json.js";
export type { EditTokenKind, Opcode, OpcodeTag } from "./sequence-matcher.js";
export {
  editTokens,
  matchChars,
  matchSequences,
  toChars,
} from "./sequence-matcher.js";
export type {
  TelemetryAttributes,
  TelemetryOptions,
  TelemetryService,
} from "./telemetry.js";
export { Telemetry, TelemetryLive } from "./telemetry.js";
