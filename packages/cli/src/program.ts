import { readFileSync } from "node:fs";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import {
  buildDiffDocument,
  type Config,
  ConfigSchema,
  type DiffDocument,
  type ExplainDocument,
  explainDiff,
  isBinaryText,
  type RendererFormat,
  type RendererLayout,
  renderJson,
  Telemetry,
  TelemetryLive,
} from "@lineweave/core";
import { renderTerminal } from "@lineweave/render-terminal";
import { Effect, Schema } from "effect";

export class InputReadError extends Schema.TaggedError<InputReadError>()(
  "InputReadError",
  {
    path: Schema.String,
    reason: Schema.String,
  }
) {}

export const STDIN_PATH = "-";
export const NULL_DEVICE = "/dev/null";
export const BINARY_NOTICE = "Binary file detected; diff skipped.";

function describePlatformError(error: PlatformError) {
  if (error._tag === "SystemError") {
    return error.description ?? error.reason;
  }
  return error.message;
}

export type InputReader = (
  path: string
) => Effect.Effect<string, InputReadError, FileSystem.FileSystem>;

/** Reads a file, or stdin for `-`. */
export const readInput: InputReader = (path) => {
  if (path === STDIN_PATH) {
    return Effect.try({
      try: () => readFileSync(0, "utf8"),
      catch: (error) =>
        new InputReadError({
          path,
          reason: error instanceof Error ? error.message : String(error),
        }),
    });
  }
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  }).pipe(
    Effect.mapError(
      (error) =>
        new InputReadError({ path, reason: describePlatformError(error) })
    )
  );
};

/** Like `readInput`, with Git's `/dev/null` standing for an absent side. */
export const readRevision: InputReader = (path) =>
  path === NULL_DEVICE ? Effect.succeed("") : readInput(path);

export interface DiffSettings {
  format: RendererFormat;
  layout: RendererLayout;
  context?: number;
  width: number;
  tabSize: number;
  maxCells: number;
}

export interface DiffFlags {
  format?: RendererFormat;
  layout?: RendererLayout;
  sideBySide?: boolean;
  noColor?: boolean;
  context?: number;
  width?: number;
}

/** Command-line flags win over the resolved configuration. */
export function diffSettings(
  config: Config,
  flags: DiffFlags,
  terminalWidth?: number
): DiffSettings {
  let format = flags.format ?? config.renderer.format;
  if (flags.noColor && format === "ansi") {
    format = "plain";
  }
  const context = flags.context ?? config.renderer.context;
  return {
    format,
    layout: flags.sideBySide
      ? "side-by-side"
      : (flags.layout ?? config.renderer.layout),
    ...(context !== undefined ? { context } : {}),
    width: flags.width ?? config.renderer.width ?? terminalWidth ?? 120,
    tabSize: config.renderer.tabSize,
    maxCells: config.alignment.maxCells,
  };
}

export function telemetryLayer(config: Config) {
  return TelemetryLive({
    enabled: config.telemetry.enabled,
    exporter: config.telemetry.exporter,
    ...(config.telemetry.endpoint
      ? { endpoint: config.telemetry.endpoint }
      : {}),
  });
}

function documentStats(document: DiffDocument) {
  let replaceBlocks = 0;
  let alignedPairs = 0;
  for (const block of document.blocks) {
    if (block.type !== "replace") {
      continue;
    }
    replaceBlocks += 1;
    if (block.aligned) {
      alignedPairs += block.rows.filter((row) => row.type === "pair").length;
    }
  }
  return { replaceBlocks, alignedPairs };
}

export function renderDocument(
  document: DiffDocument,
  settings: DiffSettings
) {
  if (settings.format === "json") {
    return renderJson(document);
  }
  return renderTerminal(document, {
    format: settings.format,
    layout: settings.layout,
    width: settings.width,
    tabSize: settings.tabSize,
  });
}

/** Diffs two texts and renders the result; binary input is not diffed. */
export function runDiffEffect(params: {
  oldText: string;
  newText: string;
  settings: DiffSettings;
  telemetryContext?: Record<string, unknown>;
}) {
  return Effect.gen(function* () {
    if (isBinaryText(params.oldText) || isBinaryText(params.newText)) {
      return BINARY_NOTICE;
    }
    const telemetry = yield* Telemetry;
    const { settings } = params;
    const document = yield* telemetry.span(
      "diff",
      {
        oldSize: params.oldText.length,
        newSize: params.newText.length,
        ...params.telemetryContext,
      },
      Effect.sync(() =>
        buildDiffDocument(params.oldText, params.newText, {
          maxAlignmentCells: settings.maxCells,
          ...(settings.context !== undefined
            ? { context: settings.context }
            : {}),
        })
      )
    );
    const stats = documentStats(document);
    yield* telemetry.metric(
      "lineweave.diff.replace_blocks",
      stats.replaceBlocks,
      { ...params.telemetryContext }
    );
    yield* telemetry.metric("lineweave.align.pairs", stats.alignedPairs, {
      ...params.telemetryContext,
    });
    yield* telemetry.log("diff_complete", {
      blockCount: document.blocks.length,
      oldLineCount: document.oldLineCount,
      newLineCount: document.newLineCount,
      ...stats,
      ...params.telemetryContext,
    });
    return yield* telemetry.span(
      "render",
      {
        format: settings.format,
        layout: settings.layout,
        ...params.telemetryContext,
      },
      Effect.sync(() => renderDocument(document, settings))
    );
  });
}

/** Reads both sides inside `read` spans, then diffs them. */
export function diffFiles(params: {
  oldPath: string;
  newPath: string;
  settings: DiffSettings;
  read?: InputReader;
  telemetryContext?: Record<string, unknown>;
}) {
  const read = params.read ?? readInput;
  return Effect.gen(function* () {
    const telemetry = yield* Telemetry;
    const oldText = yield* telemetry.span(
      "read",
      { side: "old", path: params.oldPath, ...params.telemetryContext },
      read(params.oldPath)
    );
    const newText = yield* telemetry.span(
      "read",
      { side: "new", path: params.newPath, ...params.telemetryContext },
      read(params.newPath)
    );
    return yield* runDiffEffect({
      oldText,
      newText,
      settings: params.settings,
      ...(params.telemetryContext
        ? { telemetryContext: params.telemetryContext }
        : {}),
    });
  });
}

export function gitDiffHeader(path: string) {
  return `diff --git a/${path} b/${path}`;
}

const ExplainPairSchema = Schema.Struct({
  kind: Schema.Literal("substitute", "delete", "insert"),
  before: Schema.optional(Schema.String),
  after: Schema.optional(Schema.String),
  cost: Schema.optional(Schema.Number),
  distance: Schema.optional(Schema.Number),
});
const ExplainBlockSchema = Schema.Struct({
  oldStart: Schema.Number,
  newStart: Schema.Number,
  oldLines: Schema.Number,
  newLines: Schema.Number,
  aligned: Schema.Boolean,
  cost: Schema.optional(Schema.Number),
  baselineCost: Schema.optional(Schema.Number),
  pairs: Schema.Array(ExplainPairSchema),
});
export const ExplainDocumentSchema = Schema.Struct({
  version: Schema.Literal("0.1.0"),
  blocks: Schema.Array(ExplainBlockSchema),
});
const ExplainDocumentJson = Schema.parseJson(ExplainDocumentSchema, {
  space: 2,
});

export function explainJson(
  oldText: string,
  newText: string,
  options: { verbose: boolean; maxCells: number }
) {
  const explanation: ExplainDocument = explainDiff(oldText, newText, {
    verbose: options.verbose,
    maxAlignmentCells: options.maxCells,
  });
  return Schema.encode(ExplainDocumentJson)(explanation).pipe(Effect.orDie);
}

const ConfigSourceSchema = Schema.Literal("default", "project", "user", "env");
const ConfigSourcesSchema = Schema.Struct({
  renderer: Schema.Struct({
    format: ConfigSourceSchema,
    layout: ConfigSourceSchema,
    context: ConfigSourceSchema,
    width: ConfigSourceSchema,
    tabSize: ConfigSourceSchema,
  }),
  alignment: Schema.Struct({
    maxCells: ConfigSourceSchema,
  }),
  telemetry: Schema.Struct({
    enabled: ConfigSourceSchema,
    exporter: ConfigSourceSchema,
    endpoint: ConfigSourceSchema,
  }),
});
export const ResolvedConfigOutputSchema = Schema.Struct({
  value: ConfigSchema,
  sources: ConfigSourcesSchema,
  paths: Schema.Struct({
    project: Schema.String,
    user: Schema.String,
  }),
});
export const ResolvedConfigOutputJson = Schema.parseJson(
  ResolvedConfigOutputSchema,
  { space: 2 }
);
