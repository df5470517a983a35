#!/usr/bin/env -S node --import tsx
import { Args, Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { type ConfigValidationError, isBinaryText } from "@lineweave/core";
import { Console, Effect, Option, Schema } from "effect";
import { normalizeArgv } from "./argv.js";
import { resolveConfig } from "./config/resolve.js";
import {
  BINARY_NOTICE,
  diffFiles,
  diffSettings,
  explainJson,
  gitDiffHeader,
  type InputReadError,
  readInput,
  readRevision,
  ResolvedConfigOutputJson,
  telemetryLayer,
} from "./program.js";

const formatOption = Options.choice("format", [
  "ansi",
  "plain",
  "json",
] as const).pipe(
  Options.optional,
  Options.withDescription("Output format (default from config: ansi).")
);
const layoutOption = Options.choice("layout", [
  "unified",
  "side-by-side",
] as const).pipe(
  Options.optional,
  Options.withDescription("Diff layout (default from config: unified).")
);
const sideBySideOption = Options.boolean("side-by-side").pipe(
  Options.withAlias("s"),
  Options.withDescription("Shorthand for --layout side-by-side.")
);
const noColorOption = Options.boolean("no-color").pipe(
  Options.withDescription("Print plain text instead of ANSI colours.")
);
const contextOption = Options.integer("context").pipe(
  Options.optional,
  Options.withDescription("Unchanged lines kept around each change.")
);
const widthOption = Options.integer("width").pipe(
  Options.optional,
  Options.withDescription("Terminal width for the side-by-side layout.")
);
const verboseOption = Options.boolean("verbose").pipe(
  Options.withDescription("Include move costs and path distances.")
);

const exitWith = (message: string) =>
  Console.error(message).pipe(
    Effect.zipRight(
      Effect.sync(() => {
        process.exitCode = 1;
      })
    )
  );

const reportFailures = <A, R>(
  program: Effect.Effect<A, InputReadError | ConfigValidationError, R>
) =>
  program.pipe(
    Effect.catchTags({
      InputReadError: (error) =>
        exitWith(`Could not read ${error.path}: ${error.reason}`),
      ConfigValidationError: (error) =>
        exitWith(`Invalid ${error.source} config: ${error.message}`),
    })
  );

const diffCommand = Command.make(
  "diff",
  {
    oldPath: Args.text({ name: "old" }),
    newPath: Args.text({ name: "new" }),
    format: formatOption,
    layout: layoutOption,
    sideBySide: sideBySideOption,
    noColor: noColorOption,
    context: contextOption,
    width: widthOption,
  },
  ({ oldPath, newPath, format, layout, sideBySide, noColor, context, width }) =>
    Effect.gen(function* () {
      const resolved = yield* resolveConfig;
      const settings = diffSettings(
        resolved.value,
        {
          format: Option.getOrUndefined(format),
          layout: Option.getOrUndefined(layout),
          context: Option.getOrUndefined(context),
          width: Option.getOrUndefined(width),
          sideBySide,
          noColor,
        },
        process.stdout.columns
      );
      const output = yield* diffFiles({
        oldPath,
        newPath,
        settings,
        telemetryContext: { command: "diff" },
      }).pipe(Effect.provide(telemetryLayer(resolved.value)));
      yield* Console.log(output);
    }).pipe(reportFailures)
).pipe(Command.withDescription("Align and print the line diff of two files."));

const gitExternalCommand = Command.make(
  "git-external",
  {
    path: Args.text({ name: "path" }),
    oldFile: Args.text({ name: "oldFile" }),
    oldHex: Args.text({ name: "oldHex" }),
    oldMode: Args.text({ name: "oldMode" }),
    newFile: Args.text({ name: "newFile" }),
    newHex: Args.text({ name: "newHex" }),
    newMode: Args.text({ name: "newMode" }),
  },
  ({ path, oldFile, newFile }) =>
    Effect.gen(function* () {
      const resolved = yield* resolveConfig;
      const settings = diffSettings(resolved.value, {}, process.stdout.columns);
      const output = yield* diffFiles({
        oldPath: oldFile,
        newPath: newFile,
        settings,
        read: readRevision,
        telemetryContext: { command: "git-external", path },
      }).pipe(Effect.provide(telemetryLayer(resolved.value)));
      yield* Console.log(gitDiffHeader(path));
      yield* Console.log(output);
    }).pipe(reportFailures)
).pipe(Command.withDescription("Git external diff adapter (7-arg contract)."));

const explainCommand = Command.make(
  "explain",
  {
    oldPath: Args.text({ name: "old" }),
    newPath: Args.text({ name: "new" }),
    verbose: verboseOption,
  },
  ({ oldPath, newPath, verbose }) =>
    Effect.gen(function* () {
      const resolved = yield* resolveConfig;
      const oldText = yield* readInput(oldPath);
      const newText = yield* readInput(newPath);
      if (isBinaryText(oldText) || isBinaryText(newText)) {
        yield* Console.log(BINARY_NOTICE);
        return;
      }
      const json = yield* explainJson(oldText, newText, {
        verbose,
        maxCells: resolved.value.alignment.maxCells,
      });
      yield* Console.log(json);
    }).pipe(reportFailures)
).pipe(Command.withDescription("Explain how replace blocks were aligned."));

const configCommand = Command.make("config", {}, () =>
  Effect.gen(function* () {
    const resolved = yield* resolveConfig;
    const json = yield* Schema.encode(ResolvedConfigOutputJson)(resolved).pipe(
      Effect.orDie
    );
    yield* Console.log(json);
  }).pipe(reportFailures)
).pipe(Command.withDescription("Print resolved config with provenance."));

const app = Command.make("lineweave", {}, () => Effect.void).pipe(
  Command.withSubcommands([
    diffCommand,
    gitExternalCommand,
    explainCommand,
    configCommand,
  ])
);

const cli = Command.run(app, {
  name: "lineweave",
  version: "0.1.0",
});

cli(normalizeArgv(process.argv)).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain
);
