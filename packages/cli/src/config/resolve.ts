import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  type ConfigResolution,
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "@lineweave/core";
import { Effect } from "effect";

const truthyValues = new Set(["1", "true", "yes", "on"]);
const falsyValues = new Set(["0", "false", "no", "off"]);

export type ConfigEnv = Record<string, string | undefined>;

function parseBooleanEnv(
  value: string | undefined,
  key: string
): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) {
    return true;
  }
  if (falsyValues.has(normalized)) {
    return false;
  }
  throw new ConfigValidationError({
    source: "env",
    message: `Invalid boolean for ${key}: ${value}`,
  });
}

function parseTextEnv(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : undefined;
}

// Range checks are left to the config schema.
function parseCountEnv(value: string | undefined): number | undefined {
  const trimmed = parseTextEnv(value);
  return trimmed === undefined ? undefined : Number(trimmed);
}

function parseEndpointEnv(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function stripUndefined(input: Record<string, unknown>) {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      output[key] = value;
    }
  }
  return output;
}

function readConfigFile(path: string, source: "project" | "user") {
  if (!existsSync(path)) {
    return null;
  }
  return decodeConfigInputJson(source, readFileSync(path, "utf8"));
}

export function readEnvConfig(env: ConfigEnv) {
  const renderer = stripUndefined({
    format: parseTextEnv(env.LINEWEAVE_RENDERER_FORMAT),
    layout: parseTextEnv(env.LINEWEAVE_RENDERER_LAYOUT),
    context: parseCountEnv(env.LINEWEAVE_RENDERER_CONTEXT),
    width: parseCountEnv(env.LINEWEAVE_RENDERER_WIDTH),
    tabSize: parseCountEnv(env.LINEWEAVE_RENDERER_TAB_SIZE),
  });
  const alignment = stripUndefined({
    maxCells: parseCountEnv(env.LINEWEAVE_ALIGNMENT_MAX_CELLS),
  });
  const telemetry = stripUndefined({
    enabled: parseBooleanEnv(
      env.LINEWEAVE_TELEMETRY_ENABLED,
      "LINEWEAVE_TELEMETRY_ENABLED"
    ),
    exporter: parseTextEnv(env.LINEWEAVE_TELEMETRY_EXPORTER),
    endpoint: parseEndpointEnv(env.LINEWEAVE_TELEMETRY_ENDPOINT),
  });

  const raw: Record<string, unknown> = {};
  if (Object.keys(renderer).length > 0) {
    raw.renderer = renderer;
  }
  if (Object.keys(alignment).length > 0) {
    raw.alignment = alignment;
  }
  if (Object.keys(telemetry).length > 0) {
    raw.telemetry = telemetry;
  }
  return decodeConfigInput("env", raw);
}

export interface ResolvedConfigOutput extends ConfigResolution {
  paths: {
    project: string;
    user: string;
  };
}

export interface ConfigLocation {
  cwd: string;
  home: string;
  env: ConfigEnv;
}

/**
 * Layers defaults, the project file, the user file and the environment, in
 * that order. `NO_COLOR` turns ANSI output into plain text.
 */
export function resolveConfigFrom(
  location: ConfigLocation
): ResolvedConfigOutput {
  const projectPath = join(location.cwd, "lineweave.config.json");
  const userPath = join(location.home, ".config", "lineweave", "config.json");

  let resolution: ConfigResolution = {
    value: defaultConfig,
    sources: defaultSources,
  };

  const projectConfig = readConfigFile(projectPath, "project");
  if (projectConfig) {
    resolution = mergeConfig(resolution, projectConfig, "project");
  }

  const userConfig = readConfigFile(userPath, "user");
  if (userConfig) {
    resolution = mergeConfig(resolution, userConfig, "user");
  }

  resolution = mergeConfig(resolution, readEnvConfig(location.env), "env");

  const noColor = location.env.NO_COLOR;
  if (
    noColor !== undefined &&
    noColor !== "" &&
    resolution.value.renderer.format === "ansi"
  ) {
    resolution = mergeConfig(
      resolution,
      { renderer: { format: "plain" } },
      "env"
    );
  }

  return {
    ...resolution,
    paths: {
      project: projectPath,
      user: userPath,
    },
  };
}

export const resolveConfig = Effect.try({
  try: () =>
    resolveConfigFrom({
      cwd: process.cwd(),
      home: homedir(),
      env: process.env,
    }),
  catch: (error) =>
    error instanceof ConfigValidationError
      ? error
      : new ConfigValidationError({
          source: "config",
          message: error instanceof Error ? error.message : String(error),
        }),
});
