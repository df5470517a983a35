import { Schema } from "effect";
import { DEFAULT_MAX_ALIGNMENT_CELLS } from "./diff-document.js";

export class ConfigValidationError extends Schema.TaggedError<ConfigValidationError>()(
  "ConfigValidationError",
  {
    source: Schema.String,
    message: Schema.String,
  }
) {}

const Count = Schema.Number.pipe(Schema.int(), Schema.nonNegative());
const PositiveCount = Schema.Number.pipe(Schema.int(), Schema.positive());

export const RendererFormatSchema = Schema.Literal("ansi", "plain", "json");
export const RendererLayoutSchema = Schema.Literal("unified", "side-by-side");
export const TelemetryExporterSchema = Schema.Literal("console", "otlp-http");

const RendererConfigSchema = Schema.Struct({
  format: RendererFormatSchema,
  layout: RendererLayoutSchema,
  context: Schema.optional(Count),
  width: Schema.optional(PositiveCount),
  tabSize: PositiveCount,
});

const AlignmentConfigSchema = Schema.Struct({
  maxCells: Count,
});

const TelemetryConfigSchema = Schema.Struct({
  enabled: Schema.Boolean,
  exporter: TelemetryExporterSchema,
  endpoint: Schema.optional(Schema.String),
});

export const ConfigSchema = Schema.Struct({
  renderer: RendererConfigSchema,
  alignment: AlignmentConfigSchema,
  telemetry: TelemetryConfigSchema,
});

export const ConfigInputSchema = Schema.Struct({
  renderer: Schema.optional(Schema.partial(RendererConfigSchema)),
  alignment: Schema.optional(Schema.partial(AlignmentConfigSchema)),
  telemetry: Schema.optional(Schema.partial(TelemetryConfigSchema)),
});
const ConfigInputJsonSchema = Schema.parseJson(ConfigInputSchema);

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type ConfigInput = Schema.Schema.Type<typeof ConfigInputSchema>;
export type RendererFormat = Schema.Schema.Type<typeof RendererFormatSchema>;
export type RendererLayout = Schema.Schema.Type<typeof RendererLayoutSchema>;
export type TelemetryExporter = Schema.Schema.Type<
  typeof TelemetryExporterSchema
>;

export type ConfigSource = "default" | "project" | "user" | "env";

export interface ConfigSources {
  renderer: Record<keyof Config["renderer"], ConfigSource>;
  alignment: Record<keyof Config["alignment"], ConfigSource>;
  telemetry: Record<keyof Config["telemetry"], ConfigSource>;
}

export interface ConfigResolution {
  value: Config;
  sources: ConfigSources;
}

type Mutable<T> = { -readonly [K in keyof T]: Mutable<T[K]> };

export const defaultConfig: Config = {
  renderer: {
    format: "ansi",
    layout: "unified",
    tabSize: 4,
  },
  alignment: {
    maxCells: DEFAULT_MAX_ALIGNMENT_CELLS,
  },
  telemetry: {
    enabled: false,
    exporter: "console",
  },
};

export const defaultSources: ConfigSources = {
  renderer: {
    format: "default",
    layout: "default",
    context: "default",
    width: "default",
    tabSize: "default",
  },
  alignment: {
    maxCells: "default",
  },
  telemetry: {
    enabled: "default",
    exporter: "default",
    endpoint: "default",
  },
};

function decodeWith<A>(source: string, decode: () => A): A {
  try {
    return decode();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError({ source, message });
  }
}

export function decodeConfigInput(source: string, input: unknown): ConfigInput {
  return decodeWith(source, () =>
    Schema.decodeUnknownSync(ConfigInputSchema)(input, {
      onExcessProperty: "error",
    })
  );
}

export function decodeConfigInputJson(
  source: string,
  input: string
): ConfigInput {
  return decodeWith(source, () =>
    Schema.decodeUnknownSync(ConfigInputJsonSchema)(input, {
      onExcessProperty: "error",
    })
  );
}

/** Layers `overrides` on top of `current`, recording `source` per field. */
export function mergeConfig(
  current: ConfigResolution,
  overrides: ConfigInput,
  source: ConfigSource
): ConfigResolution {
  const next: Mutable<ConfigResolution> = {
    value: {
      renderer: { ...current.value.renderer },
      alignment: { ...current.value.alignment },
      telemetry: { ...current.value.telemetry },
    },
    sources: {
      renderer: { ...current.sources.renderer },
      alignment: { ...current.sources.alignment },
      telemetry: { ...current.sources.telemetry },
    },
  };

  const applyRenderer = <K extends keyof Config["renderer"]>(
    key: K,
    value: Config["renderer"][K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.renderer[key] = value;
      next.sources.renderer[key] = source;
    }
  };
  const applyTelemetry = <K extends keyof Config["telemetry"]>(
    key: K,
    value: Config["telemetry"][K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.telemetry[key] = value;
      next.sources.telemetry[key] = source;
    }
  };

  if (overrides.renderer) {
    applyRenderer("format", overrides.renderer.format);
    applyRenderer("layout", overrides.renderer.layout);
    applyRenderer("context", overrides.renderer.context);
    applyRenderer("width", overrides.renderer.width);
    applyRenderer("tabSize", overrides.renderer.tabSize);
  }

  if (overrides.alignment?.maxCells !== undefined) {
    next.value.alignment.maxCells = overrides.alignment.maxCells;
    next.sources.alignment.maxCells = source;
  }

  if (overrides.telemetry) {
    applyTelemetry("enabled", overrides.telemetry.enabled);
    applyTelemetry("exporter", overrides.telemetry.exporter);
    applyTelemetry("endpoint", overrides.telemetry.endpoint);
  }

  return next;
}
