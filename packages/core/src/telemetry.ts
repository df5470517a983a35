import { Effect, Exit, Layer, Schema } from "effect";
import type { TelemetryExporter } from "./config.js";

export type TelemetryAttributes = Record<string, unknown>;

export interface TelemetryService {
  span: <A, E, R>(
    name: string,
    attributes: TelemetryAttributes,
    effect: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>;
  log: (
    message: string,
    attributes?: TelemetryAttributes
  ) => Effect.Effect<void, never>;
  metric: (
    name: string,
    value: number,
    attributes?: TelemetryAttributes
  ) => Effect.Effect<void, never>;
}

const TelemetryNoop: TelemetryService = {
  span: (_name, _attributes, effect) => effect,
  log: () => Effect.void,
  metric: () => Effect.void,
};

export class Telemetry extends Effect.Service<Telemetry>()(
  "@lineweave/Telemetry",
  {
    sync: () => TelemetryNoop,
  }
) {}

export interface TelemetryOptions {
  enabled: boolean;
  exporter: TelemetryExporter;
  endpoint?: string;
  /** Receives each console record; defaults to stderr. */
  write?: (line: string) => void;
}

type OtlpSignal = "traces" | "logs" | "metrics";

type OtlpAttributeValue =
  | { stringValue: string }
  | { boolValue: boolean }
  | { intValue: string }
  | { doubleValue: number };

const SERVICE_NAME = "lineweave";
const JsonUnknown = Schema.parseJson(Schema.Unknown);
const encodeJson = (value: unknown) =>
  Schema.encode(JsonUnknown)(value).pipe(Effect.orDie);

function toAttributeValue(value: unknown): OtlpAttributeValue {
  if (typeof value === "string") {
    return { stringValue: value };
  }
  if (typeof value === "boolean") {
    return { boolValue: value };
  }
  if (typeof value === "number") {
    return Number.isInteger(value)
      ? { intValue: String(value) }
      : { doubleValue: value };
  }
  return { stringValue: JSON.stringify(value) ?? String(value) };
}

export function toOtlpAttributes(attributes: TelemetryAttributes) {
  return Object.entries(attributes)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ({ key, value: toAttributeValue(value) }));
}

export function otlpEndpoint(base: string, signal: OtlpSignal) {
  const trimmed = base.replace(/\/v1\/(traces|logs|metrics)\/?$/, "");
  return `${trimmed.replace(/\/$/, "")}/v1/${signal}`;
}

function resourceEnvelope(signal: OtlpSignal, record: unknown) {
  const resource = {
    attributes: [
      { key: "service.name", value: { stringValue: SERVICE_NAME } },
    ],
  };
  const scope = { name: SERVICE_NAME };
  switch (signal) {
    case "traces":
      return {
        resourceSpans: [{ resource, scopeSpans: [{ scope, spans: [record] }] }],
      };
    case "logs":
      return {
        resourceLogs: [
          { resource, scopeLogs: [{ scope, logRecords: [record] }] },
        ],
      };
    default:
      return {
        resourceMetrics: [
          { resource, scopeMetrics: [{ scope, metrics: [record] }] },
        ],
      };
  }
}

const nowNanos = () => String(Date.now() * 1_000_000);

/**
 * Telemetry that writes JSON lines to stderr (`console`) or posts OTLP/HTTP
 * JSON to `endpoint` (`otlp-http`). Export failures are dropped so they never
 * fail the traced program.
 */
export function TelemetryLive(options: TelemetryOptions) {
  const write = options.write ?? ((line: string) => console.error(line));
  let warned = false;

  const emitConsole = (record: Record<string, unknown>) =>
    encodeJson(record).pipe(Effect.map(write));

  const emitOtlp = (signal: OtlpSignal, record: unknown) => {
    const endpoint = options.endpoint;
    if (!endpoint) {
      if (!warned) {
        warned = true;
        write(
          "Telemetry exporter enabled without endpoint; skipping OTLP export."
        );
      }
      return Effect.void;
    }
    return encodeJson(resourceEnvelope(signal, record)).pipe(
      Effect.flatMap((body) =>
        Effect.tryPromise((signalAbort) =>
          fetch(otlpEndpoint(endpoint, signal), {
            method: "POST",
            headers: { "content-type": "application/json" },
            body,
            signal: signalAbort,
          })
        )
      ),
      Effect.ignore
    );
  };

  return Layer.succeed(
    Telemetry,
    Telemetry.make({
      span: <A, E, R>(
        name: string,
        attributes: TelemetryAttributes,
        effect: Effect.Effect<A, E, R>
      ) => {
        if (!options.enabled) {
          return effect;
        }
        const start = Date.now();
        const startTimeUnixNano = nowNanos();
        const onExit = (exit: Exit.Exit<A, E>) => {
          const status = Exit.isFailure(exit) ? "error" : "ok";
          if (options.exporter === "console") {
            return emitConsole({
              span: name,
              durationMs: Date.now() - start,
              status,
              attributes,
            });
          }
          return emitOtlp("traces", {
            name,
            startTimeUnixNano,
            endTimeUnixNano: nowNanos(),
            attributes: toOtlpAttributes({
              "lineweave.status": status,
              ...attributes,
            }),
          });
        };
        return effect.pipe(Effect.onExit(onExit));
      },
      log: (message: string, attributes: TelemetryAttributes = {}) => {
        if (!options.enabled) {
          return Effect.void;
        }
        if (options.exporter === "console") {
          return emitConsole({
            log: message,
            timestamp: nowNanos(),
            attributes,
          });
        }
        return emitOtlp("logs", {
          timeUnixNano: nowNanos(),
          body: { stringValue: message },
          attributes: toOtlpAttributes(attributes),
        });
      },
      metric: (
        name: string,
        value: number,
        attributes: TelemetryAttributes = {}
      ) => {
        if (!options.enabled) {
          return Effect.void;
        }
        if (options.exporter === "console") {
          return emitConsole({ metric: name, value, attributes });
        }
        return emitOtlp("metrics", {
          name,
          gauge: {
            dataPoints: [
              {
                timeUnixNano: nowNanos(),
                attributes: toOtlpAttributes(attributes),
                asDouble: value,
              },
            ],
          },
        });
      },
    })
  );
}
