import { describe, expect, test } from "vitest";
import type { ConfigResolution } from "../src/config.js";
import {
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "../src/config.js";

function expectValidationFailure(
  callback: () => unknown
): ConfigValidationError {
  try {
    callback();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected ConfigValidationError");
}

const initial: ConfigResolution = {
  value: defaultConfig,
  sources: defaultSources,
};

describe("config decoding", () => {
  test("decodeConfigInput reports validation failures", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInput("env", {
        renderer: { format: "markdown" },
      })
    );
    expect(error.source).toBe("env");
    expect(error.message).toContain("format");
  });

  test("decodeConfigInputJson reports validation failures", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInputJson(
        "project",
        JSON.stringify({
          renderer: { layout: "stacked" },
        })
      )
    );
    expect(error.source).toBe("project");
    expect(error.message).toContain("layout");
  });

  test("rejects unknown keys and malformed JSON", () => {
    expect(
      expectValidationFailure(() =>
        decodeConfigInput("user", { alignment: { cells: 5 } })
      ).source
    ).toBe("user");
    expect(
      expectValidationFailure(() => decodeConfigInputJson("project", "{"))
        .source
    ).toBe("project");
  });

  test("rejects negative and fractional counts", () => {
    expectValidationFailure(() =>
      decodeConfigInput("env", { alignment: { maxCells: -1 } })
    );
    expectValidationFailure(() =>
      decodeConfigInput("env", { renderer: { tabSize: 2.5 } })
    );
    expectValidationFailure(() =>
      decodeConfigInput("env", { renderer: { width: 0 } })
    );
  });

  test("accepts a partial document", () => {
    expect(
      decodeConfigInputJson("project", '{"renderer":{"context":3}}')
    ).toEqual({ renderer: { context: 3 } });
  });
});

describe("mergeConfig", () => {
  test("tracks sources per field across layered overrides", () => {
    const withProject = mergeConfig(
      initial,
      decodeConfigInput("project", {
        renderer: { layout: "side-by-side", context: 2 },
        alignment: { maxCells: 400 },
        telemetry: {
          enabled: true,
          endpoint: "https://collector.example.com",
        },
      }),
      "project"
    );

    const merged = mergeConfig(
      withProject,
      decodeConfigInput("env", {
        renderer: { format: "json", context: 5 },
      }),
      "env"
    );

    expect(merged.sources.renderer).toEqual({
      format: "env",
      layout: "project",
      context: "env",
      width: "default",
      tabSize: "default",
    });
    expect(merged.sources.alignment.maxCells).toBe("project");
    expect(merged.sources.telemetry).toEqual({
      enabled: "project",
      exporter: "default",
      endpoint: "project",
    });

    expect(merged.value).toEqual({
      renderer: {
        format: "json",
        layout: "side-by-side",
        context: 5,
        tabSize: 4,
      },
      alignment: { maxCells: 400 },
      telemetry: {
        enabled: true,
        exporter: "console",
        endpoint: "https://collector.example.com",
      },
    });
  });

  test("leaves the previous resolution untouched", () => {
    mergeConfig(initial, { renderer: { format: "plain" } }, "user");
    expect(defaultConfig.renderer.format).toBe("ansi");
    expect(defaultSources.renderer.format).toBe("default");
  });
});
