import { describe, expect, test } from "vitest";
import {
  ConfigError,
  ExporterConfigError,
  TaggedError,
  TelemetryInitError,
  isGrafanaOtlpError,
  isTaggedError,
  wrapUnknownError,
} from "../src/index.js";

describe("tagged errors", () => {
  test("error classes expose _tag and extend Error", () => {
    const err = new ConfigError("invalid configuration");
    expect(err).toBeInstanceOf(Error);
    expect(err._tag).toBe("ConfigError");
    expect(err.name).toBe("ConfigError");
    expect(isTaggedError(err)).toBe(true);
  });

  test("ConfigError records the offending variables", () => {
    const err = new ConfigError("bad env", {
      variables: ["GRAFANA_OTLP_CLOUD_INSTANCEID"],
    });
    expect(err.variables).toEqual(["GRAFANA_OTLP_CLOUD_INSTANCEID"]);
    expect(new ConfigError("no vars").variables).toEqual([]);
  });

  test("ExporterConfigError keeps property and value", () => {
    const err = new ExporterConfigError("unsupported protocol", {
      property: "otel.exporter.otlp.protocol",
      value: "udp",
    });
    expect(err._tag).toBe("ExporterConfigError");
    expect(err.property).toBe("otel.exporter.otlp.protocol");
    expect(err.value).toBe("udp");
  });

  test("wrapUnknownError preserves tagged errors", () => {
    const tagged = new ConfigError("already tagged");
    const wrapped = wrapUnknownError(
      tagged,
      (message, cause) => new TelemetryInitError(message, { cause }),
    );
    expect(wrapped).toBe(tagged);
    expect(wrapped._tag).toBe("ConfigError");
  });

  test("wrapUnknownError wraps native errors", () => {
    const native = new Error("native failure");
    const wrapped = wrapUnknownError(
      native,
      (message, cause) => new TelemetryInitError(message, { cause }),
    );
    expect(wrapped._tag).toBe("TelemetryInitError");
    expect(wrapped.message).toBe("native failure");
    expect(wrapped.cause).toBe(native);
  });

  test("wrapUnknownError stringifies non-errors", () => {
    const wrapped = wrapUnknownError(
      "boom",
      (message) => new TelemetryInitError(message),
    );
    expect(wrapped.message).toBe("boom");
  });

  test("isGrafanaOtlpError returns true for known errors", () => {
    const error: unknown = new ExporterConfigError("bad exporter");
    expect(isGrafanaOtlpError(error)).toBe(true);
    if (isGrafanaOtlpError(error)) {
      expect(error._tag).toBe("ExporterConfigError");
    }
  });

  test("isGrafanaOtlpError rejects other tagged errors", () => {
    class OtherError extends TaggedError<"OtherError"> {
      constructor() {
        super("OtherError", "other");
      }
    }

    const other = new OtherError();
    expect(isTaggedError(other)).toBe(true);
    expect(isGrafanaOtlpError(other)).toBe(false);
    expect(isGrafanaOtlpError(new Error("plain"))).toBe(false);
  });
});
