export abstract class TaggedError<TTag extends string> extends Error {
  readonly _tag: TTag;

  protected constructor(tag: TTag, message: string, options?: ErrorOptions) {
    super(message, options);
    this._tag = tag;
    this.name = tag;
  }
}

export type AnyTaggedError = TaggedError<string>;

export function isTaggedError(error: unknown): error is AnyTaggedError {
  return (
    typeof error === "object" &&
    error !== null &&
    "_tag" in error &&
    typeof (error as { _tag?: unknown })._tag === "string"
  );
}

export function wrapUnknownError<T extends AnyTaggedError>(
  error: unknown,
  factory: (message: string, cause?: unknown) => T,
): AnyTaggedError {
  if (isTaggedError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return factory(error.message, error);
  }
  return factory(String(error));
}

export interface ConfigErrorOptions extends ErrorOptions {
  /** Environment variables that failed validation */
  variables?: string[];
}

export class ConfigError extends TaggedError<"ConfigError"> {
  readonly variables: string[];

  constructor(message: string, options?: ConfigErrorOptions) {
    super("ConfigError", message, options);
    this.variables = options?.variables ?? [];
  }
}

export interface ExporterConfigErrorOptions extends ErrorOptions {
  property?: string;
  value?: string;
}

export class ExporterConfigError extends TaggedError<"ExporterConfigError"> {
  readonly property?: string;
  readonly value?: string;

  constructor(message: string, options?: ExporterConfigErrorOptions) {
    super("ExporterConfigError", message, options);
    this.property = options?.property;
    this.value = options?.value;
  }
}

export class TelemetryInitError extends TaggedError<"TelemetryInitError"> {
  constructor(message: string, options?: ErrorOptions) {
    super("TelemetryInitError", message, options);
  }
}

export type GrafanaOtlpError =
  | ConfigError
  | ExporterConfigError
  | TelemetryInitError;

export type GrafanaOtlpErrorTag = GrafanaOtlpError["_tag"];

const GRAFANA_OTLP_ERROR_TAGS = new Set<GrafanaOtlpErrorTag>([
  "ConfigError",
  "ExporterConfigError",
  "TelemetryInitError",
]);

export function isGrafanaOtlpError(error: unknown): error is GrafanaOtlpError {
  return (
    isTaggedError(error) &&
    GRAFANA_OTLP_ERROR_TAGS.has(error._tag as GrafanaOtlpErrorTag)
  );
}
