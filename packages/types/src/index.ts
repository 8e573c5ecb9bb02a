// ── Settings types ──

/** Grafana Cloud OTLP gateway credentials and region */
export interface CloudSettings {
  /** Grafana Cloud instance id. 0 means not configured. */
  instanceId: number;
  apiKey: string;
  /** Gateway zone, e.g. "prod-eu-west-0" */
  zone: string;
}

/** Self-hosted collector settings, used when no cloud credentials are set */
export interface OnPremSettings {
  endpoint: string;
  /** "grpc", "http/protobuf" or "http/json". Blank means grpc. */
  protocol: string;
}

export interface GrafanaOtlpSettings {
  cloud: CloudSettings;
  onPrem: OnPremSettings;
  /** Also write all signals to the console */
  debugLogging: boolean;
  /** Resource attributes added to every signal */
  globalAttributes: Record<string, string>;
  applicationName?: string;
  disabled: boolean;
}

export interface SettingsOverrides {
  cloud?: Partial<CloudSettings>;
  onPrem?: Partial<OnPremSettings>;
  debugLogging?: boolean;
  globalAttributes?: Record<string, string>;
  applicationName?: string;
  disabled?: boolean;
}

/** Inputs to resource attribute resolution that do not come from settings */
export interface ResourceContext {
  applicationName?: string;
  /** `name` from the host application's package.json */
  manifestName?: string;
  /** `version` from the host application's package.json */
  manifestVersion?: string;
  /** HOSTNAME environment variable */
  hostname?: string;
  /** HOST environment variable */
  host?: string;
}

// ── Resolution types ──

/** A resolved value together with the warnings produced while resolving it */
export interface Resolved<T> {
  value: T;
  warnings: string[];
}

export type ResourceAttributes = Record<string, string>;

/** OpenTelemetry SDK configuration keyed by `otel.*` property names */
export type ConfigProperties = Record<string, string>;

// ── Constants ──

export const OTLP_HEADERS = "otel.exporter.otlp.headers";
export const OTLP_ENDPOINT = "otel.exporter.otlp.endpoint";
export const OTLP_PROTOCOL = "otel.exporter.otlp.protocol";
export const RESOURCE_ATTRIBUTES = "otel.resource.attributes";
export const TRACES_EXPORTER = "otel.traces.exporter";
export const METRICS_EXPORTER = "otel.metrics.exporter";
export const LOGS_EXPORTER = "otel.logs.exporter";

export const CLOUD_PROTOCOL = "http/protobuf";
export const DEFAULT_PROTOCOL = "grpc";

export * from "./errors.js";
