import { NodeSDK, logs, metrics, resources, tracing } from "@opentelemetry/sdk-node";
import type { NodeSDKConfiguration } from "@opentelemetry/sdk-node";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { OTLPTraceExporter as OTLPGrpcTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { OTLPTraceExporter as OTLPHttpTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPTraceExporter as OTLPProtoTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { OTLPMetricExporter as OTLPGrpcMetricExporter } from "@opentelemetry/exporter-metrics-otlp-grpc";
import { OTLPMetricExporter as OTLPHttpMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPMetricExporter as OTLPProtoMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto";
import { OTLPLogExporter as OTLPGrpcLogExporter } from "@opentelemetry/exporter-logs-otlp-grpc";
import { OTLPLogExporter as OTLPHttpLogExporter } from "@opentelemetry/exporter-logs-otlp-http";
import { OTLPLogExporter as OTLPProtoLogExporter } from "@opentelemetry/exporter-logs-otlp-proto";
import type { ConfigProperties } from "@grafana-otlp/types";
import {
  DEFAULT_PROTOCOL,
  ExporterConfigError,
  LOGS_EXPORTER,
  METRICS_EXPORTER,
  OTLP_ENDPOINT,
  OTLP_HEADERS,
  OTLP_PROTOCOL,
  RESOURCE_ATTRIBUTES,
  TRACES_EXPORTER,
} from "@grafana-otlp/types";
import { parseKeyValueList } from "./config.js";
import { FanOutMetricExporter } from "./fan-out-exporter.js";

export type Signal = "traces" | "metrics" | "logs";

export type OtlpProtocol = "grpc" | "http/protobuf" | "http/json";

const OTLP_PROTOCOLS: readonly OtlpProtocol[] = [
  "grpc",
  "http/protobuf",
  "http/json",
];

/** `logging` is accepted as an alias of `console` */
export type ExporterName = "otlp" | "console";

export interface OtlpExporterOptions {
  protocol: OtlpProtocol;
  /** Base endpoint; exporter defaults apply when unset */
  endpoint?: string;
  /** Only sent over HTTP */
  headers: Record<string, string>;
}

export interface SdkOptions {
  /** Defaults to HTTP instrumentation */
  instrumentations?: NodeSDKConfiguration["instrumentations"];
}

/** The part of NodeSDK that initTelemetry drives */
export interface TelemetrySdk {
  start(): void;
  shutdown(): Promise<void>;
}

function readProperty(
  properties: Readonly<ConfigProperties>,
  key: string,
): string | undefined {
  return Object.hasOwn(properties, key) ? properties[key] : undefined;
}

function isOtlpProtocol(value: string): value is OtlpProtocol {
  return OTLP_PROTOCOLS.some((protocol) => protocol === value);
}

/** OTLP/HTTP exporters post to `<endpoint>/v1/<signal>`; gRPC takes the endpoint as is */
export function signalUrl(
  endpoint: string | undefined,
  protocol: OtlpProtocol,
  signal: Signal,
): string | undefined {
  if (endpoint === undefined) {
    return undefined;
  }
  if (protocol === "grpc") {
    return endpoint;
  }
  return `${endpoint.replace(/\/+$/, "")}/v1/${signal}`;
}

export function readExporterOptions(
  properties: Readonly<ConfigProperties>,
): OtlpExporterOptions {
  const protocol = readProperty(properties, OTLP_PROTOCOL) ?? DEFAULT_PROTOCOL;
  if (!isOtlpProtocol(protocol)) {
    throw new ExporterConfigError(`unsupported OTLP protocol "${protocol}"`, {
      property: OTLP_PROTOCOL,
      value: protocol,
    });
  }

  return {
    protocol,
    endpoint: readProperty(properties, OTLP_ENDPOINT),
    headers: parseKeyValueList(readProperty(properties, OTLP_HEADERS) ?? ""),
  };
}

function decodeAttributeText(text: string, entry: string): string {
  try {
    return decodeURIComponent(text);
  } catch (error) {
    throw new ExporterConfigError(
      `invalid percent-encoding in ${RESOURCE_ATTRIBUTES} entry "${entry}"`,
      { property: RESOURCE_ATTRIBUTES, value: entry, cause: error },
    );
  }
}

/**
 * Parse `otel.resource.attributes`. Keys and values are percent-decoded;
 * an entry without a key or `=` is rejected.
 *
 * @throws ExporterConfigError for a malformed entry
 */
export function parseResourceAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const entry of raw.split(",")) {
    if (entry.trim().length === 0) continue;
    const separator = entry.indexOf("=");
    const key = separator === -1 ? "" : entry.slice(0, separator).trim();
    if (key.length === 0) {
      throw new ExporterConfigError(
        `invalid ${RESOURCE_ATTRIBUTES} entry "${entry}", expected key=value`,
        { property: RESOURCE_ATTRIBUTES, value: entry },
      );
    }
    attributes[decodeAttributeText(key, entry)] = decodeAttributeText(
      entry.slice(separator + 1).trim(),
      entry,
    );
  }
  return attributes;
}

/**
 * Parse one of the `otel.*.exporter` lists. An unset list means OTLP,
 * `none` turns the signal off.
 */
export function parseExporterList(
  properties: Readonly<ConfigProperties>,
  key: string,
): ExporterName[] {
  const raw = readProperty(properties, key);
  if (raw === undefined) {
    return ["otlp"];
  }

  const names = new Set<ExporterName>();
  for (const entry of raw.split(",")) {
    const name = entry.trim().toLowerCase();
    switch (name) {
      case "":
        break;
      case "none":
        return [];
      case "otlp":
        names.add("otlp");
        break;
      case "logging":
      case "console":
        names.add("console");
        break;
      default:
        throw new ExporterConfigError(`unsupported exporter "${name}" in ${key}`, {
          property: key,
          value: name,
        });
    }
  }
  return [...names];
}

export function createSpanExporter(
  options: OtlpExporterOptions,
): tracing.SpanExporter {
  const url = signalUrl(options.endpoint, options.protocol, "traces");
  switch (options.protocol) {
    case "grpc":
      return new OTLPGrpcTraceExporter({ url });
    case "http/protobuf":
      return new OTLPProtoTraceExporter({ url, headers: options.headers });
    case "http/json":
      return new OTLPHttpTraceExporter({ url, headers: options.headers });
  }
}

export function createMetricExporter(
  options: OtlpExporterOptions,
): metrics.PushMetricExporter {
  const url = signalUrl(options.endpoint, options.protocol, "metrics");
  switch (options.protocol) {
    case "grpc":
      return new OTLPGrpcMetricExporter({ url });
    case "http/protobuf":
      return new OTLPProtoMetricExporter({ url, headers: options.headers });
    case "http/json":
      return new OTLPHttpMetricExporter({ url, headers: options.headers });
  }
}

export function createLogRecordExporter(
  options: OtlpExporterOptions,
): logs.LogRecordExporter {
  const url = signalUrl(options.endpoint, options.protocol, "logs");
  switch (options.protocol) {
    case "grpc":
      return new OTLPGrpcLogExporter({ url });
    case "http/protobuf":
      return new OTLPProtoLogExporter({ url, headers: options.headers });
    case "http/json":
      return new OTLPHttpLogExporter({ url, headers: options.headers });
  }
}

function createSpanProcessors(
  names: ExporterName[],
  options: OtlpExporterOptions,
): tracing.SpanProcessor[] {
  return names.map((name) =>
    name === "console"
      ? new tracing.SimpleSpanProcessor(new tracing.ConsoleSpanExporter())
      : new tracing.BatchSpanProcessor(createSpanExporter(options)),
  );
}

function createMetricReader(
  names: ExporterName[],
  options: OtlpExporterOptions,
): metrics.MetricReader | undefined {
  const exporters: metrics.PushMetricExporter[] = names.map((name) =>
    name === "console"
      ? new metrics.ConsoleMetricExporter()
      : createMetricExporter(options),
  );
  const [first, ...rest] = exporters;
  if (!first) {
    return undefined;
  }

  return new metrics.PeriodicExportingMetricReader({
    exporter: rest.length === 0 ? first : new FanOutMetricExporter(exporters),
  });
}

function createLogRecordProcessors(
  names: ExporterName[],
  options: OtlpExporterOptions,
): logs.LogRecordProcessor[] {
  return names.map((name) =>
    name === "console"
      ? new logs.SimpleLogRecordProcessor(new logs.ConsoleLogRecordExporter())
      : new logs.BatchLogRecordProcessor(createLogRecordExporter(options)),
  );
}

/**
 * Translate `otel.*` properties into a NodeSDK configuration.
 *
 * @throws ExporterConfigError for an unsupported protocol or exporter name
 */
export function createSdkConfiguration(
  properties: Readonly<ConfigProperties>,
  options: SdkOptions = {},
): Partial<NodeSDKConfiguration> {
  const exporterOptions = readExporterOptions(properties);
  const traceExporters = parseExporterList(properties, TRACES_EXPORTER);
  const metricExporters = parseExporterList(properties, METRICS_EXPORTER);
  const logExporters = parseExporterList(properties, LOGS_EXPORTER);

  return {
    autoDetectResources: false,
    resource: new resources.Resource(
      parseResourceAttributes(readProperty(properties, RESOURCE_ATTRIBUTES) ?? ""),
    ),
    spanProcessors: createSpanProcessors(traceExporters, exporterOptions),
    metricReader: createMetricReader(metricExporters, exporterOptions),
    logRecordProcessors: createLogRecordProcessors(
      logExporters,
      exporterOptions,
    ),
    instrumentations: options.instrumentations ?? [new HttpInstrumentation()],
  };
}

/** Build an unstarted NodeSDK from `otel.*` properties */
export function createSdk(
  properties: Readonly<ConfigProperties>,
  options: SdkOptions = {},
): NodeSDK {
  return new NodeSDK(createSdkConfiguration(properties, options));
}
