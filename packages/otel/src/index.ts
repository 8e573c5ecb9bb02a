export { initTelemetry, shutdownTelemetry, consoleLogger } from "./init.js";
export type { InitTelemetryOptions, TelemetryLogger } from "./init.js";
export {
  resolveConfig,
  readResourceContext,
  parseKeyValueList,
} from "./config.js";
export { readManifest } from "./manifest.js";
export type { Manifest } from "./manifest.js";
export {
  assembleConfigProperties,
  isNotBlank,
  maskAuthHeader,
  resolveBasicAuthHeader,
  resolveEndpoint,
  resolveProtocol,
  resolveResourceAttributes,
  serializeResourceAttributes,
} from "./resolver.js";
export {
  createSdk,
  createSdkConfiguration,
  parseExporterList,
  parseResourceAttributes,
  readExporterOptions,
  signalUrl,
} from "./sdk.js";
export type {
  ExporterName,
  OtlpExporterOptions,
  OtlpProtocol,
  SdkOptions,
  Signal,
  TelemetrySdk,
} from "./sdk.js";
export { FanOutMetricExporter } from "./fan-out-exporter.js";
export type {
  CloudSettings,
  ConfigProperties,
  GrafanaOtlpSettings,
  OnPremSettings,
  ResourceContext,
  SettingsOverrides,
} from "@grafana-otlp/types";
