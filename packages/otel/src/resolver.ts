import type {
  ConfigProperties,
  GrafanaOtlpSettings,
  Resolved,
  ResourceAttributes,
  ResourceContext,
} from "@grafana-otlp/types";
import {
  CLOUD_PROTOCOL,
  DEFAULT_PROTOCOL,
  LOGS_EXPORTER,
  METRICS_EXPORTER,
  OTLP_ENDPOINT,
  OTLP_HEADERS,
  OTLP_PROTOCOL,
  RESOURCE_ATTRIBUTES,
  TRACES_EXPORTER,
} from "@grafana-otlp/types";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import { ATTR_SERVICE_INSTANCE_ID } from "@opentelemetry/semantic-conventions/incubating";

const MASKED_HEADER_LENGTH = 24;

export function isNotBlank(value: string | null | undefined): value is string {
  return value != null && value.trim().length > 0;
}

/** Cloud credentials force OTLP over HTTP; otherwise the on-prem protocol or grpc */
export function resolveProtocol(
  protocol: string | undefined,
  authPresent: boolean,
): Resolved<string> {
  const hasProtocol = isNotBlank(protocol);
  if (authPresent) {
    return {
      value: CLOUD_PROTOCOL,
      warnings: hasProtocol
        ? [
            "ignoring grafana.otlp.onprem.protocol, because grafana.otlp.cloud.instanceId was found",
          ]
        : [],
    };
  }

  return {
    value: isNotBlank(protocol) ? protocol : DEFAULT_PROTOCOL,
    warnings: [],
  };
}

export function resolveEndpoint(
  endpoint: string | undefined,
  zone: string | undefined,
  authPresent: boolean,
): Resolved<string | undefined> {
  const warnings: string[] = [];

  if (authPresent) {
    if (isNotBlank(endpoint)) {
      warnings.push(
        "ignoring grafana.otlp.onprem.endpoint, because grafana.otlp.cloud.instanceId was found",
      );
    }
    if (isNotBlank(zone)) {
      return {
        value: `https://otlp-gateway-${zone}.grafana.net/otlp`,
        warnings,
      };
    }
    warnings.push("please specify grafana.otlp.cloud.zone");
    return { value: undefined, warnings };
  }

  if (isNotBlank(zone)) {
    warnings.push(
      "ignoring grafana.otlp.cloud.zone, because grafana.otlp.onprem.endpoint was found",
    );
  }
  if (isNotBlank(endpoint)) {
    return { value: endpoint, warnings };
  }
  warnings.push("please specify grafana.otlp.onprem.endpoint");
  return { value: undefined, warnings };
}

/**
 * Build the `otel.exporter.otlp.headers` value for Grafana Cloud.
 * Both the instance id and the API key are needed; with only one of them
 * no header is produced and the missing counterpart is reported.
 */
export function resolveBasicAuthHeader(
  instanceId: number | undefined,
  apiKey: string | undefined,
): Resolved<string | undefined> {
  const hasKey = isNotBlank(apiKey);
  const hasId = instanceId !== undefined && instanceId !== 0;

  if (hasKey && hasId) {
    const userPass = Buffer.from(`${instanceId}:${apiKey}`, "utf8");
    return {
      value: `Authorization=Basic ${userPass.toString("base64")}`,
      warnings: [],
    };
  }

  const warnings: string[] = [];
  if (hasKey) {
    warnings.push(
      "found grafana.otlp.cloud.apiKey but no grafana.otlp.cloud.instanceId",
    );
  }
  if (hasId) {
    warnings.push(
      "found grafana.otlp.cloud.instanceId but no grafana.otlp.cloud.apiKey",
    );
  }
  return { value: undefined, warnings };
}

function withDefault(
  attributes: ResourceAttributes,
  key: string,
  ...candidates: Array<string | undefined>
): void {
  if (Object.hasOwn(attributes, key)) {
    return;
  }
  const value = candidates.find(isNotBlank);
  if (value !== undefined) {
    attributes[key] = value;
  }
}

/** Fill in service identity attributes the caller has not set */
export function resolveResourceAttributes(
  callerAttributes: Readonly<ResourceAttributes>,
  context: ResourceContext,
): ResourceAttributes {
  const attributes: ResourceAttributes = { ...callerAttributes };

  withDefault(
    attributes,
    ATTR_SERVICE_NAME,
    context.applicationName,
    context.manifestName,
  );
  withDefault(attributes, ATTR_SERVICE_VERSION, context.manifestVersion);
  withDefault(
    attributes,
    ATTR_SERVICE_INSTANCE_ID,
    context.hostname,
    context.host,
  );

  return attributes;
}

/** Percent-encode the characters that delimit `key=value,key=value` */
function encodeAttributeText(text: string): string {
  return text.replace(
    /[%,=]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export function serializeResourceAttributes(
  attributes: Readonly<ResourceAttributes>,
): string {
  return Object.entries(attributes)
    .map(
      ([key, value]) =>
        `${encodeAttributeText(key)}=${encodeAttributeText(value)}`,
    )
    .join(",");
}

export function assembleConfigProperties(
  settings: GrafanaOtlpSettings,
  context: ResourceContext,
): Resolved<ConfigProperties> {
  const exporters = settings.debugLogging ? "logging,otlp" : "otlp";

  const auth = resolveBasicAuthHeader(
    settings.cloud.instanceId,
    settings.cloud.apiKey,
  );
  const authPresent = auth.value !== undefined;
  const protocol = resolveProtocol(settings.onPrem.protocol, authPresent);
  const endpoint = resolveEndpoint(
    settings.onPrem.endpoint,
    settings.cloud.zone,
    authPresent,
  );

  const properties: ConfigProperties = {
    [RESOURCE_ATTRIBUTES]: serializeResourceAttributes(
      resolveResourceAttributes(settings.globalAttributes, context),
    ),
    [OTLP_PROTOCOL]: protocol.value,
    [TRACES_EXPORTER]: exporters,
    [METRICS_EXPORTER]: exporters,
    [LOGS_EXPORTER]: exporters,
  };
  if (auth.value !== undefined) {
    properties[OTLP_HEADERS] = auth.value;
  }
  if (endpoint.value !== undefined) {
    properties[OTLP_ENDPOINT] = endpoint.value;
  }

  return {
    value: properties,
    warnings: [...auth.warnings, ...protocol.warnings, ...endpoint.warnings],
  };
}

/** Copy of `properties` safe to log: the auth header is cut short */
export function maskAuthHeader(
  properties: Readonly<ConfigProperties>,
): ConfigProperties {
  const masked: ConfigProperties = {};
  for (const [key, value] of Object.entries(properties)) {
    masked[key] =
      key === OTLP_HEADERS && value.length > MASKED_HEADER_LENGTH
        ? `${value.slice(0, MASKED_HEADER_LENGTH)}...`
        : value;
  }
  return masked;
}
