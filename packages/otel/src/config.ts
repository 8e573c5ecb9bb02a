import { z } from "zod";
import type {
  GrafanaOtlpSettings,
  ResourceContext,
  SettingsOverrides,
} from "@grafana-otlp/types";
import { ConfigError } from "@grafana-otlp/types";
import type { Manifest } from "./manifest.js";

/**
 * Split a `key=value,key=value` list, the format of
 * `otel.resource.attributes` and `otel.exporter.otlp.headers`.
 * Only the first `=` separates key from value, so base64 padding survives.
 */
export function parseKeyValueList(raw: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of raw.split(",")) {
    const separator = entry.indexOf("=");
    if (separator === -1) continue;
    const key = entry.slice(0, separator).trim();
    if (key.length === 0) continue;
    result[key] = entry.slice(separator + 1).trim();
  }
  return result;
}

/** Largest instance id a Java `int` can hold */
const MAX_INSTANCE_ID = 2_147_483_647;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .default("")
  .pipe(z.enum(["true", "false", ""]))
  .transform((value) => value === "true");

const envSchema = z.object({
  GRAFANA_OTLP_CLOUD_INSTANCEID: z
    .string()
    .trim()
    .regex(/^\d*$/, "must be a non-negative decimal integer")
    .default("")
    .transform(Number)
    .pipe(z.number().int().max(MAX_INSTANCE_ID)),
  GRAFANA_OTLP_CLOUD_APIKEY: z.string().default(""),
  GRAFANA_OTLP_CLOUD_ZONE: z.string().default(""),
  GRAFANA_OTLP_ONPREM_ENDPOINT: z.string().default(""),
  GRAFANA_OTLP_ONPREM_PROTOCOL: z.string().default(""),
  GRAFANA_OTLP_DEBUGLOGGING: booleanFlag,
  GRAFANA_OTLP_GLOBALATTRIBUTES: z
    .string()
    .default("")
    .transform(parseKeyValueList),
  OTEL_SERVICE_NAME: z.string().optional(),
  OTEL_SDK_DISABLED: booleanFlag,
});

type EnvSettings = z.infer<typeof envSchema>;

function parseEnv(env: NodeJS.ProcessEnv): EnvSettings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const variables = [
      ...new Set(result.error.issues.map((issue) => String(issue.path[0]))),
    ];
    throw new ConfigError(
      `invalid telemetry settings: ${result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      { variables, cause: result.error },
    );
  }
  return result.data;
}

/**
 * Resolve settings from caller overrides, falling back to the
 * `GRAFANA_OTLP_*` environment variables field by field.
 *
 * @throws ConfigError when an environment variable has an invalid value
 */
export function resolveConfig(
  overrides?: SettingsOverrides,
  env: NodeJS.ProcessEnv = process.env,
): GrafanaOtlpSettings {
  const fromEnv = parseEnv(env);
  return {
    cloud: {
      instanceId:
        overrides?.cloud?.instanceId ?? fromEnv.GRAFANA_OTLP_CLOUD_INSTANCEID,
      apiKey: overrides?.cloud?.apiKey ?? fromEnv.GRAFANA_OTLP_CLOUD_APIKEY,
      zone: overrides?.cloud?.zone ?? fromEnv.GRAFANA_OTLP_CLOUD_ZONE,
    },
    onPrem: {
      endpoint:
        overrides?.onPrem?.endpoint ?? fromEnv.GRAFANA_OTLP_ONPREM_ENDPOINT,
      protocol:
        overrides?.onPrem?.protocol ?? fromEnv.GRAFANA_OTLP_ONPREM_PROTOCOL,
    },
    debugLogging: overrides?.debugLogging ?? fromEnv.GRAFANA_OTLP_DEBUGLOGGING,
    globalAttributes:
      overrides?.globalAttributes ?? fromEnv.GRAFANA_OTLP_GLOBALATTRIBUTES,
    applicationName: overrides?.applicationName ?? fromEnv.OTEL_SERVICE_NAME,
    disabled: overrides?.disabled ?? fromEnv.OTEL_SDK_DISABLED,
  };
}

export function readResourceContext(
  settings: GrafanaOtlpSettings,
  manifest: Manifest,
  env: NodeJS.ProcessEnv = process.env,
): ResourceContext {
  return {
    applicationName: settings.applicationName,
    manifestName: manifest.name,
    manifestVersion: manifest.version,
    hostname: env.HOSTNAME,
    host: env.HOST,
  };
}
