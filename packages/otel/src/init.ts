import type { ConfigProperties, SettingsOverrides } from "@grafana-otlp/types";
import { TelemetryInitError, wrapUnknownError } from "@grafana-otlp/types";
import { readResourceContext, resolveConfig } from "./config.js";
import { readManifest } from "./manifest.js";
import { assembleConfigProperties, maskAuthHeader } from "./resolver.js";
import type { SdkOptions, TelemetrySdk } from "./sdk.js";
import { createSdk } from "./sdk.js";

export interface TelemetryLogger {
  info(message: string): void;
  warn(message: string, error?: unknown): void;
}

export const consoleLogger: TelemetryLogger = {
  info: (message) => console.log(`[otel] ${message}`),
  warn: (message, error) => {
    if (error === undefined) {
      console.warn(`[otel] ${message}`);
    } else {
      console.warn(`[otel] ${message}`, error);
    }
  },
};

export interface InitTelemetryOptions extends SdkOptions {
  /** Defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
  /** Defaults to `package.json` in the working directory */
  manifestPath?: string;
  logger?: TelemetryLogger;
  /** Builds the SDK from the resolved properties. Defaults to a NodeSDK. */
  sdkFactory?: (
    properties: ConfigProperties,
    options: SdkOptions,
  ) => TelemetrySdk;
}

let sdk: TelemetrySdk | null = null;
let shutdownHookRegistered = false;

/**
 * Initialize the OpenTelemetry SDK for Grafana Cloud or an on-prem collector.
 *
 * Call this before starting your server. Misconfiguration never throws:
 * warnings are logged, and if the SDK cannot be built or started the
 * function logs the error and returns `undefined`, leaving the global
 * OpenTelemetry API in its no-op state.
 *
 * @returns The running SDK, or `undefined` when telemetry is disabled.
 */
export function initTelemetry(
  overrides?: SettingsOverrides,
  options: InitTelemetryOptions = {},
): TelemetrySdk | undefined {
  if (sdk) {
    return sdk;
  }

  const logger = options.logger ?? consoleLogger;
  const env = options.env ?? process.env;
  const sdkFactory = options.sdkFactory ?? createSdk;

  let instance: TelemetrySdk;
  try {
    const settings = resolveConfig(overrides, env);
    if (settings.disabled) {
      logger.info("telemetry disabled, skipping OpenTelemetry setup");
      return undefined;
    }

    const context = readResourceContext(
      settings,
      readManifest(options.manifestPath),
      env,
    );
    const { value: properties, warnings } = assembleConfigProperties(
      settings,
      context,
    );
    for (const warning of warnings) {
      logger.warn(warning);
    }
    logger.info(
      `using config properties: ${JSON.stringify(maskAuthHeader(properties))}`,
    );

    instance = sdkFactory(properties, {
      instrumentations: options.instrumentations,
    });
    instance.start();
  } catch (error) {
    logger.warn(
      "unable to create OpenTelemetry instance",
      wrapUnknownError(
        error,
        (message, cause) => new TelemetryInitError(message, { cause }),
      ),
    );
    return undefined;
  }

  sdk = instance;
  if (!shutdownHookRegistered) {
    shutdownHookRegistered = true;
    process.once("SIGTERM", (signal) => {
      shutdownAndReraise(signal).catch((err) =>
        console.error("OTel shutdown error", err),
      );
    });
  }

  return instance;
}

/**
 * Gracefully shut down the OpenTelemetry SDK, flushing any pending telemetry.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (sdk) {
    const running = sdk;
    sdk = null;
    await running.shutdown();
  }
}

/**
 * Flush telemetry, then re-send `signal` when nothing else listens for it.
 * Listening for SIGTERM turns off Node's default exit, so without this a
 * host with no handler of its own would keep running.
 */
export async function shutdownAndReraise(signal: NodeJS.Signals): Promise<void> {
  try {
    await shutdownTelemetry();
  } finally {
    if (process.listenerCount(signal) === 0) {
      process.kill(process.pid, signal);
    }
  }
}
