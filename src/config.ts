/**
 * Configuration surface for the transport and worker pipeline.
 *
 * Values arrive as a flat key/value source (usually `process.env`, possibly
 * merged with a preference package) and are validated once with zod. The
 * parsed object is read-only for the rest of the process.
 */

import { z } from "zod";
import {
  BOOLEAN_TRUTH,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_COT_STALE,
  DEFAULT_COT_URL,
  DEFAULT_ENROLLMENT_PORT,
  DEFAULT_HOST_ID,
  DEFAULT_MAX_FRAME_LENGTH,
  DEFAULT_MAX_IN_QUEUE,
  DEFAULT_MAX_OUT_QUEUE,
  DEFAULT_MULTICAST_LOCAL_ADDR,
  DEFAULT_MULTICAST_TTL,
  DEFAULT_QUEUE_GET_TIMEOUT_MS,
  DEFAULT_SLEEP_SECONDS,
  MAX_COT_STALE,
} from "./constants";
import { CotWireError } from "./errors";

export type ConfigSource = Record<string, string | undefined>;

const truthy = (value: string): boolean => {
  const normalized = value.trim().toLowerCase();
  return BOOLEAN_TRUTH.some(truth => truth === normalized);
};

const flag = z
  .union([z.boolean(), z.string()])
  .transform(value => (typeof value === "boolean" ? value : truthy(value)))
  .default(false);

const optionalText = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === "" ? undefined : value));

export const ConfigSchema = z.object({
  COT_URL: z.string().min(1).default(DEFAULT_COT_URL),
  COT_HOST_ID: z.string().min(1).default(DEFAULT_HOST_ID),
  COT_STALE: z.coerce.number().positive().max(MAX_COT_STALE).default(DEFAULT_COT_STALE),
  TAK_PROTO: z.coerce
    .number()
    .int()
    .refine(value => value === 0 || value === 1, "TAK_PROTO must be 0 or 1")
    .default(0),

  PYTAK_NO_HELLO: flag,
  PYTAK_SLEEP: z.coerce.number().nonnegative().default(0),
  FTS_COMPAT: flag,
  FTS_COMPAT_MAX_SLEEP: z.coerce
    .number()
    .nonnegative()
    .default(DEFAULT_SLEEP_SECONDS),
  PYTAK_MIN_YIELD_MS: z.coerce.number().nonnegative().default(0),

  PYTAK_MULTICAST_LOCAL_ADDR: z.string().default(DEFAULT_MULTICAST_LOCAL_ADDR),
  PYTAK_MULTICAST_TTL: z.coerce
    .number()
    .int()
    .min(0)
    .max(255)
    .default(DEFAULT_MULTICAST_TTL),
  PYTAK_IP_FAMILY: z
    .enum(["4", "6"])
    .optional()
    .transform((value): 4 | 6 | undefined =>
      value === undefined ? undefined : value === "6" ? 6 : 4,
    ),
  PYTAK_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_CONNECT_TIMEOUT_MS),

  MAX_IN_QUEUE: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_IN_QUEUE),
  MAX_OUT_QUEUE: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MAX_OUT_QUEUE),
  QUEUE_GET_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_QUEUE_GET_TIMEOUT_MS),
  MAX_FRAME_LENGTH: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_FRAME_LENGTH),

  PYTAK_TLS_CLIENT_CERT: optionalText,
  PYTAK_TLS_CLIENT_KEY: optionalText,
  PYTAK_TLS_CLIENT_CAFILE: optionalText,
  PYTAK_TLS_CLIENT_PASSWORD: optionalText,
  PYTAK_TLS_CLIENT_P12_PASSWORD: optionalText,
  PYTAK_TLS_CLIENT_CIPHERS: optionalText,
  PYTAK_TLS_SERVER_EXPECTED_HOSTNAME: optionalText,
  PYTAK_TLS_DONT_VERIFY: flag,
  PYTAK_TLS_DONT_CHECK_HOSTNAME: flag,
  PYTAK_TLS_CERT_ENROLLMENT_USERNAME: optionalText,
  PYTAK_TLS_CERT_ENROLLMENT_PASSWORD: optionalText,
  PYTAK_TLS_CERT_ENROLLMENT_PASSPHRASE: optionalText,
  PYTAK_TLS_CERT_ENROLLMENT_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_ENROLLMENT_PORT),

  PREF_PACKAGE: optionalText,
  IMPORT_OTHER_CONFIGS: flag,

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DEBUG: flag,
});

export type CotWireConfig = z.infer<typeof ConfigSchema>;

/** Drops empty strings so they fall back to schema defaults. */
const compact = (source: ConfigSource): ConfigSource => {
  const out: ConfigSource = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
};

/**
 * Validates configuration from a key/value source. `overrides` win over the
 * source; unknown keys are ignored.
 */
export function loadConfig(
  source: ConfigSource = process.env,
  overrides: ConfigSource = {},
): CotWireConfig {
  const result = ConfigSchema.safeParse({
    ...compact(source),
    ...compact(overrides),
  });
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CotWireError("E_CONFIG", `Invalid configuration: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Effective log level: DEBUG forces debug unless a quieter level is explicit. */
export const effectiveLogLevel = (config: CotWireConfig): CotWireConfig["LOG_LEVEL"] =>
  config.DEBUG && config.LOG_LEVEL === "info" ? "debug" : config.LOG_LEVEL;
