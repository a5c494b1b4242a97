import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { getValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Base URL of the hosted API. */
export const DEFAULT_BASE_URL = 'https://api.statuspage.io';

/** Request timeout in seconds. */
export const DEFAULT_TIMEOUT = 30;

/** Longest timeout in seconds; timers beyond 2^31-1 ms fire at once. */
export const MAX_TIMEOUT = 2_147_483;

/** Schema of the client configuration. */
export const configurationSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .regex(/^https?:\/\//i, 'Base URL must use http or https')
    .default(DEFAULT_BASE_URL),
  apiKey: z.string().trim().min(1, 'API key is required'),
  /** Seconds before a request is aborted. */
  timeout: z
    .number()
    .positive()
    .max(MAX_TIMEOUT, `Timeout must be at most ${MAX_TIMEOUT} seconds`)
    .default(DEFAULT_TIMEOUT),
  /** Whether TLS certificates are verified. */
  verifySsl: z.boolean().default(true),
});

/** Configuration as accepted by the client, defaults not yet applied. */
export type ConfigurationInput = z.input<typeof configurationSchema>;

/** Validated, immutable client configuration. */
export type Configuration = Readonly<z.output<typeof configurationSchema>>;

const envSchema = z.object({
  STATUSPAGE_API_KEY: z.string().optional(),
  STATUSPAGE_BASE_URL: z.string().optional(),
  STATUSPAGE_TIMEOUT: z.coerce.number().optional(),
  STATUSPAGE_VERIFY_SSL: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
});

function describeIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues
    .map(({ path = [], message }) => {
      const key = path.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
      return key ? `${key}: ${message}` : message;
    })
    .join('; ');
}

async function validateConfiguration<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  source: string,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  const [err, value] = await validator(input, schema);
  if (err) {
    const issues = getValidationError(err)?.issues ?? [];
    return [new ConfigurationError(`error invalid ${source}; ${describeIssues(issues)}`, { cause: err }), null];
  }

  return [null, value];
}

/**
 * Validates a configuration, applies defaults and freezes the result.
 * Fails with a {@link ConfigurationError} for a missing API key or bad base URL.
 */
export async function loadConfiguration(input: unknown): SafeWrapAsync<Error, Configuration> {
  const [err, configuration] = await validateConfiguration(input, configurationSchema, 'configuration');
  if (err) {
    return [err, null];
  }

  return [null, Object.freeze(configuration)];
}

/**
 * Builds the configuration from `STATUSPAGE_API_KEY`, `STATUSPAGE_BASE_URL`,
 * `STATUSPAGE_TIMEOUT` (seconds) and `STATUSPAGE_VERIFY_SSL`.
 */
export async function configurationFromEnv(
  env: Record<string, string | undefined> = process.env,
): SafeWrapAsync<Error, Configuration> {
  const [errEnv, parsed] = await validateConfiguration(env, envSchema, 'environment');
  if (errEnv) {
    return [errEnv, null];
  }

  return loadConfiguration({
    apiKey: parsed.STATUSPAGE_API_KEY,
    baseUrl: parsed.STATUSPAGE_BASE_URL,
    timeout: parsed.STATUSPAGE_TIMEOUT,
    verifySsl: parsed.STATUSPAGE_VERIFY_SSL,
  });
}
