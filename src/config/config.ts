import { z } from 'zod';
import { MissingCredentialError } from '../error/missingCredentialError.js';
import { validator } from '../utils/validator.js';

/** Version reported in the client identifier. */
export const SDK_VERSION = '0.0.0.1';

/** Product name the client identifier starts with. */
export const PRODUCT_NAME = 'Traceix';

/** Address of the hosted Traceix service. */
export const DEFAULT_BASE_URL = 'https://ai.perkinsfund.org';

/** Environment variable the API key is read from when none is passed. */
export const API_KEY_ENV = 'TRACEIX_API_KEY';

/** Environment variable that disables platform details in the client identifier when set to `"1"`. */
export const DISABLE_TELEMETRY_ENV = 'TRACEIX_DISABLE_TELEMETRY';

/** Environment map the config falls back to, `process.env` by default. */
export type Env = Record<string, string | undefined>;

/** Explicit overrides accepted when resolving a {@link ClientConfig}. */
export interface ConfigOptions {
  /** API key; when `undefined` or `null`, {@link API_KEY_ENV} is used. An empty string is never replaced. */
  apiKey?: string | null;
  /**
   * Base URL requests are sent to.
   * @default DEFAULT_BASE_URL
   */
  baseUrl?: string;
  /** Whether the client identifier carries platform and runtime details. Overrides {@link DISABLE_TELEMETRY_ENV}. */
  telemetry?: boolean;
}

const clientConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z
    .string()
    .url('must be an absolute URL')
    .refine((value) => /^https?:\/\//i.test(value), 'must use http or https'),
  telemetry: z.boolean(),
});

/** Resolved, immutable client configuration. */
export type ClientConfig = Readonly<z.infer<typeof clientConfigSchema>>;

/**
 * Builds the client configuration from explicit options, falling back to the environment.
 *
 * @throws {MissingCredentialError} when neither the options nor the environment hold a non-empty API key.
 * @throws {ValidationError} when the base URL is not an absolute http(s) URL.
 */
export function resolveConfig(options: ConfigOptions = {}, env: Env = {}): ClientConfig {
  const apiKey = options.apiKey ?? env[API_KEY_ENV] ?? '';
  if (!apiKey) {
    throw new MissingCredentialError(`error no API key provided, pass apiKey or set ${API_KEY_ENV}`);
  }

  const [err, config] = validator(
    {
      apiKey,
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      telemetry: options.telemetry ?? env[DISABLE_TELEMETRY_ENV] !== '1',
    },
    clientConfigSchema,
    'client config',
  );
  if (err) {
    throw err;
  }

  return Object.freeze(config);
}
