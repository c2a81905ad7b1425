/**
 * Client configuration.
 *
 * Usage:
 *   const config = createClientConfig({
 *     url: 'https://gitlab.example.com',
 *     privateToken: process.env.GITLAB_PRIVATE_TOKEN,
 *     retryTransientErrors: true,
 *   });
 *
 *   const result = validateClientConfig(config);
 *   if (!result.valid) console.error(result.errors);
 */

export const CLIENT_VERSION = '0.1.0';

export const DEFAULT_GITLAB_URL = 'https://gitlab.com';

/** Complete configuration for a GitlabClient. */
export interface ClientConfig {
  /** Base URL of the instance, without the /api/v4 suffix. */
  url: string;
  /** REST API version. Only '4' is served by current instances. */
  apiVersion: string;
  /** Personal, project or group access token (sent as PRIVATE-TOKEN). */
  privateToken?: string;
  /** OAuth2 access token (sent as Authorization: Bearer). */
  oauthToken?: string;
  /** CI job token (sent as JOB-TOKEN). */
  jobToken?: string;
  /** Time allowed for a request, including the body of buffered transfers. */
  timeoutMs: number;
  /** Wait and retry when the server answers 429. */
  obeyRateLimit: boolean;
  /** Retry 500/502/503/504 responses and connection failures. */
  retryTransientErrors: boolean;
  /** Maximum number of retries per request; -1 retries forever. */
  maxRetries: number;
  /** Base delay for exponential backoff between retries. */
  backoffBaseMs: number;
  userAgent: string;
}

/** Validation result for a client configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Create a client config, filling defaults. */
export function createClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const url = (overrides.url ?? DEFAULT_GITLAB_URL).replace(/\/+$/, '');
  return {
    url,
    apiVersion: overrides.apiVersion ?? '4',
    privateToken: overrides.privateToken,
    oauthToken: overrides.oauthToken,
    jobToken: overrides.jobToken,
    timeoutMs: overrides.timeoutMs ?? 60_000,
    obeyRateLimit: overrides.obeyRateLimit ?? true,
    retryTransientErrors: overrides.retryTransientErrors ?? false,
    maxRetries: overrides.maxRetries ?? 10,
    backoffBaseMs: overrides.backoffBaseMs ?? 100,
    userAgent: overrides.userAgent ?? `gitlab-artifacts-client/${CLIENT_VERSION}`,
  };
}

/** Validate a client configuration for consistency. */
export function validateClientConfig(config: ClientConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let parsed: URL | undefined;
  try {
    parsed = new URL(config.url);
  } catch {
    errors.push(`url is not a valid URL: ${config.url}`);
  }
  if (parsed && parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    errors.push(`url must use http or https, got: ${parsed.protocol}`);
  }

  if (config.apiVersion !== '4') {
    errors.push(`Unsupported API version: ${config.apiVersion}`);
  }

  const tokens = [config.privateToken, config.oauthToken, config.jobToken].filter((t) => t !== undefined);
  if (tokens.length > 1) {
    errors.push('Only one of privateToken, oauthToken or jobToken may be set');
  }
  if (tokens.length === 0) {
    warnings.push('No token configured; only public projects will be reachable');
  }

  if (!(config.timeoutMs > 0)) {
    errors.push('timeoutMs must be positive');
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < -1) {
    errors.push('maxRetries must be an integer >= -1');
  }
  if (!(config.backoffBaseMs >= 0)) {
    errors.push('backoffBaseMs must be >= 0');
  }

  return { valid: errors.length === 0, errors, warnings };
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseOptionalBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

/**
 * Build a config from environment variables.
 *
 * GITLAB_URL, GITLAB_PRIVATE_TOKEN, GITLAB_OAUTH_TOKEN, CI_JOB_TOKEN,
 * GITLAB_TIMEOUT_MS, GITLAB_MAX_RETRIES, GITLAB_RETRY_TRANSIENT_ERRORS.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): ClientConfig {
  return createClientConfig({
    url: env.GITLAB_URL || undefined,
    privateToken: env.GITLAB_PRIVATE_TOKEN || undefined,
    oauthToken: env.GITLAB_OAUTH_TOKEN || undefined,
    jobToken: env.CI_JOB_TOKEN || undefined,
    timeoutMs: parseOptionalInt(env.GITLAB_TIMEOUT_MS),
    maxRetries: parseOptionalInt(env.GITLAB_MAX_RETRIES),
    retryTransientErrors: parseOptionalBool(env.GITLAB_RETRY_TRANSIENT_ERRORS),
  });
}
