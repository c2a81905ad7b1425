/**
 * Authenticated transport for the v4 REST API.
 *
 * Owns everything that is the same for every endpoint: URL building, auth
 * headers, timeouts, retry with backoff, and translation of non-2xx
 * responses into typed errors. Resource managers only build paths and pick a
 * result shape.
 *
 * Usage:
 *   const client = new GitlabClient({ url: 'https://gitlab.example.com', privateToken });
 *   const project = await client.projects.get(42, { lazy: true });
 *   const zip = await project.artifacts.download('main', 'build');
 */

import { v4 as uuid } from 'uuid';
import { ClientConfig, configFromEnv, createClientConfig, validateClientConfig } from './config';
import {
  GitlabAuthenticationError,
  GitlabConfigError,
  GitlabConnectionError,
  GitlabHttpError,
  GitlabParsingError,
  maskSecretsInMessage,
} from './domain/errors';
import { ResponseHandle } from './http/response';
import { LogLevel, configureLoggingFromEnv, logger } from './logger';
import { ProjectManager } from './objects/projects';

/** A value that can be sent as a query parameter. `undefined` is dropped. */
export type QueryValue = string | number | boolean | undefined;

/**
 * Free-form options forwarded to the server as query parameters, next to the
 * typed ones. `sudo` is sent as the Sudo header instead.
 */
export type ExtraOptions = Record<string, QueryValue>;

export type HttpVerb = 'GET' | 'DELETE';

export interface HttpRequestOptions {
  query?: Record<string, QueryValue>;
  extra?: ExtraOptions;
  /** Leave the body open for chunked reading instead of buffering it. */
  streamed?: boolean;
}

/** Fetch implementation (injectable for testing). */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ClientDependencies {
  fetch?: FetchFn;
}

const RETRYABLE_TRANSIENT_STATUSES = new Set([500, 502, 503, 504]);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pull the human-readable part out of an error body. */
function extractErrorMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      const message = parsed.message ?? parsed.error;
      if (typeof message === 'string') return message;
      if (message !== undefined && message !== null) return JSON.stringify(message);
    }
  } catch {
    // Not JSON; fall back to the raw text
  }
  return body;
}

/** Delay requested by the server, or `fallbackMs` when it did not say. */
function retryDelayMs(headers: Headers, fallbackMs: number): number {
  const retryAfter = headers.get('retry-after');
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }
  const reset = headers.get('ratelimit-reset');
  if (reset !== null) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) return Math.max(epochSeconds * 1000 - Date.now(), 0);
  }
  return fallbackMs;
}

export class GitlabClient {
  public readonly config: ClientConfig;
  /** `<url>/api/v<apiVersion>`; relative request paths are appended to it. */
  public readonly apiUrl: string;
  public readonly projects: ProjectManager;

  private readonly fetchFn: FetchFn;
  private readonly log = logger.child({ module: 'client' });

  constructor(config: Partial<ClientConfig> = {}, deps: ClientDependencies = {}) {
    this.config = createClientConfig(config);
    const validation = validateClientConfig(this.config);
    if (!validation.valid) {
      throw new GitlabConfigError(`Invalid client configuration: ${validation.errors.join('; ')}`);
    }
    for (const warning of validation.warnings) {
      this.log.debug(warning);
    }

    this.apiUrl = `${this.config.url}/api/v${this.config.apiVersion}`;
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.projects = new ProjectManager(this);
  }

  /** Create a client from GITLAB_* environment variables. GITLAB_LOG_LEVEL sets the global log level. */
  static fromEnv(env: Record<string, string | undefined> = process.env, deps: ClientDependencies = {}): GitlabClient {
    configureLoggingFromEnv(env);
    return new GitlabClient(configFromEnv(env), deps);
  }

  /** Resolve `path` against the API root and append the query string. */
  buildUrl(path: string, query: Record<string, QueryValue> = {}): string {
    const base = /^https?:\/\//i.test(path)
      ? path
      : `${this.apiUrl}${path.startsWith('/') ? path : `/${path}`}`;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      params.append(key, String(value));
    }
    const qs = params.toString();
    if (!qs) return base;
    return `${base}${base.includes('?') ? '&' : '?'}${qs}`;
  }

  /**
   * Send a request and return the checked response.
   *
   * @throws GitlabAuthenticationError on 401/403
   * @throws GitlabHttpError on any other non-2xx status
   * @throws GitlabConnectionError when the server could not be reached in time
   */
  async httpRequest(verb: HttpVerb, path: string, options: HttpRequestOptions = {}): Promise<ResponseHandle> {
    const extraOptions: ExtraOptions = options.extra ?? {};
    const { sudo, ...extra } = extraOptions;
    const query = { ...options.query, ...extra };
    const url = this.buildUrl(path, query);
    const maskedUrl = maskSecretsInMessage(url, this.secretsIn(query));
    const headers = this.buildHeaders(sudo);
    const streamed = options.streamed ?? false;
    const requestLog = this.log.child({ requestId: uuid(), method: verb, url: maskedUrl });

    let retries = 0;
    while (true) {
      requestLog.debug('HTTP request', { attempt: retries + 1, streamed });

      let sent: { response: Response; body?: Buffer };
      try {
        sent = await this.send(verb, url, headers, streamed);
      } catch (err) {
        const reason = err instanceof Error ? err.message : 'unknown error';
        if (this.config.retryTransientErrors && this.canRetry(retries)) {
          const delayMs = this.backoffMs(retries);
          retries++;
          requestLog.warn('Connection failed, retrying', { retry: retries, delayMs, error: reason });
          await sleep(delayMs);
          continue;
        }
        requestLog.debug('HTTP request failed', { error: reason });
        throw new GitlabConnectionError(`${verb} ${maskedUrl} failed: ${reason}`);
      }

      const { response, body } = sent;
      if (response.status >= 200 && response.status < 300) {
        if (requestLog.isEnabled(LogLevel.Debug)) {
          requestLog.debug('HTTP response', {
            status: response.status,
            bytes: body ? body.length : response.headers.get('content-length'),
          });
        }
        // Streamed bodies are read later; each read gets the request timeout.
        return new ResponseHandle(response, maskedUrl, body, streamed ? this.config.timeoutMs : undefined);
      }

      const retryable =
        (response.status === 429 && this.config.obeyRateLimit) ||
        (RETRYABLE_TRANSIENT_STATUSES.has(response.status) && this.config.retryTransientErrors);
      if (retryable && this.canRetry(retries)) {
        const delayMs = retryDelayMs(response.headers, this.backoffMs(retries));
        retries++;
        if (!body && response.body) {
          await response.body.cancel();
        }
        requestLog.warn('Retrying request', { status: response.status, retry: retries, delayMs });
        await sleep(delayMs);
        continue;
      }

      const errorBody = body
        ? body.toString('utf8')
        : await response.text().catch((err: unknown) => {
            requestLog.debug('Reading error body failed', { error: err });
            return '';
          });
      const message = extractErrorMessage(errorBody);
      requestLog.debug('HTTP request rejected', { status: response.status, message });

      if (response.status === 401 || response.status === 403) {
        throw new GitlabAuthenticationError(message, response.status, errorBody);
      }
      throw new GitlabHttpError(message, response.status, errorBody);
    }
  }

  async httpGet(path: string, options: HttpRequestOptions = {}): Promise<ResponseHandle> {
    return this.httpRequest('GET', path, options);
  }

  /** GET a JSON object. */
  async httpGetJson(path: string, options: Omit<HttpRequestOptions, 'streamed'> = {}): Promise<Record<string, unknown>> {
    const response = await this.httpGet(path, { ...options, streamed: false });
    const parsed = await response.json();
    if (!isRecord(parsed)) {
      throw new GitlabParsingError(`Expected a JSON object from ${response.url}`, response.status, JSON.stringify(parsed));
    }
    return parsed;
  }

  async httpDelete(path: string, options: Omit<HttpRequestOptions, 'streamed'> = {}): Promise<void> {
    await this.httpRequest('DELETE', path, { ...options, streamed: false });
  }

  private async send(
    verb: HttpVerb,
    url: string,
    headers: Record<string, string>,
    streamed: boolean,
  ): Promise<{ response: Response; body?: Buffer }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.fetchFn(url, { method: verb, headers, signal: controller.signal });
      if (streamed) {
        return { response };
      }
      // Buffered transfers are read here so the timeout covers the body too.
      const body = Buffer.from(await response.arrayBuffer());
      return { response, body };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(`timed out after ${this.config.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildHeaders(sudo: QueryValue): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.config.userAgent };
    if (this.config.privateToken) {
      headers['PRIVATE-TOKEN'] = this.config.privateToken;
    } else if (this.config.oauthToken) {
      headers.Authorization = `Bearer ${this.config.oauthToken}`;
    } else if (this.config.jobToken) {
      headers['JOB-TOKEN'] = this.config.jobToken;
    }
    if (sudo !== undefined) {
      headers.Sudo = String(sudo);
    }
    return headers;
  }

  private secretsIn(query: Record<string, QueryValue>): string[] {
    const candidates = [this.config.privateToken, this.config.oauthToken, this.config.jobToken, query.job_token];
    return candidates.filter((value): value is string => typeof value === 'string' && value.length > 0);
  }

  private canRetry(retries: number): boolean {
    return this.config.maxRetries === -1 || retries < this.config.maxRetries;
  }

  private backoffMs(retries: number): number {
    return this.config.backoffBaseMs * Math.pow(2, retries);
  }
}
