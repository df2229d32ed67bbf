import { getLogger, type Logger } from '@ftgate/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, ResponseValidationError } from './types.js';

const DEFAULT_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * JSON-over-HTTP client for read-only gateway calls.
 *
 * Network faults and timeouts are retried with exponential backoff. An HTTP
 * error status, a body that is not JSON, or a body that fails schema
 * validation is final.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly providerName: string;
  private readonly retries: number;
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise: Promise<void> | undefined;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.baseUrl = config.baseUrl;
    this.providerName = config.providerName;
    this.retries = Math.max(1, config.retries ?? DEFAULT_RETRIES);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.defaultHeaders = { Accept: 'application/json', 'User-Agent': 'ftgate/0.1.0', ...config.defaultHeaders };
    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.timeout}ms, Retries: ${this.retries}`
    );
  }

  /**
   * GET a JSON document and parse it with `schema`.
   */
  async get<T>(
    endpoint: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: HttpRequestOptions = {}
  ): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.baseUrl, endpoint);
    const timeout = options.timeout ?? this.timeout;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      const startTime = this.effects.now();

      try {
        this.effects.log(
          'debug',
          `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${this.retries}`
        );

        const response = await this.effects.fetch(url, {
          headers: { ...this.defaultHeaders, ...options.headers },
          method: 'GET',
          signal: controller.signal,
        });

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');
          return err(new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText));
        }

        const body = await response.text();
        const data = this.parseJson(body);
        if (data.isErr()) {
          this.effects.log('error', `Response body is not valid JSON: ${data.error.message}`, {
            providerName: this.providerName,
            url: HttpUtils.sanitizeUrl(url),
          });
          return err(
            new ResponseValidationError(
              `Response body is not valid JSON: ${data.error.message}`,
              this.providerName,
              endpoint,
              [{ message: data.error.message, path: '' }],
              body.slice(0, 500)
            )
          );
        }
        this.effects.log('debug', `HTTP request completed in ${this.effects.now() - startTime}ms`, {
          status: response.status,
        });

        const parseResult = schema.safeParse(data.value);
        if (parseResult.success) {
          return ok(parseResult.data);
        }

        const allIssues = parseResult.error.issues.map((issue) => ({
          message: issue.message,
          path: issue.path.join('.'),
        }));
        const firstFiveErrors = allIssues
          .slice(0, 5)
          .map((issue) => `${issue.path}: ${issue.message}`)
          .join('; ');
        const truncatedPayload = body.slice(0, 500);

        this.effects.log(
          'error',
          `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
          { providerName: this.providerName, truncatedPayload, url: HttpUtils.sanitizeUrl(url) }
        );
        return err(
          new ResponseValidationError(
            `Response validation failed: ${firstFiveErrors}`,
            this.providerName,
            endpoint,
            allIssues,
            truncatedPayload
          )
        );
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (lastError.name === 'AbortError') {
          lastError = new Error(`Request timeout after ${timeout}ms`);
        }

        this.effects.log(
          'warn',
          `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${this.retries}, Error: ${lastError.message}`,
          { providerName: this.providerName }
        );

        if (attempt < this.retries) {
          const delay = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
          this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
          await this.effects.delay(delay);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return err(lastError ?? new Error('Request failed with unknown error'));
  }

  /**
   * Close the undici agent so keep-alive sockets don't hold the process open.
   * Idempotent: later calls share the first call's promise.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = (async () => {
        this.logger.debug('Closing HTTP agent connections');
        await this.agent.close();
      })();
    }
    return this.closePromise;
  }

  private parseJson(body: string): Result<unknown, Error> {
    try {
      const data: unknown = JSON.parse(body);
      return ok(data);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
