import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { HTTP_CONFIG } from '../../config/constants';
import { DataSourceError } from '../utils/errors';
import { AppLogger, createLogger } from '../utils/logger';

/** Simple promise-based delay function. */
async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Total attempts per request, the first one included. */
  maxAttempts?: number;
  initialBackoffMs?: number;
  /** 0 disables the response cache. */
  cacheTtlMs?: number;
  /** Replaces the network transport, e.g. with an in-process fake. */
  adapter?: AxiosAdapter;
  /** Millisecond clock for cache expiry. */
  clock?: () => number;
}

/** Narrows an untyped response body to the shape a client expects. */
export type ResponseGuard<T> = (body: unknown) => body is T;

export interface RequestOptions {
  params?: Record<string, string | number>;
  data?: unknown;
}

interface CacheEntry {
  expiresAt: number;
  value: unknown;
}

/**
 * Base for the upstream JSON clients: one axios instance per upstream,
 * retry with exponential backoff on rate limits, server and network errors,
 * and a short-lived in-memory response cache.
 */
export abstract class HttpJsonClient {
  protected readonly api: AxiosInstance;
  protected readonly logger: AppLogger;
  private readonly maxAttempts: number;
  private readonly initialBackoffMs: number;
  private readonly cacheTtlMs: number;
  private readonly clock: () => number;
  private readonly cache = new Map<string, CacheEntry>();

  protected constructor(
    protected readonly source: string,
    options: HttpClientOptions,
  ) {
    this.logger = createLogger(source);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? HTTP_CONFIG.DEFAULT_MAX_RETRIES);
    this.initialBackoffMs = options.initialBackoffMs ?? HTTP_CONFIG.INITIAL_BACKOFF_MS;
    this.cacheTtlMs = options.cacheTtlMs ?? HTTP_CONFIG.DEFAULT_CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;

    this.api = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? HTTP_CONFIG.DEFAULT_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Determines if an error is retryable: 429 and 5xx responses, and failures
   * with no response at all. Other 4xx responses are final.
   */
  protected isRetryableError(error: unknown): boolean {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        const retryable: readonly number[] = HTTP_CONFIG.RETRYABLE_STATUS_CODES;
        return retryable.includes(error.response.status);
      }
      return true;
    }
    return true;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) this.cache.delete(key);
    }
  }

  protected get<T>(url: string, guard: ResponseGuard<T>, options: RequestOptions = {}): Promise<T> {
    return this.request('get', url, guard, options);
  }

  protected post<T>(
    url: string,
    data: unknown,
    guard: ResponseGuard<T>,
    options: Omit<RequestOptions, 'data'> = {},
  ): Promise<T> {
    return this.request('post', url, guard, { ...options, data });
  }

  private cacheKey(method: string, url: string, options: RequestOptions): string {
    return JSON.stringify([method, url, options.params ?? null, options.data ?? null]);
  }

  private async request<T>(
    method: 'get' | 'post',
    url: string,
    guard: ResponseGuard<T>,
    options: RequestOptions,
  ): Promise<T> {
    const key = this.cacheKey(method, url, options);
    if (this.cacheTtlMs > 0) {
      const hit = this.cache.get(key);
      if (hit && hit.expiresAt > this.clock() && guard(hit.value)) {
        this.logger.trace(`Cache hit for ${method.toUpperCase()} ${url}`);
        return hit.value;
      }
      if (hit) this.cache.delete(key);
    }

    const body = await this.fetchWithRetry(method, url, options);
    if (!guard(body)) {
      throw new DataSourceError(`${this.source} returned an unexpected response shape`, this.source, url);
    }
    if (this.cacheTtlMs > 0) {
      const now = this.clock();
      this.evictExpired(now);
      this.cache.set(key, { expiresAt: now + this.cacheTtlMs, value: body });
    }
    return body;
  }

  private async fetchWithRetry(method: 'get' | 'post', url: string, options: RequestOptions): Promise<unknown> {
    let attempt = 0;
    for (;;) {
      attempt++;
      try {
        const response = await this.api.request<unknown>({ method, url, params: options.params, data: options.data });
        return response.data;
      } catch (error) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        const reason = error instanceof Error ? error.message : String(error);

        if (!this.isRetryableError(error) || attempt >= this.maxAttempts) {
          const exhausted = attempt >= this.maxAttempts && this.isRetryableError(error);
          this.logger.error(
            `${method.toUpperCase()} ${url} failed${exhausted ? ` after ${attempt} attempts` : ''} (status=${status ?? 'N/A'}): ${reason}`,
          );
          throw new DataSourceError(`${this.source} request failed: ${reason}`, this.source, url, status, { cause: error });
        }

        const backoffTime = this.initialBackoffMs * Math.pow(2, attempt - 1);
        // Log initial failure as debug, subsequent retry attempts as warn
        const logLevel = attempt === 1 ? 'debug' : 'warn';
        this.logger[logLevel](
          `Attempt ${attempt} failed (status=${status ?? 'N/A'}): ${reason}. Retrying in ${backoffTime}ms...`,
        );
        await delay(backoffTime);
      }
    }
  }
}
