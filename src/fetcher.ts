import { cacheKey } from './cache.js';
import { DEFAULT_RETRY_POLICY, DEFAULT_THROTTLE_MS, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './config.js';
import { NetworkError, RateLimitError, toErrorMessage } from './errors.js';
import { silentLogger, throwIfAborted, wait } from './utils.js';
import type {
  CacheEntry,
  FetchRequest,
  FetchResult,
  Logger,
  ResponseCache,
  RetryPolicy,
  Transport,
  TransportResponse,
} from './types.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * 全リクエスト共通の最小送信間隔を保証する。
 */
export class Throttle {
  private lastAt: number | undefined;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: SleepFn = wait,
  ) {}

  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(async () => {
      if (this.lastAt !== undefined) {
        const remaining = this.minIntervalMs - (this.now() - this.lastAt);
        if (remaining > 0) {
          await this.sleep(remaining, signal);
        }
      }
      this.lastAt = this.now();
    });
    this.tail = turn.catch(() => undefined);
    return turn;
  }
}

/**
 * n回目の失敗後に待つミリ秒。指数バックオフに [0, jitterMs) のジッタを加える。
 */
export function backoffDelay(policy: RetryPolicy, failedAttempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * policy.multiplier ** (failedAttempt - 1);
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return Math.min(policy.maxDelayMs, exponential) + jitter;
}

export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * グローバル fetch を使う既定のトランスポート。
 */
export function createFetchTransport(userAgent: string = DEFAULT_USER_AGENT): Transport {
  return async (request, signal) => {
    const url = new URL(request.url);
    for (const [name, value] of Object.entries(request.params ?? {})) {
      url.searchParams.set(name, value);
    }
    const response = await fetch(url, {
      method: request.method ?? 'GET',
      headers: { 'user-agent': userAgent, ...request.headers },
      body: request.form ? new URLSearchParams(request.form) : undefined,
      signal,
    });
    return { status: response.status, headers: response.headers, body: await response.text() };
  };
}

export interface FetcherOptions {
  /** 未指定ならキャッシュ無効。 */
  cache?: ResponseCache;
  throttle?: Throttle;
  throttleMs?: number;
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  transport?: Transport;
  sleep?: SleepFn;
  now?: () => number;
  random?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface FetchOptions {
  /** キャッシュを読まずに取り直す。 */
  refresh?: boolean;
}

type AttemptFailure = NetworkError | RateLimitError;

export class Fetcher {
  private readonly cache?: ResponseCache;
  private readonly throttle: Throttle;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly transport: Transport;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  /** ネットワークへ実際に送ったリクエスト数(再試行を含む)。 */
  networkRequests = 0;

  constructor(options: FetcherOptions = {}) {
    this.cache = options.cache;
    this.sleep = options.sleep ?? wait;
    this.now = options.now ?? Date.now;
    this.throttle = options.throttle ?? new Throttle(options.throttleMs ?? DEFAULT_THROTTLE_MS, this.now, this.sleep);
    this.retryPolicy = options.retryPolicy ?? { ...DEFAULT_RETRY_POLICY };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.transport = options.transport ?? createFetchTransport();
    this.random = options.random ?? Math.random;
    this.signal = options.signal;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * キャッシュを優先してレスポンス本文を取得する。成功時のみキャッシュを更新する。
   * refresh ならキャッシュを読まずに取り直し、結果で上書きする。
   * キャッシュの読み書きに失敗してもキャッシュなしとして続ける。
   */
  async fetch(request: FetchRequest, options: FetchOptions = {}): Promise<FetchResult> {
    throwIfAborted(this.signal);
    const key = cacheKey(request);
    if (this.cache && !options.refresh) {
      const hit = await this.readCache(key);
      if (hit) {
        return { key, status: hit.status, contentType: hit.contentType, body: hit.body, fromCache: true };
      }
    }

    const response = await this.requestWithRetry(request);
    const contentType = response.headers.get('content-type') ?? '';
    await this.writeCache({
      key,
      url: request.url,
      method: request.method ?? 'GET',
      status: response.status,
      contentType,
      body: response.body,
      fetchedAt: new Date(this.now()).toISOString(),
    });
    return { key, status: response.status, contentType, body: response.body, fromCache: false };
  }

  private async readCache(key: string): Promise<CacheEntry | undefined> {
    try {
      return await this.cache?.get(key);
    } catch (error) {
      this.logger.warn(`キャッシュを読めませんでした (${key}): ${toErrorMessage(error)}`);
      return undefined;
    }
  }

  private async writeCache(entry: CacheEntry): Promise<void> {
    try {
      await this.cache?.set(entry);
    } catch (error) {
      this.logger.warn(`キャッシュに書けませんでした (${entry.key}): ${toErrorMessage(error)}`);
    }
  }

  private async requestWithRetry(request: FetchRequest): Promise<TransportResponse> {
    const { maxAttempts } = this.retryPolicy;
    let lastFailure: AttemptFailure | undefined;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      await this.throttle.acquire(this.signal);
      const outcome = await this.attempt(request);
      if (!(outcome instanceof NetworkError || outcome instanceof RateLimitError)) {
        return outcome;
      }
      if (outcome instanceof NetworkError && !outcome.transient) {
        throw outcome;
      }
      lastFailure = outcome;
      if (attempt < maxAttempts) {
        const retryAfter = outcome instanceof RateLimitError ? (outcome.retryAfterMs ?? 0) : 0;
        const delay = Math.max(backoffDelay(this.retryPolicy, attempt, this.random), retryAfter);
        this.logger.warn(`再試行 ${attempt}/${maxAttempts - 1}: ${outcome.message} (${delay}ms後)`);
        await this.sleep(delay, this.signal);
      }
    }

    if (lastFailure instanceof RateLimitError) {
      throw new RateLimitError(`レート制限が解除されませんでした (${maxAttempts}回): ${request.url}`, {
        retryAfterMs: lastFailure.retryAfterMs,
        cause: lastFailure,
      });
    }
    throw new NetworkError(`再試行上限に達しました (${maxAttempts}回): ${request.url}`, {
      status: lastFailure?.status,
      transient: true,
      cause: lastFailure,
    });
  }

  private async attempt(request: FetchRequest): Promise<TransportResponse | AttemptFailure> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`タイムアウト ${this.timeoutMs}ms`)), this.timeoutMs);
    const onAbort = (): void => controller.abort(this.signal?.reason);
    this.signal?.addEventListener('abort', onAbort, { once: true });
    this.networkRequests += 1;

    try {
      const response = await this.transport(request, controller.signal);
      if (response.status >= 200 && response.status < 300) {
        return response;
      }
      if (response.status === 429) {
        return new RateLimitError(`HTTP 429 ${request.url}`, {
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after'), this.now()),
        });
      }
      return new NetworkError(`HTTP ${response.status} ${request.url}`, {
        status: response.status,
        transient: response.status >= 500,
      });
    } catch (error) {
      if (this.signal?.aborted) {
        throw error;
      }
      return new NetworkError(`通信に失敗しました ${request.url}: ${toErrorMessage(error)}`, {
        transient: true,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener('abort', onAbort);
    }
  }
}
