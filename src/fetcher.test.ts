import test from 'node:test';
import assert from 'node:assert/strict';

import { MemoryResponseCache } from './cache.js';
import { NetworkError, RateLimitError } from './errors.js';
import { Fetcher, Throttle, backoffDelay, parseRetryAfter, type SleepFn } from './fetcher.js';
import { recordingTransport, textResponse } from './testing.js';
import type { FetchRequest, ResponseCache, RetryPolicy, TransportResponse } from './types.js';

const POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100, multiplier: 2, maxDelayMs: 1000, jitterMs: 0 };
const URL_A = 'https://kakomon.example.com/ap/';

function fakeClock(): { now: () => number; sleep: SleepFn; sleeps: number[] } {
  let clock = 0;
  const sleeps: number[] = [];
  return {
    now: () => clock,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
    },
    sleeps,
  };
}

function scripted(responses: TransportResponse[]) {
  return recordingTransport((_, index) => {
    const response = responses[Math.min(index, responses.length - 1)];
    if (!response) {
      throw new Error('応答が用意されていません');
    }
    return response;
  });
}

test('Throttle: 連続取得の間隔を最小間隔まで空ける', async () => {
  const clock = fakeClock();
  const throttle = new Throttle(1000, clock.now, clock.sleep);
  await Promise.all([throttle.acquire(), throttle.acquire(), throttle.acquire()]);
  assert.deepEqual(clock.sleeps, [1000, 1000]);
});

test('Throttle: 経過時間の分だけ待ち時間を減らす', async () => {
  let now = 0;
  const sleeps: number[] = [];
  const throttle = new Throttle(1000, () => now, async (ms) => {
    sleeps.push(ms);
    now += ms;
  });
  await throttle.acquire();
  now += 400;
  await throttle.acquire();
  assert.deepEqual(sleeps, [600]);
});

test('backoffDelay: 指数的に伸び上限で頭打ちになる', () => {
  const policy: RetryPolicy = { maxAttempts: 5, baseDelayMs: 1000, multiplier: 2, maxDelayMs: 30_000, jitterMs: 250 };
  assert.equal(backoffDelay(policy, 1, () => 0.5), 1125);
  assert.equal(backoffDelay(policy, 3, () => 0.5), 4125);
  assert.equal(backoffDelay(policy, 10, () => 0), 30_000);
});

test('parseRetryAfter: 秒数とHTTP日付を解釈する', () => {
  assert.equal(parseRetryAfter('3', 0), 3000);
  assert.equal(
    parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', Date.parse('Wed, 21 Oct 2015 07:27:50 GMT')),
    10_000,
  );
  assert.equal(parseRetryAfter(null, 0), undefined);
  assert.equal(parseRetryAfter('soon', 0), undefined);
});

test('Fetcher: 5xx は再試行して成功を返す', async () => {
  const clock = fakeClock();
  const { transport, requests } = scripted([textResponse('busy', 503), textResponse('ok')]);
  const fetcher = new Fetcher({ transport, throttleMs: 0, retryPolicy: POLICY, sleep: clock.sleep, now: clock.now });

  const result = await fetcher.fetch({ url: URL_A });
  assert.equal(result.body, 'ok');
  assert.equal(result.status, 200);
  assert.equal(result.fromCache, false);
  assert.equal(requests.length, 2);
  assert.equal(fetcher.networkRequests, 2);
  assert.deepEqual(clock.sleeps, [100]);
});

test('Fetcher: 429 は Retry-After とバックオフの大きい方だけ待つ', async () => {
  const clock = fakeClock();
  const { transport } = scripted([textResponse('slow down', 429, { 'retry-after': '2' }), textResponse('ok')]);
  const fetcher = new Fetcher({ transport, throttleMs: 0, retryPolicy: POLICY, sleep: clock.sleep, now: clock.now });

  const result = await fetcher.fetch({ url: URL_A });
  assert.equal(result.body, 'ok');
  assert.deepEqual(clock.sleeps, [2000]);
});

test('Fetcher: 404 は再試行せずに失敗する', async () => {
  const clock = fakeClock();
  const { transport, requests } = scripted([textResponse('missing', 404)]);
  const fetcher = new Fetcher({ transport, throttleMs: 0, retryPolicy: POLICY, sleep: clock.sleep, now: clock.now });

  await assert.rejects(
    fetcher.fetch({ url: URL_A }),
    (error: unknown) => error instanceof NetworkError && error.status === 404 && !error.transient,
  );
  assert.equal(requests.length, 1);
  assert.deepEqual(clock.sleeps, []);
});

test('Fetcher: 再試行上限に達したら NetworkError', async () => {
  const clock = fakeClock();
  const { transport, requests } = scripted([textResponse('down', 500)]);
  const fetcher = new Fetcher({ transport, throttleMs: 0, retryPolicy: POLICY, sleep: clock.sleep, now: clock.now });

  await assert.rejects(fetcher.fetch({ url: URL_A }), {
    name: 'NetworkError',
    message: `再試行上限に達しました (3回): ${URL_A}`,
  });
  assert.equal(requests.length, 3);
  assert.deepEqual(clock.sleeps, [100, 200]);
});

test('Fetcher: 429 が続けば RateLimitError', async () => {
  const clock = fakeClock();
  const { transport } = scripted([textResponse('slow down', 429)]);
  const fetcher = new Fetcher({ transport, throttleMs: 0, retryPolicy: POLICY, sleep: clock.sleep, now: clock.now });

  await assert.rejects(fetcher.fetch({ url: URL_A }), RateLimitError);
});

test('Fetcher: 通信例外は一時的な失敗として再試行する', async () => {
  const clock = fakeClock();
  const { transport, requests } = recordingTransport((_, index) => {
    if (index === 0) {
      throw new Error('ECONNRESET');
    }
    return textResponse('ok');
  });
  const fetcher = new Fetcher({ transport, throttleMs: 0, retryPolicy: POLICY, sleep: clock.sleep, now: clock.now });

  const result = await fetcher.fetch({ url: URL_A });
  assert.equal(result.body, 'ok');
  assert.equal(requests.length, 2);
});

test('Fetcher: タイムアウトした試行は失敗になる', async () => {
  const transport = (_: unknown, signal: AbortSignal): Promise<TransportResponse> =>
    new Promise((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
  const fetcher = new Fetcher({
    transport,
    throttleMs: 0,
    timeoutMs: 10,
    retryPolicy: { ...POLICY, maxAttempts: 1 },
  });

  await assert.rejects(fetcher.fetch({ url: URL_A }), {
    name: 'NetworkError',
    message: `再試行上限に達しました (1回): ${URL_A}`,
  });
});

test('Fetcher: キャッシュ済みならネットワークに出ない', async () => {
  const cache = new MemoryResponseCache();
  const { transport, requests } = scripted([textResponse('<p>page</p>')]);
  const fetcher = new Fetcher({ transport, cache, throttleMs: 0, retryPolicy: POLICY, now: () => 0 });
  const request: FetchRequest = { url: URL_A, method: 'POST', form: [['qno', '1']] };

  const first = await fetcher.fetch(request);
  const second = await fetcher.fetch(request);

  assert.equal(first.fromCache, false);
  assert.equal(second.fromCache, true);
  assert.equal(second.body, '<p>page</p>');
  assert.equal(second.contentType, 'text/html; charset=utf-8');
  assert.equal(requests.length, 1);
  assert.equal(cache.entries.get(first.key)?.fetchedAt, '1970-01-01T00:00:00.000Z');
});

test('Fetcher: refresh ならキャッシュを読まずに取り直して上書きする', async () => {
  const cache = new MemoryResponseCache();
  const { transport, requests } = scripted([textResponse('<p>old</p>'), textResponse('<p>new</p>')]);
  const fetcher = new Fetcher({ transport, cache, throttleMs: 0, retryPolicy: POLICY });

  const first = await fetcher.fetch({ url: URL_A });
  const refreshed = await fetcher.fetch({ url: URL_A }, { refresh: true });
  const cached = await fetcher.fetch({ url: URL_A });

  assert.equal(refreshed.fromCache, false);
  assert.equal(refreshed.body, '<p>new</p>');
  assert.equal(cached.fromCache, true);
  assert.equal(cached.body, '<p>new</p>');
  assert.equal(requests.length, 2);
  assert.equal(cache.entries.get(first.key)?.body, '<p>new</p>');
});

test('Fetcher: キャッシュの読み書きに失敗しても取得結果を返す', async () => {
  const warnings: string[] = [];
  const brokenCache: ResponseCache = {
    get: async () => {
      throw new Error('EACCES: permission denied');
    },
    set: async () => {
      throw new Error('ENOSPC: no space left on device');
    },
  };
  const { transport, requests } = scripted([textResponse('<p>page</p>')]);
  const fetcher = new Fetcher({
    transport,
    cache: brokenCache,
    throttleMs: 0,
    retryPolicy: POLICY,
    logger: {
      info: () => undefined,
      warn: (message) => {
        warnings.push(message);
      },
      error: () => undefined,
    },
  });

  const result = await fetcher.fetch({ url: URL_A });

  assert.equal(result.body, '<p>page</p>');
  assert.equal(result.fromCache, false);
  assert.equal(requests.length, 1);
  assert.deepEqual(warnings, [
    `キャッシュを読めませんでした (${result.key}): Error: EACCES: permission denied`,
    `キャッシュに書けませんでした (${result.key}): Error: ENOSPC: no space left on device`,
  ]);
});

test('Fetcher: 失敗した応答はキャッシュしない', async () => {
  const cache = new MemoryResponseCache();
  const { transport } = scripted([textResponse('missing', 404)]);
  const fetcher = new Fetcher({ transport, cache, throttleMs: 0, retryPolicy: POLICY });

  await assert.rejects(fetcher.fetch({ url: URL_A }), NetworkError);
  assert.equal(cache.entries.size, 0);
});

test('Fetcher: 中断済みなら取得しない', async () => {
  const controller = new AbortController();
  controller.abort();
  const { transport, requests } = scripted([textResponse('ok')]);
  const fetcher = new Fetcher({ transport, throttleMs: 0, signal: controller.signal });

  await assert.rejects(fetcher.fetch({ url: URL_A }), { name: 'AbortError' });
  assert.equal(requests.length, 0);
});
