import test from 'node:test';
import assert from 'node:assert/strict';

import { MemoryResponseCache } from './cache.js';
import { ConfigError, ExtractionError, HarvestError, NetworkError } from './errors.js';
import { Fetcher } from './fetcher.js';
import { SessionHarvester, harvestMode, type SessionHarvesterOptions } from './harvest.js';
import { jsonResponse, questionPage, recordingTransport, requestedQno, textResponse } from './testing.js';
import type { FetchRequest, FetchResult, Question, SessionMeta, TransportResponse } from './types.js';

const RANDOM_SESSION: SessionMeta = {
  label: 'r07_haru',
  year: 2025,
  startUrl: 'https://kakomon.example.com/ap/kakomon/',
  method: 'POST',
  timesCode: '07_haru',
};

const API_SESSION: SessionMeta = {
  label: 'api_2023',
  year: 2023,
  apiUrl: 'https://api.example.com/v1/questions',
};

function apiItem(no: number, answer: string | number = 'ア') {
  return { no, question: `API問題${no}`, choices: ['ア案', 'イ案', 'ウ案', 'エ案'], answer, explanation: `解説${no}` };
}

function harvesterWith(
  session: SessionMeta,
  handler: (request: FetchRequest, index: number) => TransportResponse,
  extra: Partial<SessionHarvesterOptions> = {},
) {
  const recorded = recordingTransport(handler);
  const fetcher = new Fetcher({ transport: recorded.transport, throttleMs: 0, sleep: async () => undefined });
  const harvester = new SessionHarvester({ session, fetcher, ...extra });
  return { harvester, requests: recorded.requests };
}

/** qno ごとに pool を巡回して出題する。 */
function cyclingPages(pool: string[]) {
  return (request: FetchRequest): TransportResponse => {
    const qno = requestedQno(request);
    return textResponse(pool[qno % pool.length] ?? '');
  };
}

test('harvestMode: api_url があれば API、start_url だけならランダム', () => {
  assert.equal(harvestMode(API_SESSION), 'api');
  assert.equal(harvestMode(RANDOM_SESSION), 'random');
  assert.throws(() => harvestMode({ label: 'none', year: 2025 }), ConfigError);
});

test('SessionHarvester: API はトークンを辿り尽くすと収束する', async () => {
  const { harvester, requests } = harvesterWith(API_SESSION, (request) =>
    request.params?.page === 'p2'
      ? jsonResponse({ questions: [apiItem(3)], next: null })
      : jsonResponse({ questions: [apiItem(1), apiItem(2, 1)], next: 'p2' }),
  );

  const result = await harvester.run();
  assert.equal(result.outcome, 'converged');
  assert.equal(result.mode, 'api');
  assert.equal(result.requests, 2);
  assert.deepEqual(
    result.candidates.map((question) => question.id),
    ['ap-2023-api_2023-q001', 'ap-2023-api_2023-q002', 'ap-2023-api_2023-q003'],
  );
  assert.equal(result.candidates[1]?.answerIndex, 1);
  assert.deepEqual(
    requests.map((request) => request.params),
    [undefined, { page: 'p2' }],
  );
  assert.deepEqual(result.transitions, [
    'idle',
    'fetching',
    'extracting',
    'continuing',
    'fetching',
    'extracting',
    'converged',
  ]);
  assert.equal(harvester.currentState, 'converged');
});

test('SessionHarvester: API の継続トークンが循環したら失敗', async () => {
  const { harvester } = harvesterWith(API_SESSION, () => jsonResponse({ questions: [apiItem(1)], next: 'same' }));

  const result = await harvester.run();
  assert.equal(result.outcome, 'failed');
  assert.ok(result.error instanceof ExtractionError);
  assert.equal(result.requests, 2);
});

test('SessionHarvester: API は maxRequests で打ち切る', async () => {
  let page = 0;
  const { harvester } = harvesterWith(
    API_SESSION,
    () => {
      page += 1;
      return jsonResponse({ questions: [apiItem(page)], next: `p${page + 1}` });
    },
    { limits: { maxRequests: 2 } },
  );

  const result = await harvester.run();
  assert.equal(result.outcome, 'capped');
  assert.equal(result.requests, 2);
  assert.equal(result.candidates.length, 2);
});

test('SessionHarvester: API の抽出失敗はキャッシュを飛ばして同じページを取り直す', async () => {
  const cache = new MemoryResponseCache();
  const { transport, requests } = recordingTransport((_, index) =>
    index === 0 ? textResponse('<html>maintenance</html>') : jsonResponse({ questions: [apiItem(1)], next: null }),
  );
  const fetcher = new Fetcher({ transport, cache, throttleMs: 0, sleep: async () => undefined });

  const result = await new SessionHarvester({
    session: API_SESSION,
    fetcher,
    limits: { extractionTolerance: 3 },
  }).run();

  assert.equal(result.outcome, 'converged');
  assert.equal(result.requests, 2);
  assert.equal(result.cacheHits, 0);
  assert.equal(result.extractionFailures, 1);
  assert.equal(result.candidates.length, 1);
  assert.equal(requests.length, 2);
  assert.deepEqual(result.transitions, [
    'idle',
    'fetching',
    'extracting',
    'continuing',
    'fetching',
    'extracting',
    'converged',
  ]);
  assert.deepEqual(
    [...cache.entries.values()].map((entry) => entry.contentType),
    ['application/json'],
  );
});

test('SessionHarvester: API の抽出失敗が許容回数を超えたら失敗', async () => {
  const { harvester } = harvesterWith(API_SESSION, () => textResponse('<html>maintenance</html>'), {
    limits: { extractionTolerance: 2 },
  });

  const result = await harvester.run();
  assert.equal(result.outcome, 'failed');
  assert.ok(result.error instanceof ExtractionError);
  assert.equal(result.requests, 3);
  assert.equal(result.extractionFailures, 3);
});

test('SessionHarvester: 想定外の例外でもセッションの失敗として返す', async () => {
  const typeError = await new SessionHarvester({
    session: RANDOM_SESSION,
    fetcher: {
      fetch: async (): Promise<FetchResult> => {
        throw new TypeError('Invalid URL');
      },
    },
  }).run();
  assert.equal(typeError.outcome, 'failed');
  assert.ok(typeError.error instanceof TypeError);
  assert.equal(typeError.transitions.at(-1), 'failed');

  const thrownString = await new SessionHarvester({
    session: API_SESSION,
    fetcher: {
      fetch: async (): Promise<FetchResult> => {
        throw 'boom';
      },
    },
  }).run();
  assert.equal(thrownString.outcome, 'failed');
  assert.ok(thrownString.error instanceof HarvestError);
  assert.equal(thrownString.error.message, 'boom');
});

test('SessionHarvester: 正規化できない問題は数えて飛ばす', async () => {
  const { harvester } = harvesterWith(API_SESSION, () =>
    jsonResponse({ questions: [apiItem(1), { no: 2, question: '正解なし', choices: ['a', 'b'] }, null] }),
  );

  const result = await harvester.run();
  assert.equal(result.outcome, 'converged');
  assert.equal(result.candidates.length, 1);
  assert.equal(result.normalizationFailures, 1);
  assert.equal(result.extractionFailures, 1);
});

test('SessionHarvester: 新規が出ない回数が閾値に達したら収束する', async () => {
  const pool = [1, 2, 3].map((seq) => questionPage({ seq, text: `ランダム問題${seq}` }));
  const { harvester, requests } = harvesterWith(RANDOM_SESSION, cyclingPages(pool), {
    limits: { streakThreshold: 3 },
  });

  const result = await harvester.run();
  assert.equal(result.outcome, 'converged');
  assert.equal(result.requests, 6);
  assert.deepEqual(
    result.candidates.map((question) => question.id),
    ['ap-2025-r07_haru-q001', 'ap-2025-r07_haru-q002', 'ap-2025-r07_haru-q003'],
  );
  assert.deepEqual(requests[0]?.form, [
    ['times[]', '07_haru'],
    ['qno', '0'],
  ]);
  assert.deepEqual(requests[1]?.form, [
    ['_q', '07_haru_1'],
    ['result', '1'],
    ['times[]', '07_haru'],
    ['qno', '1'],
  ]);
  assert.equal(requests[1]?.method, 'POST');
  assert.deepEqual(requests[1]?.headers, { referer: 'https://kakomon.example.com/ap/kakomon/' });
});

test('SessionHarvester: 出題数の表示に届いたら早めに収束する', async () => {
  const pool = [1, 2, 3].map((seq) => questionPage({ seq, text: `ランダム問題${seq}`, total: 3 }));
  const { harvester } = harvesterWith(RANDOM_SESSION, cyclingPages(pool), { limits: { streakThreshold: 10 } });

  const result = await harvester.run();
  assert.equal(result.outcome, 'converged');
  assert.equal(result.requests, 3);
  assert.equal(result.candidates.length, 3);
});

test('SessionHarvester: maxQno と maxRequests で打ち切る', async () => {
  const distinct = (request: FetchRequest): TransportResponse => {
    const qno = requestedQno(request);
    return textResponse(questionPage({ seq: qno + 1, text: `別問題${qno}` }));
  };

  const byQno = await harvesterWith(RANDOM_SESSION, distinct, { limits: { maxQno: 4 } }).harvester.run();
  assert.equal(byQno.outcome, 'capped');
  assert.equal(byQno.requests, 4);
  assert.equal(byQno.candidates.length, 4);

  const byRequests = await harvesterWith(RANDOM_SESSION, distinct, { limits: { maxRequests: 2 } }).harvester.run();
  assert.equal(byRequests.outcome, 'capped');
  assert.equal(byRequests.requests, 2);
});

test('SessionHarvester: 再開時は既出を数えず連番を続きから振る', async () => {
  const session: SessionMeta = { ...RANDOM_SESSION, method: 'GET' };
  const existing: Question[] = [1, 2, 3].map((seq) => ({
    id: `ap-2025-r07_haru-q00${seq}`,
    category: 'テクノロジ系/ネットワーク',
    year: 2025,
    text: `既存問題${seq}`,
    choices: ['選択肢ア', '選択肢イ', '選択肢ウ', '選択肢エ'],
    answerIndex: 0,
    explanation: '解説文です。',
    sourceUrl: '',
  }));
  existing.push({ ...existing[0], id: 'ap-2025-haru-q010', text: '別セッションの問題' });
  const pool = [questionPage({ text: '既存問題1' }), questionPage({ text: '新しい問題' })];
  const { harvester, requests } = harvesterWith(session, cyclingPages(pool), {
    resumeFrom: existing,
    limits: { streakThreshold: 2 },
  });

  const result = await harvester.run();
  assert.equal(result.outcome, 'converged');
  assert.deepEqual(
    result.candidates.map((question) => [question.id, question.text]),
    [['ap-2025-r07_haru-q004', '新しい問題']],
  );
  assert.deepEqual(requests[0]?.params, { 'times[]': '07_haru', qno: '0' });
});

test('SessionHarvester: 抽出失敗が許容回数を超えたら失敗', async () => {
  const broken = '<h3 class="qno">問1</h3><ul class="selectList"><li>a</li><li>b</li></ul>';
  const { harvester } = harvesterWith(RANDOM_SESSION, () => textResponse(broken), {
    limits: { extractionTolerance: 2 },
  });

  const result = await harvester.run();
  assert.equal(result.outcome, 'failed');
  assert.ok(result.error instanceof ExtractionError);
  assert.equal(result.requests, 3);
  assert.equal(result.extractionFailures, 3);
});

test('SessionHarvester: 取得に失敗しても得られた候補は返す', async () => {
  const { harvester } = harvesterWith(RANDOM_SESSION, (_, index) =>
    index === 0 ? textResponse(questionPage({ seq: 1, text: '最初の問題' })) : textResponse('not found', 404),
  );

  const result = await harvester.run();
  assert.equal(result.outcome, 'failed');
  assert.ok(result.error instanceof NetworkError);
  assert.equal(result.candidates.length, 1);
  assert.equal(result.transitions.at(-1), 'failed');
});

test('SessionHarvester: 中断されたら aborted で候補を返す', async () => {
  const controller = new AbortController();
  let calls = 0;
  const fetcher = {
    fetch: async (request: FetchRequest): Promise<FetchResult> => {
      calls += 1;
      if (calls === 2) {
        controller.abort();
      }
      const qno = requestedQno(request);
      return {
        key: String(qno),
        status: 200,
        contentType: 'text/html',
        body: questionPage({ seq: qno + 1, text: `問題${qno}` }),
        fromCache: false,
      };
    },
  };
  const harvester = new SessionHarvester({ session: RANDOM_SESSION, fetcher, signal: controller.signal });

  const result = await harvester.run();
  assert.equal(result.outcome, 'aborted');
  assert.equal(result.requests, 2);
  assert.equal(result.candidates.length, 2);
});

test('SessionHarvester: キャッシュ命中を数える', async () => {
  const pool = [questionPage({ seq: 1, text: '同じ問題' })];
  const fetcher = {
    fetch: async (request: FetchRequest): Promise<FetchResult> => ({
      key: 'k',
      status: 200,
      contentType: 'text/html',
      body: pool[0] ?? '',
      fromCache: requestedQno(request) > 0,
    }),
  };
  const result = await new SessionHarvester({
    session: RANDOM_SESSION,
    fetcher,
    limits: { streakThreshold: 2 },
  }).run();

  assert.equal(result.requests, 3);
  assert.equal(result.cacheHits, 2);
});
