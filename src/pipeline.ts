import { FileResponseCache } from './cache.js';
import { DEFAULT_RETRY_POLICY } from './config.js';
import { HarvestError, toErrorMessage } from './errors.js';
import { Fetcher, type SleepFn } from './fetcher.js';
import { SessionHarvester } from './harvest.js';
import { mergeDataset } from './merge.js';
import { discoverSessions } from './sessions.js';
import { loadDataset, writeDataset } from './storage.js';
import { silentLogger } from './utils.js';
import { summarizeQuestions, validateQuestions } from './validate.js';
import type {
  HarvestLimits,
  Logger,
  MergePolicy,
  MergeResult,
  Question,
  ResponseCache,
  SessionMeta,
  SessionResult,
  Transport,
  ValidationReport,
  ValidationResult,
} from './types.js';

export interface HarvestRunOptions {
  sessions: SessionMeta[];
  outPath: string;
  /** マージ元データセット。未指定なら既存の outPath を使う。 */
  inputPath?: string;
  resume: boolean;
  limits: Partial<HarvestLimits>;
  throttleMs: number;
  timeoutMs: number;
  retry: number;
  cacheEnabled: boolean;
  cacheDir: string;
  policy: MergePolicy;
  idPrefix: string;
  parallel: boolean;
}

/**
 * テストや呼び出し側から差し替える外部依存。
 */
export interface PipelineDeps {
  transport?: Transport;
  cache?: ResponseCache;
  sleep?: SleepFn;
  now?: () => Date;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface HarvestRunReport {
  sessions: SessionResult[];
  validation: ValidationResult;
  merge: MergeResult;
  summary: ValidationReport;
  droppedIds: string[];
  written: boolean;
  exitCode: number;
}

type FetcherSettings = Pick<HarvestRunOptions, 'throttleMs' | 'timeoutMs' | 'retry' | 'cacheEnabled' | 'cacheDir'>;

function createFetcherFactory(options: FetcherSettings, deps: PipelineDeps): () => Fetcher {
  const cache = options.cacheEnabled ? (deps.cache ?? new FileResponseCache(options.cacheDir)) : undefined;
  return () =>
    new Fetcher({
      cache,
      throttleMs: options.throttleMs,
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: options.retry },
      timeoutMs: options.timeoutMs,
      transport: deps.transport,
      sleep: deps.sleep,
      signal: deps.signal,
      logger: deps.logger,
    });
}

function contributingSessions(results: SessionResult[], accepted: Question[]): string[] {
  const acceptedIds = new Set(accepted.map((question) => question.id));
  return results
    .filter((result) => result.candidates.some((question) => acceptedIds.has(question.id)))
    .map((result) => result.session.label);
}

function failedResult(session: SessionMeta, reason: unknown, logger: Logger): SessionResult {
  const error = reason instanceof Error ? reason : new HarvestError(toErrorMessage(reason));
  logger.error(`セッション失敗: ${session.label}: ${toErrorMessage(error)}`);
  return {
    session,
    mode: session.apiUrl ? 'api' : 'random',
    outcome: 'failed',
    requests: 0,
    cacheHits: 0,
    candidates: [],
    normalizationFailures: 0,
    extractionFailures: 0,
    transitions: ['idle', 'failed'],
    error,
  };
}

/**
 * 中断があれば130、全セッション失敗なら1。
 * 一部失敗は、残りの結果を書き出せたときだけ0とする。
 */
function decideExitCode(results: SessionResult[], written: boolean): number {
  if (results.some((result) => result.outcome === 'aborted')) {
    return 130;
  }
  const failed = results.filter((result) => result.outcome === 'failed').length;
  if (results.length > 0 && failed === results.length) {
    return 1;
  }
  if (failed > 0 && !written) {
    return 1;
  }
  return 0;
}

/**
 * 指定セッションを収集し、検証・マージしてデータセットを書き出す。
 * 失敗・中断したセッションがあっても、得られた分は書き出す。
 */
export async function runHarvest(options: HarvestRunOptions, deps: PipelineDeps = {}): Promise<HarvestRunReport> {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());

  const basePath = options.inputPath ?? options.outPath;
  const loaded = await loadDataset(basePath);
  if (loaded && loaded.droppedIds.length > 0) {
    logger.warn(`既存データの不正な問題を${loaded.droppedIds.length}件除外しました: ${loaded.droppedIds.join(', ')}`);
  }
  const resumeFrom = options.resume ? (loaded?.dataset.questions ?? []) : [];

  const createFetcher = createFetcherFactory(options, deps);
  const harvest = async (session: SessionMeta, fetcher: Fetcher): Promise<SessionResult> =>
    new SessionHarvester({
      session,
      fetcher,
      limits: options.limits,
      idPrefix: options.idPrefix,
      resumeFrom,
      signal: deps.signal,
      logger,
    }).run();

  let results: SessionResult[];
  if (options.parallel) {
    const settled = await Promise.allSettled(options.sessions.map((session) => harvest(session, createFetcher())));
    results = settled.map((outcome, index) =>
      outcome.status === 'fulfilled' ? outcome.value : failedResult(options.sessions[index], outcome.reason, logger),
    );
  } else {
    const shared = createFetcher();
    results = [];
    for (const session of options.sessions) {
      try {
        results.push(await harvest(session, shared));
      } catch (error) {
        results.push(failedResult(session, error, logger));
      }
    }
  }

  const validation = validateQuestions(results.flatMap((result) => result.candidates));
  for (const message of validation.errors) {
    logger.warn(`検証エラー: ${message}`);
  }

  const merge = mergeDataset(
    loaded?.dataset,
    { questions: validation.accepted, sessions: contributingSessions(results, validation.accepted) },
    options.policy,
    now(),
  );

  // 入力と出力が別ファイルなら、変更がなくてもマージ結果を出力側へ書く。
  const written = merge.changed || (loaded !== undefined && basePath !== options.outPath);
  if (written) {
    await writeDataset(options.outPath, merge.dataset);
  }

  return {
    sessions: results,
    validation,
    merge,
    summary: summarizeQuestions(merge.dataset.questions),
    droppedIds: loaded?.droppedIds ?? [],
    written,
    exitCode: decideExitCode(results, written),
  };
}

/**
 * 実行結果を人が読む要約行へ整形する。
 */
export function formatRunReport(report: HarvestRunReport, outPath: string): string[] {
  const lines: string[] = [];
  for (const result of report.sessions) {
    const error = result.error ? ` error=${result.error.message}` : '';
    lines.push(
      `${result.session.label}: ${result.outcome} (candidates=${result.candidates.length}, requests=${result.requests}, cache=${result.cacheHits}, 正規化失敗=${result.normalizationFailures}, 抽出失敗=${result.extractionFailures})${error}`,
    );
  }
  const { validation, merge, summary } = report;
  lines.push(
    `accepted=${validation.accepted.length} rejected=${validation.rejected} duplicates=${validation.duplicates}`,
  );
  lines.push(
    `inserted=${merge.insertedCount} replaced=${merge.replacedCount} changed=${merge.changed} version=${merge.dataset.version}`,
  );
  lines.push(report.written ? `書き出しました: ${outPath}` : `変更なし: ${outPath}`);
  lines.push(`Total questions: ${summary.total}`);
  lines.push('Per-year:');
  for (const [year, count] of Object.entries(summary.perYear)) {
    lines.push(`  ${year}: ${count}`);
  }
  lines.push('Per-category:');
  for (const [category, count] of Object.entries(summary.perCategory)) {
    lines.push(`  ${category}: ${count}`);
  }
  return lines;
}

/**
 * 出題設定ページを取得し、選択可能なセッションを列挙する。
 */
export async function fetchDiscoveredSessions(
  url: string,
  options: FetcherSettings,
  deps: PipelineDeps = {},
): Promise<SessionMeta[]> {
  const fetcher = createFetcherFactory(options, deps)();
  const page = await fetcher.fetch({ url });
  return discoverSessions(page.body, url);
}
