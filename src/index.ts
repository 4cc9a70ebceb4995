import process from 'node:process';
import { parseArgs } from './args.js';
import { fetchDiscoveredSessions, formatRunReport, runHarvest } from './pipeline.js';
import { loadSessionConfig, resolveSessions } from './sessions.js';
import { consoleLogger } from './utils.js';
import type { SessionMeta } from './types.js';

export { parseArgs };
export { FileResponseCache, MemoryResponseCache, cacheKey, requestSignature } from './cache.js';
export {
  ConfigError,
  ExtractionError,
  HarvestError,
  NetworkError,
  NormalizationError,
  RateLimitError,
  ValidationError,
} from './errors.js';
export { extractFromApi, extractFromHtml } from './extract.js';
export { Fetcher, Throttle, backoffDelay, createFetchTransport, parseRetryAfter } from './fetcher.js';
export { SessionHarvester, harvestMode } from './harvest.js';
export { emptyDataset, mergeDataset } from './merge.js';
export {
  answerMarkerToIndex,
  eraToGregorian,
  normalizeCategory,
  normalizeQuestion,
  questionIdentity,
} from './normalize.js';
export { fetchDiscoveredSessions, formatRunReport, runHarvest } from './pipeline.js';
export { discoverSessions, loadSessionConfig, parseSessionConfig, resolveSessions } from './sessions.js';
export { loadDataset, repairDataset, writeDataset } from './storage.js';
export { assertQuestion, isQuestion, summarizeQuestions, validateQuestions } from './validate.js';
export type * from './types.js';

function describeSession(session: SessionMeta): string {
  const source = session.apiUrl ?? session.startUrl ?? '';
  const code = session.timesCode ? ` times=${session.timesCode}` : '';
  return `${session.label}\t${session.year}\t${source}${code}`;
}

/**
 * CLIのメイン処理を実行し、終了コードを返す。
 */
export async function runCli(argv: string[]): Promise<number> {
  const options = parseArgs(argv);
  const logger = consoleLogger;

  if (options.listSessions) {
    const sessions = options.discoverUrl
      ? await fetchDiscoveredSessions(options.discoverUrl, options, { logger })
      : [...(await loadSessionConfig(options.sessionsPath)).values()];
    for (const session of sessions) {
      logger.info(describeSession(session));
    }
    return 0;
  }

  const table = await loadSessionConfig(options.sessionsPath);
  const sessions = resolveSessions(options.sessions, table);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('中断を受け付けました。取得済みの分を書き出して終了します');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await runHarvest(
      {
        sessions,
        outPath: options.outPath,
        inputPath: options.inputPath,
        resume: options.resume,
        limits: {
          maxRequests: options.maxRequests,
          maxQno: options.maxQno,
          streakThreshold: options.streakThreshold,
        },
        throttleMs: options.throttleMs,
        timeoutMs: options.timeoutMs,
        retry: options.retry,
        cacheEnabled: options.cacheEnabled,
        cacheDir: options.cacheDir,
        policy: options.policy,
        idPrefix: options.idPrefix,
        parallel: options.parallel,
      },
      { signal: controller.signal, logger },
    );

    for (const line of formatRunReport(report, options.outPath)) {
      logger.info(line);
    }
    const failed = report.sessions.filter((result) => result.outcome === 'failed');
    if (failed.length > 0 && failed.length < report.sessions.length) {
      logger.warn(`失敗したセッションがあります: ${failed.map((result) => result.session.label).join(', ')}`);
      if (!report.written) {
        logger.warn('書き出した結果がないため失敗として終了します');
      }
    }
    return report.exitCode;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
