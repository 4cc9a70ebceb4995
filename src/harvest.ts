import {
  DEFAULT_EXTRACTION_TOLERANCE,
  DEFAULT_ID_PREFIX,
  DEFAULT_MAX_QNO,
  DEFAULT_MAX_REQUESTS,
  DEFAULT_STREAK_THRESHOLD,
} from './config.js';
import { ConfigError, ExtractionError, HarvestError, isAbortError, toErrorMessage } from './errors.js';
import { extractFromApi, extractFromHtml } from './extract.js';
import type { FetchOptions, Fetcher } from './fetcher.js';
import { normalizeQuestion, parseSequenceFromId, questionIdentity, sessionIdPrefix } from './normalize.js';
import { silentLogger, throwIfAborted } from './utils.js';
import type {
  ApiExtraction,
  FetchRequest,
  FetchResult,
  FormField,
  HarvestLimits,
  HarvestMode,
  HarvestState,
  HtmlExtraction,
  Logger,
  Question,
  RawQuestion,
  SessionMeta,
  SessionOutcome,
  SessionResult,
} from './types.js';

export const DEFAULT_LIMITS: HarvestLimits = {
  maxRequests: DEFAULT_MAX_REQUESTS,
  maxQno: DEFAULT_MAX_QNO,
  streakThreshold: DEFAULT_STREAK_THRESHOLD,
  extractionTolerance: DEFAULT_EXTRACTION_TOLERANCE,
};

/**
 * api_url があればページ送りAPI、なければ start_url のランダム出題として扱う。
 */
export function harvestMode(session: SessionMeta): HarvestMode {
  if (session.apiUrl) {
    return 'api';
  }
  if (session.startUrl) {
    return 'random';
  }
  throw new ConfigError(`api_url も start_url もありません: ${session.label}`);
}

export interface SessionHarvesterOptions {
  session: SessionMeta;
  fetcher: Pick<Fetcher, 'fetch'>;
  limits?: Partial<HarvestLimits>;
  idPrefix?: string;
  /** 前回までに保存済みの問題。既出判定と連番の初期化に使う。 */
  resumeFrom?: Question[];
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * 1セッション分の収集を行う状態機械。
 */
export class SessionHarvester {
  private readonly session: SessionMeta;
  private readonly mode: HarvestMode;
  private readonly fetcher: Pick<Fetcher, 'fetch'>;
  private readonly limits: HarvestLimits;
  private readonly idPrefix: string;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  private state: HarvestState = 'idle';
  private readonly transitions: HarvestState[] = ['idle'];
  private readonly seen = new Set<string>();
  private readonly candidates: Question[] = [];
  private nextSequence = 1;
  private requests = 0;
  private cacheHits = 0;
  private normalizationFailures = 0;
  private extractionFailures = 0;
  private consecutiveExtractionFailures = 0;

  constructor(options: SessionHarvesterOptions) {
    this.session = options.session;
    this.mode = harvestMode(options.session);
    this.fetcher = options.fetcher;
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.idPrefix = options.idPrefix ?? DEFAULT_ID_PREFIX;
    this.signal = options.signal;
    this.logger = options.logger ?? silentLogger;

    const prefix = sessionIdPrefix(this.session, this.idPrefix);
    for (const question of options.resumeFrom ?? []) {
      const sequence = parseSequenceFromId(question.id, prefix);
      if (sequence === undefined) {
        continue;
      }
      this.seen.add(questionIdentity(question));
      this.nextSequence = Math.max(this.nextSequence, sequence + 1);
    }
  }

  get currentState(): HarvestState {
    return this.state;
  }

  /**
   * 収束・上限・失敗・中断のいずれかに達するまで収集する。
   * 失敗や中断でも、それまでに得た候補は結果に含めて返す。
   */
  async run(): Promise<SessionResult> {
    this.logger.info(`==> セッション: ${this.session.label} (year=${this.session.year}, mode=${this.mode})`);
    try {
      const outcome = this.mode === 'api' ? await this.runApi() : await this.runRandom();
      return this.finish(outcome);
    } catch (error) {
      if (isAbortError(error) || this.signal?.aborted) {
        this.logger.warn(`中断しました: ${this.session.label}`);
        return this.finish('aborted');
      }
      const failure = error instanceof Error ? error : new HarvestError(toErrorMessage(error));
      this.logger.error(`セッション失敗: ${this.session.label}: ${toErrorMessage(failure)}`);
      return this.finish('failed', failure);
    }
  }

  private transition(next: HarvestState): void {
    this.state = next;
    this.transitions.push(next);
  }

  private finish(outcome: SessionOutcome, error?: Error): SessionResult {
    this.transition(outcome);
    this.logger.info(
      `<== ${this.session.label}: ${outcome} requests=${this.requests} cache=${this.cacheHits} candidates=${this.candidates.length}`,
    );
    return {
      session: this.session,
      mode: this.mode,
      outcome,
      requests: this.requests,
      cacheHits: this.cacheHits,
      candidates: [...this.candidates],
      normalizationFailures: this.normalizationFailures,
      extractionFailures: this.extractionFailures,
      transitions: [...this.transitions],
      error,
    };
  }

  private async fetchPage(request: FetchRequest, options?: FetchOptions): Promise<FetchResult> {
    throwIfAborted(this.signal);
    this.transition('fetching');
    const page = await this.fetcher.fetch(request, options);
    this.requests += 1;
    if (page.fromCache) {
      this.cacheHits += 1;
    }
    this.transition('extracting');
    return page;
  }

  private recordExtractionFailure(error: Error): void {
    this.extractionFailures += 1;
    this.consecutiveExtractionFailures += 1;
    this.logger.warn(`抽出失敗 (${this.consecutiveExtractionFailures}回連続): ${error.message}`);
    if (this.consecutiveExtractionFailures > this.limits.extractionTolerance) {
      throw new ExtractionError(`抽出失敗が${this.consecutiveExtractionFailures}回連続しました`, { cause: error });
    }
  }

  /**
   * 候補を正規化して取り込む。新しい内容なら true。
   */
  private accept(raw: RawQuestion, keepDuplicates: boolean): boolean {
    const sequence = raw.sequence ?? this.nextSequence;
    const normalized = normalizeQuestion(raw, this.session, sequence, this.idPrefix);
    if (!normalized.ok) {
      this.normalizationFailures += 1;
      this.logger.warn(`正規化失敗: ${normalized.error.message}`);
      return false;
    }
    const identity = questionIdentity(normalized.question);
    const isNew = !this.seen.has(identity);
    if (!isNew && !keepDuplicates) {
      return false;
    }
    this.seen.add(identity);
    this.nextSequence = Math.max(this.nextSequence, sequence + 1);
    this.candidates.push(normalized.question);
    return isNew;
  }

  private async runApi(): Promise<SessionOutcome> {
    const apiUrl = this.session.apiUrl ?? '';
    const usedTokens = new Set<string>();
    let token: string | undefined;
    let refresh = false;

    while (true) {
      if (this.requests >= this.limits.maxRequests) {
        return 'capped';
      }
      const page = await this.fetchPage({ url: apiUrl, params: token ? { page: token } : undefined }, { refresh });
      let extraction: ApiExtraction;
      try {
        extraction = extractFromApi(page.body);
        this.consecutiveExtractionFailures = 0;
        refresh = false;
      } catch (error) {
        if (!(error instanceof ExtractionError)) {
          throw error;
        }
        // 壊れた本文もキャッシュされているので、同じページをキャッシュを飛ばして取り直す
        this.recordExtractionFailure(error);
        refresh = true;
        this.transition('continuing');
        continue;
      }
      for (const failure of extraction.failures) {
        this.extractionFailures += 1;
        this.logger.warn(`抽出失敗: ${failure.message}`);
      }
      for (const candidate of extraction.candidates) {
        this.accept(candidate, true);
      }
      this.logger.info(`page=${token ?? '(first)'} 件数=${extraction.candidates.length} cache=${page.fromCache}`);

      if (extraction.continuation.type === 'done') {
        return 'converged';
      }
      token = extraction.continuation.token;
      if (usedTokens.has(token)) {
        throw new ExtractionError(`継続トークンが循環しています: ${token}`);
      }
      usedTokens.add(token);
      this.transition('continuing');
    }
  }

  private randomRequest(qno: number, formState: FormField[]): FetchRequest {
    const startUrl = this.session.startUrl ?? '';
    const fields: FormField[] = formState.filter(([name]) => name !== 'times[]');
    if (this.session.timesCode) {
      fields.push(['times[]', this.session.timesCode]);
    }
    fields.push(['qno', String(qno)]);
    if (this.session.method === 'POST') {
      return { url: startUrl, method: 'POST', form: fields, headers: { referer: startUrl } };
    }
    return { url: startUrl, params: Object.fromEntries(fields) };
  }

  private async runRandom(): Promise<SessionOutcome> {
    let formState: FormField[] = [];
    let streak = 0;
    let totalHint: number | undefined;

    for (let qno = 0; ; qno += 1) {
      if (streak >= this.limits.streakThreshold) {
        return 'converged';
      }
      if (totalHint !== undefined && this.seen.size >= totalHint) {
        return 'converged';
      }
      if (this.requests >= this.limits.maxRequests || qno >= this.limits.maxQno) {
        return 'capped';
      }

      const page = await this.fetchPage(this.randomRequest(qno, formState));
      let extraction: HtmlExtraction;
      try {
        extraction = extractFromHtml(page.body, this.session.startUrl);
        this.consecutiveExtractionFailures = 0;
      } catch (error) {
        if (!(error instanceof ExtractionError)) {
          throw error;
        }
        this.recordExtractionFailure(error);
        streak += 1;
        this.transition('continuing');
        continue;
      }

      formState = extraction.formState;
      totalHint = extraction.totalHint ?? totalHint;
      let fresh = 0;
      for (const candidate of extraction.candidates) {
        if (this.accept(candidate, false)) {
          fresh += 1;
        }
      }
      streak = fresh > 0 ? 0 : streak + 1;
      this.logger.info(
        `qno=${qno} 新規=${fresh} 既出=${this.seen.size} streak=${streak}${totalHint !== undefined ? `/total=${totalHint}` : ''} cache=${page.fromCache}`,
      );
      this.transition('continuing');
    }
  }
}
