export interface Question {
  id: string;
  category: string;
  year: number;
  text: string;
  choices: string[];
  answerIndex: number;
  explanation: string;
  sourceUrl: string;
}

export interface Dataset {
  version: number;
  generatedAt: string;
  sourceSessions: string[];
  questions: Question[];
}

export type MergePolicy = 'preferNew' | 'preferExisting';

export type HttpMethod = 'GET' | 'POST';

/**
 * 収集対象の1回分の試験。実行中に書き換えない。
 */
export interface SessionMeta {
  readonly label: string;
  readonly year: number;
  readonly apiUrl?: string;
  readonly startUrl?: string;
  readonly category?: string;
  readonly code?: string;
  readonly method?: HttpMethod;
  readonly timesCode?: string;
}

export type HarvestMode = 'api' | 'random';

export type FormField = [name: string, value: string];

export interface FetchRequest {
  url: string;
  method?: HttpMethod;
  params?: Record<string, string>;
  form?: FormField[];
  headers?: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  headers: Headers;
  body: string;
}

export type Transport = (request: FetchRequest, signal: AbortSignal) => Promise<TransportResponse>;

export interface FetchResult {
  key: string;
  status: number;
  contentType: string;
  body: string;
  fromCache: boolean;
}

export interface CacheEntry {
  key: string;
  url: string;
  method: HttpMethod;
  status: number;
  contentType: string;
  body: string;
  fetchedAt: string;
}

export interface ResponseCache {
  get(key: string): Promise<CacheEntry | undefined>;
  set(entry: CacheEntry): Promise<void>;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterMs: number;
}

export type RawAnswer = { kind: 'index'; value: number } | { kind: 'marker'; value: string };

interface RawQuestionBase {
  sequence?: number;
  eraYearLabel?: string;
  categoryText?: string;
  text: string;
  choices: string[];
  answer?: RawAnswer;
  explanation: string;
  sourceUrl?: string;
}

export interface ApiRawQuestion extends RawQuestionBase {
  source: 'api';
}

export interface HtmlRawQuestion extends RawQuestionBase {
  source: 'html';
}

/**
 * 正規化前の取得元ネイティブな問題。
 */
export type RawQuestion = ApiRawQuestion | HtmlRawQuestion;

export interface ApiExtraction {
  candidates: ApiRawQuestion[];
  failures: Error[];
  continuation: { type: 'next'; token: string } | { type: 'done' };
}

export interface HtmlExtraction {
  candidates: HtmlRawQuestion[];
  continuation: { type: 'again' };
  totalHint?: number;
  formState: FormField[];
}

export type HarvestState =
  | 'idle'
  | 'fetching'
  | 'extracting'
  | 'continuing'
  | 'converged'
  | 'capped'
  | 'failed'
  | 'aborted';

export type SessionOutcome = Extract<HarvestState, 'converged' | 'capped' | 'failed' | 'aborted'>;

export interface HarvestLimits {
  maxRequests: number;
  maxQno: number;
  streakThreshold: number;
  extractionTolerance: number;
}

export interface SessionResult {
  session: SessionMeta;
  mode: HarvestMode;
  outcome: SessionOutcome;
  requests: number;
  cacheHits: number;
  candidates: Question[];
  normalizationFailures: number;
  extractionFailures: number;
  transitions: HarvestState[];
  error?: Error;
}

export interface ValidationReport {
  total: number;
  perYear: Record<string, number>;
  perCategory: Record<string, number>;
}

export interface ValidationResult {
  accepted: Question[];
  rejected: number;
  duplicates: number;
  errors: string[];
  report: ValidationReport;
}

export interface MergeResult {
  dataset: Dataset;
  insertedCount: number;
  replacedCount: number;
  changed: boolean;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface CliOptions {
  sessions: string;
  outPath: string;
  inputPath?: string;
  sessionsPath: string;
  resume: boolean;
  maxRequests: number;
  maxQno: number;
  streakThreshold: number;
  throttleMs: number;
  timeoutMs: number;
  retry: number;
  cacheEnabled: boolean;
  cacheDir: string;
  policy: MergePolicy;
  idPrefix: string;
  parallel: boolean;
  listSessions: boolean;
  discoverUrl?: string;
}
