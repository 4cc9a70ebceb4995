import { config } from 'dotenv';

config();

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const DEFAULT_SESSIONS_PATH = process.env.KAKOMON_SESSIONS_PATH ?? 'data/sessions.json';
export const DEFAULT_OUTPUT_PATH = process.env.KAKOMON_OUTPUT_PATH ?? 'data/questions_seed.json';
export const DEFAULT_CACHE_DIR = process.env.KAKOMON_CACHE_DIR ?? '.cache/http';
export const DEFAULT_USER_AGENT = process.env.KAKOMON_USER_AGENT ?? 'kakomon-harvester/0.1 (+polite; 1 req/s)';
export const DEFAULT_TIMEOUT_MS = parseNumber(process.env.KAKOMON_TIMEOUT_MS, 20_000);
export const DEFAULT_THROTTLE_MS = parseNumber(process.env.KAKOMON_THROTTLE_MS, 1_000);

export const DEFAULT_ID_PREFIX = 'ap';
export const DEFAULT_CATEGORY = '未分類';

export const DEFAULT_MAX_REQUESTS = 200;
export const DEFAULT_MAX_QNO = 80;
/** 新規問題が出ない連続回数がこの値に達したら収束とみなす。 */
export const DEFAULT_STREAK_THRESHOLD = 10;
/** 連続した抽出失敗をここまでは許容する。 */
export const DEFAULT_EXTRACTION_TOLERANCE = 3;

export const DEFAULT_RETRY_POLICY = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  multiplier: 2,
  maxDelayMs: 30_000,
  jitterMs: 250,
} as const;
