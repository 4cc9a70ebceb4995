import {
  DEFAULT_CACHE_DIR,
  DEFAULT_ID_PREFIX,
  DEFAULT_MAX_QNO,
  DEFAULT_MAX_REQUESTS,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_RETRY_POLICY,
  DEFAULT_SESSIONS_PATH,
  DEFAULT_STREAK_THRESHOLD,
  DEFAULT_THROTTLE_MS,
  DEFAULT_TIMEOUT_MS,
} from './config.js';
import { ConfigError } from './errors.js';
import type { CliOptions } from './types.js';

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} に値を指定してください`);
  }
  return value;
}

function parseInteger(value: string, flag: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${flag} は${min}以上の整数にしてください: ${value}`);
  }
  return parsed;
}

/**
 * CLI引数を解釈し、処理に必要なオプションを構築する。
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    sessions: '',
    outPath: DEFAULT_OUTPUT_PATH,
    sessionsPath: DEFAULT_SESSIONS_PATH,
    resume: false,
    maxRequests: DEFAULT_MAX_REQUESTS,
    maxQno: DEFAULT_MAX_QNO,
    streakThreshold: DEFAULT_STREAK_THRESHOLD,
    throttleMs: DEFAULT_THROTTLE_MS,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    retry: DEFAULT_RETRY_POLICY.maxAttempts,
    cacheEnabled: true,
    cacheDir: DEFAULT_CACHE_DIR,
    policy: 'preferNew',
    idPrefix: DEFAULT_ID_PREFIX,
    parallel: false,
    listSessions: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--sessions':
        options.sessions = requireValue(argv, ++i, arg);
        break;
      case '--out':
        options.outPath = requireValue(argv, ++i, arg);
        break;
      case '--input':
        options.inputPath = requireValue(argv, ++i, arg);
        break;
      case '--sessions-file':
        options.sessionsPath = requireValue(argv, ++i, arg);
        break;
      case '--resume':
        options.resume = true;
        break;
      case '--max-requests':
        options.maxRequests = parseInteger(requireValue(argv, ++i, arg), arg, 1);
        break;
      case '--max-qno':
        options.maxQno = parseInteger(requireValue(argv, ++i, arg), arg, 1);
        break;
      case '--streak':
        options.streakThreshold = parseInteger(requireValue(argv, ++i, arg), arg, 1);
        break;
      case '--throttle': {
        const value = requireValue(argv, ++i, arg);
        const seconds = Number(value);
        if (!Number.isFinite(seconds) || seconds < 0) {
          throw new ConfigError(`--throttle は0以上の秒数にしてください: ${value}`);
        }
        options.throttleMs = Math.round(seconds * 1000);
        break;
      }
      case '--timeout-ms':
        options.timeoutMs = parseInteger(requireValue(argv, ++i, arg), arg, 1);
        break;
      case '--retry':
        options.retry = parseInteger(requireValue(argv, ++i, arg), arg, 1);
        break;
      case '--no-cache':
        options.cacheEnabled = false;
        break;
      case '--cache-dir':
        options.cacheDir = requireValue(argv, ++i, arg);
        break;
      case '--policy': {
        const value = requireValue(argv, ++i, arg);
        if (value !== 'preferNew' && value !== 'preferExisting') {
          throw new ConfigError(`--policy は preferNew または preferExisting を指定してください: ${value}`);
        }
        options.policy = value;
        break;
      }
      case '--id-prefix':
        options.idPrefix = requireValue(argv, ++i, arg);
        break;
      case '--parallel':
        options.parallel = true;
        break;
      case '--list-sessions':
        options.listSessions = true;
        break;
      case '--discover-url':
        options.discoverUrl = requireValue(argv, ++i, arg);
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ConfigError(`未対応オプションです: ${arg}`);
        }
        throw new ConfigError(`余分な引数です: ${arg}`);
    }
  }

  if (!options.listSessions && !options.sessions.trim()) {
    throw new ConfigError('--sessions に all またはセッション名を指定してください');
  }
  if (!/^[A-Za-z0-9_-]+$/.test(options.idPrefix)) {
    throw new ConfigError(`--id-prefix は英数字・_・- で指定してください: ${options.idPrefix}`);
  }

  return options;
}
