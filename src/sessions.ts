import fs from 'node:fs/promises';
import { load } from 'cheerio';
import { ConfigError, NormalizationError } from './errors.js';
import { eraToGregorian } from './normalize.js';
import { collapseText } from './utils.js';
import type { HttpMethod, SessionMeta } from './types.js';

export type SessionTable = ReadonlyMap<string, SessionMeta>;

function optionalString(entry: Record<string, unknown>, key: string, label: string): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${label}.${key} は文字列にしてください`);
  }
  return value.trim();
}

function optionalUrl(entry: Record<string, unknown>, key: string, label: string): string | undefined {
  const value = optionalString(entry, key, label);
  if (value === undefined) {
    return undefined;
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`${label}.${key} がURLとして解釈できません: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`${label}.${key} は http(s) のURLにしてください: ${value}`);
  }
  return value;
}

function parseYear(entry: Record<string, unknown>, label: string): number {
  if (typeof entry.year === 'number' && Number.isInteger(entry.year)) {
    return entry.year;
  }
  const text = typeof entry.year === 'string' ? entry.year : label;
  try {
    return eraToGregorian(text);
  } catch (error) {
    if (error instanceof NormalizationError) {
      throw new ConfigError(`${label}.year を解釈できません: ${error.message}`);
    }
    throw error;
  }
}

function parseMethod(value: string | undefined, label: string): HttpMethod | undefined {
  if (value === undefined) {
    return undefined;
  }
  const upper = value.toUpperCase();
  if (upper !== 'GET' && upper !== 'POST') {
    throw new ConfigError(`${label}.method は GET または POST を指定してください: ${value}`);
  }
  return upper;
}

function parseSessionEntry(key: string, value: unknown): SessionMeta {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`セッション設定 ${key} がオブジェクトではありません`);
  }
  const entry = value as Record<string, unknown>;
  const label = optionalString(entry, 'label', key) ?? key;
  const session: SessionMeta = {
    label,
    year: parseYear(entry, label),
    apiUrl: optionalUrl(entry, 'api_url', key),
    startUrl: optionalUrl(entry, 'start_url', key),
    category: optionalString(entry, 'category', key),
    code: optionalString(entry, 'code', key),
    method: parseMethod(optionalString(entry, 'method', key), key),
    timesCode: optionalString(entry, 'times_code', key),
  };
  if (!session.apiUrl && !session.startUrl) {
    throw new ConfigError(`セッション ${key} に api_url も start_url もありません`);
  }
  return Object.freeze(session);
}

/**
 * `{ label: { year, start_url?, api_url?, ... } }` 形式のセッション設定を解釈する。
 */
export function parseSessionConfig(parsed: unknown): SessionTable {
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('セッション設定はJSONオブジェクトにしてください');
  }
  const table = new Map<string, SessionMeta>();
  for (const [key, value] of Object.entries(parsed)) {
    const session = parseSessionEntry(key, value);
    table.set(session.label, session);
  }
  return table;
}

export async function loadSessionConfig(filePath: string): Promise<SessionTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const maybeNodeError = error as NodeJS.ErrnoException;
    if (maybeNodeError.code === 'ENOENT') {
      throw new ConfigError(`セッション設定が見つかりません: ${filePath}`);
    }
    throw error;
  }
  try {
    return parseSessionConfig(JSON.parse(content) as unknown);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`セッション設定をJSONとして読み込めません: ${filePath}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * `all` またはカンマ区切りのラベル一覧から対象セッションを選ぶ。
 */
export function resolveSessions(arg: string, table: SessionTable): SessionMeta[] {
  if (arg.trim().toLowerCase() === 'all') {
    return [...table.values()];
  }
  const labels = arg
    .split(',')
    .map((label) => label.trim())
    .filter(Boolean);
  if (labels.length === 0) {
    throw new ConfigError('セッションを1つ以上指定してください');
  }
  const missing = labels.filter((label) => !table.has(label));
  if (missing.length > 0) {
    throw new ConfigError(`未知のセッションです: ${missing.join(', ')}`);
  }
  return [...new Set(labels)].flatMap((label) => {
    const session = table.get(label);
    return session ? [session] : [];
  });
}

/**
 * 出題設定ページの `times[]` チェックボックスからセッション候補を列挙する。
 * 年度を解釈できないラベルは飛ばす。
 */
export function discoverSessions(html: string, startUrl: string): SessionMeta[] {
  const $ = load(html);
  const sessions: SessionMeta[] = [];
  $('input[name="times[]"]').each((_, element) => {
    const input = $(element);
    const code = input.attr('value');
    if (!code) {
      return;
    }
    const id = input.attr('id');
    const parent = input.parent();
    const labelText = parent.is('label')
      ? collapseText(parent.text())
      : id
        ? collapseText($(`label[for="${id}"]`).first().text())
        : '';
    if (!labelText) {
      return;
    }
    let year: number;
    try {
      year = eraToGregorian(labelText);
    } catch (error) {
      if (error instanceof NormalizationError) {
        return;
      }
      throw error;
    }
    const session: SessionMeta = {
      label: labelText,
      year,
      startUrl,
      method: 'POST',
      timesCode: code,
      code: /^[A-Za-z0-9_]+$/.test(code) ? code : undefined,
    };
    sessions.push(Object.freeze(session));
  });
  return sessions;
}
