import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { CacheEntry, FetchRequest, ResponseCache } from './types.js';

/**
 * リクエストの正規化シグネチャ(メソッド・URL・ソート済みパラメータ・フォーム)から
 * キャッシュキーを求める。
 */
export function requestSignature(request: FetchRequest): string {
  const method = request.method ?? 'GET';
  const url = new URL(request.url);
  for (const [name, value] of Object.entries(request.params ?? {})) {
    url.searchParams.set(name, value);
  }
  url.searchParams.sort();
  url.hash = '';
  const form = [...(request.form ?? [])]
    .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`)
    .sort()
    .join('&');
  return `${method} ${url.toString()}${form ? `\n${form}` : ''}`;
}

export function cacheKey(request: FetchRequest): string {
  return createHash('sha256').update(requestSignature(request)).digest('hex');
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const entry = value as Partial<CacheEntry>;
  return (
    typeof entry.key === 'string' &&
    typeof entry.url === 'string' &&
    (entry.method === 'GET' || entry.method === 'POST') &&
    typeof entry.status === 'number' &&
    typeof entry.contentType === 'string' &&
    typeof entry.body === 'string' &&
    typeof entry.fetchedAt === 'string'
  );
}

/**
 * 1キー1ファイルでレスポンスを保存するキャッシュ。プロセス再起動後も残る。
 */
export class FileResponseCache implements ResponseCache {
  constructor(private readonly dir: string) {}

  private entryPath(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.entryPath(key), 'utf8');
    } catch (error) {
      const nodeError = error as NodeJS.ErrnoException;
      if (nodeError.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    try {
      const parsed = JSON.parse(content) as unknown;
      return isCacheEntry(parsed) && parsed.key === key ? parsed : undefined;
    } catch {
      // 壊れたエントリは未キャッシュ扱いにして再取得させる。
      return undefined;
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.entryPath(entry.key);
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(entry), 'utf8');
    await fs.rename(tmp, target);
  }
}

export class MemoryResponseCache implements ResponseCache {
  readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }
}
