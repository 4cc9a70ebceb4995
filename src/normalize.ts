import { createHash } from 'node:crypto';
import { DEFAULT_CATEGORY, DEFAULT_ID_PREFIX } from './config.js';
import { NormalizationError } from './errors.js';
import { collapseText } from './utils.js';
import type { Question, RawAnswer, RawQuestion, SessionMeta } from './types.js';

const ERA_OFFSETS: Record<string, number> = {
  令和: 2018,
  平成: 1988,
};

const ERA_TOKEN_RE = /(令和|平成|昭和|大正|明治)\s*(\d+|元)/;

/**
 * 和暦の年度表記を西暦へ変換する。令和・平成以外の元号は変換失敗とする。
 */
export function eraToGregorian(label: string): number {
  const normalized = label.normalize('NFKC');
  const era = normalized.match(ERA_TOKEN_RE);
  if (era) {
    const offset = ERA_OFFSETS[era[1]];
    if (offset === undefined) {
      throw new NormalizationError(label, `未対応の元号です: ${era[1]}`);
    }
    return offset + (era[2] === '元' ? 1 : Number(era[2]));
  }
  const gregorian = normalized.match(/(?<!\d)(\d{4})(?!\d)/);
  if (gregorian) {
    return Number(gregorian[1]);
  }
  throw new NormalizationError(label, `年度を解釈できません: ${label}`);
}

interface CategoryRule {
  pattern: RegExp;
  path: string;
}

// 上から順に評価する。開発系はソフトウェアより先に判定する。
const CATEGORY_RULES: CategoryRule[] = [
  { pattern: /セキュリティ|security/i, path: 'テクノロジ系/セキュリティ' },
  { pattern: /ネットワーク|network/i, path: 'テクノロジ系/ネットワーク' },
  { pattern: /データベース|database|\bdb\b/i, path: 'テクノロジ系/データベース' },
  { pattern: /基礎理論/, path: 'テクノロジ系/基礎理論' },
  { pattern: /アルゴリズム|プログラミング/, path: 'テクノロジ系/アルゴリズムとプログラミング' },
  { pattern: /コンピュータ構成要素/, path: 'テクノロジ系/コンピュータ構成要素' },
  { pattern: /システム構成要素/, path: 'テクノロジ系/システム構成要素' },
  { pattern: /システム開発技術|ソフトウェア開発管理/, path: 'テクノロジ系/開発技術' },
  { pattern: /ソフトウェア/, path: 'テクノロジ系/ソフトウェア' },
  { pattern: /ハードウェア/, path: 'テクノロジ系/ハードウェア' },
  { pattern: /ヒューマンインタフェース/, path: 'テクノロジ系/ヒューマンインタフェース' },
  { pattern: /マルチメディア/, path: 'テクノロジ系/マルチメディア' },
  { pattern: /プロジェクトマネジメント|project/i, path: 'マネジメント系/プロジェクトマネジメント' },
  { pattern: /サービスマネジメント/, path: 'マネジメント系/サービスマネジメント' },
  { pattern: /システム監査/, path: 'マネジメント系/システム監査' },
  { pattern: /システム戦略/, path: 'ストラテジ系/システム戦略' },
  { pattern: /経営戦略/, path: 'ストラテジ系/経営戦略' },
  { pattern: /企業活動|法務/, path: 'ストラテジ系/企業と法務' },
];

export function splitCategoryPath(raw: string): string[] {
  return raw
    .normalize('NFKC')
    .replace(/&raquo;/g, '»')
    .split(/\s*(?:»|>|\/|→)\s*/)
    .map((segment) => collapseText(segment))
    .filter(Boolean);
}

/**
 * 取得元の分類文字列を正規の分類パスへ対応付ける。
 * 未知の分類は区切りを ` » ` に揃えた1階層のパスとして通す。
 */
export function normalizeCategory(raw: string | undefined, fallback?: string): string {
  const segments = splitCategoryPath(raw ?? '');
  if (segments.length === 0) {
    return fallback ? normalizeCategory(fallback) : DEFAULT_CATEGORY;
  }
  const joined = segments.join('/');
  const rule = CATEGORY_RULES.find((candidate) => candidate.pattern.test(joined));
  return rule ? rule.path : segments.join(' » ');
}

const MARKERS = ['ア', 'イ', 'ウ', 'エ', 'オ'];

/**
 * 解答記号(ア〜オ、a〜e、1〜5)を0始まりの選択肢番号へ変換する。
 */
export function answerMarkerToIndex(marker: string): number | undefined {
  const normalized = marker.normalize('NFKC').trim();
  const kana = MARKERS.indexOf(normalized);
  if (kana >= 0) {
    return kana;
  }
  if (/^[a-e]$/i.test(normalized)) {
    return normalized.toLowerCase().charCodeAt(0) - 'a'.charCodeAt(0);
  }
  if (/^[1-5]$/.test(normalized)) {
    return Number(normalized) - 1;
  }
  return undefined;
}

function resolveAnswerIndex(answer: RawAnswer): number | undefined {
  return answer.kind === 'index' ? answer.value : answerMarkerToIndex(answer.value);
}

/**
 * 空の選択肢を取り除き、正解番号をずらし直す。正解が消えた場合は undefined。
 */
export function sanitizeChoices(
  choices: string[],
  answerIndex: number,
): { choices: string[]; answerIndex: number } | undefined {
  const cleaned: string[] = [];
  let shifted: number | undefined;
  choices.forEach((choice, index) => {
    const trimmed = choice.trim();
    if (!trimmed) {
      return;
    }
    if (index === answerIndex) {
      shifted = cleaned.length;
    }
    cleaned.push(trimmed);
  });
  if (shifted === undefined) {
    return undefined;
  }
  return { choices: cleaned, answerIndex: shifted };
}

/**
 * id に埋め込むセッション名。code がなければ label から作る。
 * 英数字と区切り以外を含む名前は情報が落ちるので、label のハッシュで代える。
 */
export function sessionSlug(session: Pick<SessionMeta, 'label' | 'code'>): string {
  const source = (session.code?.trim() || session.label).normalize('NFKC').toLowerCase();
  const slug = source.replace(/[\s./-]+/g, '-').replace(/^-+|-+$/g, '');
  if (/^[a-z0-9_-]+$/.test(slug)) {
    return slug;
  }
  return `s${createHash('sha256').update(session.label).digest('hex').slice(0, 8)}`;
}

export function sessionIdPrefix(session: SessionMeta, idPrefix: string = DEFAULT_ID_PREFIX): string {
  return `${idPrefix}-${session.year}-${sessionSlug(session)}-q`;
}

export function questionId(session: SessionMeta, sequence: number, idPrefix: string = DEFAULT_ID_PREFIX): string {
  return `${sessionIdPrefix(session, idPrefix)}${String(sequence).padStart(3, '0')}`;
}

/**
 * id から連番部分を取り出す。セッションの接頭辞に一致しなければ undefined。
 */
export function parseSequenceFromId(id: string, prefix: string): number | undefined {
  if (!id.startsWith(prefix)) {
    return undefined;
  }
  const rest = id.slice(prefix.length);
  return /^\d+$/.test(rest) ? Number(rest) : undefined;
}

/**
 * 問題文と選択肢から内容の同一性キーを作る。URLには依存しない。
 */
export function questionIdentity(question: Pick<Question, 'text' | 'choices'>): string {
  const hash = createHash('sha256');
  hash.update(collapseText(question.text.normalize('NFKC')));
  for (const choice of question.choices) {
    hash.update('\u0000');
    hash.update(collapseText(choice.normalize('NFKC')));
  }
  return hash.digest('hex');
}

function normalizeSourceUrl(value: string | undefined, session: SessionMeta): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    return '';
  }
  try {
    const url = new URL(trimmed, session.startUrl ?? session.apiUrl);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : '';
  } catch {
    return '';
  }
}

export type NormalizeResult = { ok: true; question: Question } | { ok: false; error: NormalizationError };

/**
 * RawQuestion を正規の Question へ変換する。レコード単位の失敗は例外ではなく結果で返す。
 */
export function normalizeQuestion(
  raw: RawQuestion,
  session: SessionMeta,
  sequence: number,
  idPrefix: string = DEFAULT_ID_PREFIX,
): NormalizeResult {
  const id = questionId(session, sequence, idPrefix);

  let year = session.year;
  if (raw.eraYearLabel) {
    try {
      year = eraToGregorian(raw.eraYearLabel);
    } catch (error) {
      if (error instanceof NormalizationError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  if (!raw.answer) {
    return { ok: false, error: new NormalizationError('answer', `正解が取得できません: ${id}`) };
  }
  const answerIndex = resolveAnswerIndex(raw.answer);
  if (answerIndex === undefined) {
    return {
      ok: false,
      error: new NormalizationError(String(raw.answer.value), `解答記号を解釈できません: ${id}`),
    };
  }
  const sanitized = sanitizeChoices(raw.choices, answerIndex);
  if (!sanitized) {
    return { ok: false, error: new NormalizationError('answerIndex', `正解の選択肢が空です: ${id}`) };
  }

  return {
    ok: true,
    question: {
      id,
      category: normalizeCategory(raw.categoryText, session.category),
      year,
      text: raw.text.trim(),
      choices: sanitized.choices,
      answerIndex: sanitized.answerIndex,
      explanation: raw.explanation.trim(),
      sourceUrl: normalizeSourceUrl(raw.sourceUrl, session),
    },
  };
}
