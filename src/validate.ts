import { ValidationError } from './errors.js';
import type { Question, ValidationReport, ValidationResult } from './types.js';

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * 1問分の必須項目と正解番号の範囲を検査し、違反があれば ValidationError を投げる。
 */
export function assertQuestion(value: unknown): asserts value is Question {
  if (!value || typeof value !== 'object') {
    throw new ValidationError('question', '問題がオブジェクトではありません');
  }
  const q = value as Partial<Record<keyof Question, unknown>>;
  const label = typeof q.id === 'string' && q.id ? q.id : '<missing id>';

  for (const field of ['id', 'category', 'text', 'explanation'] as const) {
    if (!isNonEmptyString(q[field])) {
      throw new ValidationError(field, `${field} が空です: ${label}`);
    }
  }
  if (typeof q.year !== 'number' || !Number.isInteger(q.year) || q.year < 1000 || q.year > 9999) {
    throw new ValidationError('year', `year は4桁の整数にしてください: ${label}`);
  }
  if (!Array.isArray(q.choices) || q.choices.length < 2) {
    throw new ValidationError('choices', `choices は2件以上必要です: ${label}`);
  }
  if (!q.choices.every(isNonEmptyString)) {
    throw new ValidationError('choices', `choices に空の選択肢があります: ${label}`);
  }
  if (typeof q.answerIndex !== 'number' || !Number.isInteger(q.answerIndex)) {
    throw new ValidationError('answerIndex', `answerIndex は整数にしてください: ${label}`);
  }
  if (q.answerIndex < 0 || q.answerIndex >= q.choices.length) {
    throw new ValidationError('answerIndex', `answerIndex が範囲外です (${q.answerIndex}): ${label}`);
  }
  if (typeof q.sourceUrl !== 'string' || (q.sourceUrl !== '' && !isHttpUrl(q.sourceUrl))) {
    throw new ValidationError('sourceUrl', `sourceUrl はURLまたは空文字にしてください: ${label}`);
  }
}

export function isQuestion(value: unknown): value is Question {
  try {
    assertQuestion(value);
    return true;
  } catch (error) {
    if (error instanceof ValidationError) {
      return false;
    }
    throw error;
  }
}

function sortedTally(entries: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...entries.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

export function summarizeQuestions(questions: Question[]): ValidationReport {
  const perYear = new Map<string, number>();
  const perCategory = new Map<string, number>();
  for (const question of questions) {
    perYear.set(String(question.year), (perYear.get(String(question.year)) ?? 0) + 1);
    perCategory.set(question.category, (perCategory.get(question.category) ?? 0) + 1);
  }
  return {
    total: questions.length,
    perYear: sortedTally(perYear),
    perCategory: sortedTally(perCategory),
  };
}

/**
 * 候補を検査・重複除去する。不正な1件でバッチ全体を落とさない。
 */
export function validateQuestions(candidates: unknown[]): ValidationResult {
  const accepted: Question[] = [];
  const ids = new Set<string>();
  const errors: string[] = [];
  let rejected = 0;
  let duplicates = 0;

  for (const candidate of candidates) {
    let question: Question;
    try {
      assertQuestion(candidate);
      question = candidate;
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      rejected += 1;
      errors.push(error.message);
      continue;
    }
    if (ids.has(question.id)) {
      duplicates += 1;
      continue;
    }
    ids.add(question.id);
    accepted.push(question);
  }

  return { accepted, rejected, duplicates, errors, report: summarizeQuestions(accepted) };
}
