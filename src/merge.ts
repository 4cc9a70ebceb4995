import type { Dataset, MergePolicy, MergeResult, Question } from './types.js';

export interface IncomingBatch {
  questions: Question[];
  sessions: string[];
}

export function emptyDataset(): Dataset {
  return { version: 0, generatedAt: '', sourceSessions: [], questions: [] };
}

function sameContent(a: Question, b: Question): boolean {
  return (
    a.id === b.id &&
    a.category === b.category &&
    a.year === b.year &&
    a.text === b.text &&
    a.explanation === b.explanation &&
    a.sourceUrl === b.sourceUrl &&
    a.answerIndex === b.answerIndex &&
    a.choices.length === b.choices.length &&
    a.choices.every((choice, index) => choice === b.choices[index])
  );
}

export function unionSessions(existing: string[], incoming: string[]): string[] {
  const merged = [...existing];
  const seen = new Set(existing);
  for (const label of incoming) {
    if (!seen.has(label)) {
      seen.add(label);
      merged.push(label);
    }
  }
  return merged;
}

/**
 * 新しく収集したバッチを既存データセットへマージする。
 * 内容が変わったときだけ version と generatedAt を進める。
 */
export function mergeDataset(
  existing: Dataset | undefined,
  incoming: IncomingBatch,
  policy: MergePolicy = 'preferNew',
  now: Date = new Date(),
): MergeResult {
  const base = existing ?? emptyDataset();
  const byId = new Map<string, Question>(base.questions.map((question) => [question.id, question]));
  let insertedCount = 0;
  let replacedCount = 0;

  for (const question of incoming.questions) {
    const current = byId.get(question.id);
    if (!current) {
      byId.set(question.id, question);
      insertedCount += 1;
      continue;
    }
    if (policy === 'preferNew' && !sameContent(current, question)) {
      byId.set(question.id, question);
      replacedCount += 1;
    }
  }

  const changed = insertedCount > 0 || replacedCount > 0;
  if (!changed) {
    return { dataset: base, insertedCount, replacedCount, changed };
  }

  return {
    dataset: {
      version: base.version + 1,
      generatedAt: now.toISOString(),
      sourceSessions: unionSessions(base.sourceSessions, incoming.sessions),
      questions: [...byId.values()],
    },
    insertedCount,
    replacedCount,
    changed,
  };
}
