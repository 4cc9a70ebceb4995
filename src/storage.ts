import fs from 'node:fs/promises';
import path from 'node:path';
import { ValidationError } from './errors.js';
import { assertQuestion } from './validate.js';
import type { Dataset, Question } from './types.js';

export interface LoadedDataset {
  dataset: Dataset;
  /** 読み込み時に捨てた不正な問題の id。 */
  droppedIds: string[];
}

/**
 * 一時ファイルへ書いてから rename し、読み手に書きかけのJSONを見せない。
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

function toDatasetJson(dataset: Dataset): Dataset {
  return {
    version: dataset.version,
    generatedAt: dataset.generatedAt,
    sourceSessions: dataset.sourceSessions,
    questions: dataset.questions.map((q) => ({
      id: q.id,
      category: q.category,
      year: q.year,
      text: q.text,
      choices: q.choices,
      answerIndex: q.answerIndex,
      explanation: q.explanation,
      sourceUrl: q.sourceUrl,
    })),
  };
}

export async function writeDataset(filePath: string, dataset: Dataset): Promise<void> {
  await writeJsonAtomic(filePath, toDatasetJson(dataset));
}

/**
 * パース済みJSONをデータセットとして解釈する。不正な問題は捨て、id の重複は先勝ちにする。
 */
export function repairDataset(parsed: unknown): LoadedDataset {
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError('dataset', 'データセットはJSONオブジェクトにしてください');
  }
  const root = parsed as Partial<Record<keyof Dataset, unknown>>;
  const list: unknown[] = Array.isArray(root.questions) ? root.questions : [];
  const questions: Question[] = [];
  const droppedIds: string[] = [];
  const ids = new Set<string>();

  for (const item of list) {
    let question: Question;
    try {
      assertQuestion(item);
      question = item;
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      const id = item && typeof item === 'object' && 'id' in item ? item.id : undefined;
      droppedIds.push(typeof id === 'string' && id ? id : '<missing id>');
      continue;
    }
    if (ids.has(question.id)) {
      droppedIds.push(question.id);
      continue;
    }
    ids.add(question.id);
    questions.push(question);
  }

  const sessions: unknown[] = Array.isArray(root.sourceSessions) ? root.sourceSessions : [];
  const labels = sessions.filter((label): label is string => typeof label === 'string');
  return {
    dataset: {
      version: typeof root.version === 'number' && Number.isInteger(root.version) ? root.version : 1,
      generatedAt: typeof root.generatedAt === 'string' ? root.generatedAt : '',
      sourceSessions: labels.length === sessions.length ? labels : [],
      questions,
    },
    droppedIds,
  };
}

/**
 * データセットを読み込む。ファイルがなければ undefined。
 */
export async function loadDataset(filePath: string): Promise<LoadedDataset | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const maybeNodeError = error as NodeJS.ErrnoException;
    if (maybeNodeError.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content) as unknown;
  } catch (error) {
    throw new ValidationError('dataset', `JSONとして読み込めません: ${filePath}: ${String(error)}`);
  }
  return repairDataset(parsed);
}
