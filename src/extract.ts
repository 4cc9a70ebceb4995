import { load } from 'cheerio';
import { ExtractionError } from './errors.js';
import { collapseText } from './utils.js';
import type { ApiExtraction, ApiRawQuestion, FormField, HtmlExtraction, RawAnswer } from './types.js';

const ERA_LABEL_RE = /(令和|平成|昭和|大正|明治)\s*([0-9０-９]+|元)\s*年/;
const TOTAL_HINT_RE = /選択中の問題\s*([0-9]+)\s*問/;
const CHOICE_SELECTORS = ['#select_a', '#select_i', '#select_u', '#select_e'];

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(row: JsonRecord, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = row[key];
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function pickInteger(row: JsonRecord, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = row[key];
    if (typeof value === 'number' && Number.isInteger(value)) {
      return value;
    }
    if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
      return Number(value);
    }
  }
  return undefined;
}

function toChoiceText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (isRecord(value) && typeof value.text === 'string') {
    return value.text;
  }
  return '';
}

function parseApiAnswer(row: JsonRecord): RawAnswer | undefined {
  for (const key of ['answer', 'answer_index', 'answerIndex']) {
    const value = row[key];
    if (typeof value === 'number' && Number.isInteger(value)) {
      return { kind: 'index', value };
    }
    if (typeof value === 'string' && value.trim()) {
      return { kind: 'marker', value: value.trim() };
    }
  }
  return undefined;
}

function parseApiCategory(row: JsonRecord): string | undefined {
  const value = row.category ?? row.category_path;
  if (Array.isArray(value)) {
    return value.filter((segment): segment is string => typeof segment === 'string').join(' » ');
  }
  return typeof value === 'string' ? value : undefined;
}

function parseApiItem(item: unknown, index: number): ApiRawQuestion {
  if (!isRecord(item)) {
    throw new ExtractionError(`questions[${index}] がオブジェクトではありません`);
  }
  const rawChoices = item.choices ?? item.options;
  if (!Array.isArray(rawChoices)) {
    throw new ExtractionError(`questions[${index}] に choices がありません`);
  }
  return {
    source: 'api',
    sequence: pickInteger(item, ['no', 'number', 'qno']),
    eraYearLabel: pickString(item, ['year_label', 'yearLabel', 'era']),
    categoryText: parseApiCategory(item),
    text: pickString(item, ['question', 'text', 'body']) ?? '',
    choices: rawChoices.map(toChoiceText),
    answer: parseApiAnswer(item),
    explanation: pickString(item, ['explanation', 'kaisetsu']) ?? '',
    sourceUrl: pickString(item, ['url', 'source_url', 'sourceUrl']),
  };
}

/**
 * ページ送りAPIのJSONを問題候補と継続トークンへ変換する。
 * ページ全体の形が崩れていれば例外、個々の問題の欠損は failures に積む。
 */
export function extractFromApi(body: string): ApiExtraction {
  let payload: unknown;
  try {
    payload = JSON.parse(body) as unknown;
  } catch (error) {
    throw new ExtractionError('APIレスポンスがJSONではありません', { cause: error });
  }
  if (!isRecord(payload)) {
    throw new ExtractionError('APIレスポンスがオブジェクトではありません');
  }
  const list = payload.questions ?? payload.items ?? payload.data;
  if (!Array.isArray(list)) {
    throw new ExtractionError('APIレスポンスに questions 配列がありません');
  }

  const candidates: ApiRawQuestion[] = [];
  const failures: ExtractionError[] = [];
  list.forEach((item, index) => {
    try {
      candidates.push(parseApiItem(item, index));
    } catch (error) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }
      failures.push(error);
    }
  });
  const token = pickString(payload, ['next', 'next_page', 'nextPage', 'next_cursor']);
  if (payload.has_more === false || token === undefined || token.trim() === '') {
    return { candidates, failures, continuation: { type: 'done' } };
  }
  return { candidates, failures, continuation: { type: 'next', token: token.trim() } };
}

function parseSequence(hiddenQ: string | undefined, heading: string): number | undefined {
  if (hiddenQ) {
    const last = hiddenQ.split('_').pop() ?? '';
    if (/^\d+$/.test(last)) {
      return Number(last);
    }
  }
  const matched = heading.normalize('NFKC').match(/問\s*(\d+)/);
  return matched ? Number(matched[1]) : undefined;
}

export function parseTotalHint(html: string): number | undefined {
  const matched = html.match(TOTAL_HINT_RE);
  return matched ? Number(matched[1]) : undefined;
}

/**
 * 出題ページのHTMLから問題と次回送信用の hidden フィールドを抽出する。
 * 1ページに複数の問題ブロックがあればすべて候補にする。
 */
export function extractFromHtml(html: string, pageUrl = ''): HtmlExtraction {
  const $ = load(html);

  const formState: FormField[] = [];
  $('input[type="hidden"][name]').each((_, element) => {
    const name = $(element).attr('name');
    if (name && name !== 'qno') {
      formState.push([name, $(element).attr('value') ?? '']);
    }
  });

  const result: HtmlExtraction = {
    candidates: [],
    continuation: { type: 'again' },
    totalHint: parseTotalHint(html),
    formState,
  };

  if ($('.selectList').length === 0) {
    return result;
  }
  const headings = $('h3.qno').toArray();
  if (headings.length === 0) {
    throw new ExtractionError('問題文が見つかりません');
  }

  const hiddenQ = headings.length === 1 ? $('input[name="_q"]').attr('value') : undefined;
  const title = $('title').text();
  const sourceUrl = $('meta[property="og:url"]').attr('content') ?? pageUrl;

  // 問題ブロックは h3.qno から次の h3.qno の手前まで
  for (const element of headings) {
    const headingNode = $(element);
    const section = headingNode.nextUntil('h3.qno');
    const within = (selector: string) => section.filter(selector).add(section.find(selector));
    const lists = within('.selectList');
    if (lists.length === 0) {
      continue;
    }

    const heading = collapseText(headingNode.text());
    const text = collapseText(headingNode.next('div').text());
    if (!text) {
      throw new ExtractionError(`問題文が見つかりません: ${heading}`);
    }

    const choiceElements = CHOICE_SELECTORS.map((selector) => within(selector)).filter((node) => node.length > 0);
    const choices =
      choiceElements.length > 0
        ? choiceElements.map((node) => collapseText(node.first().text()))
        : lists
            .find('li')
            .toArray()
            .map((item) => collapseText($(item).text()));
    if (choices.length < 2) {
      throw new ExtractionError(`選択肢が不足しています (${choices.length}件): ${heading}`);
    }

    const categoryHeading = section.filter((_, node) => $(node).is('h3') && $(node).text().includes('分類')).first();
    const categoryText =
      categoryHeading.length > 0 ? collapseText(categoryHeading.nextUntil('h3.qno').filter('div').first().text()) : '';

    const marker = collapseText(within('#answerChar').first().text());
    const eraMatch = `${heading} ${title}`.match(ERA_LABEL_RE);

    result.candidates.push({
      source: 'html',
      sequence: parseSequence(hiddenQ, heading),
      eraYearLabel: eraMatch ? eraMatch[0] : undefined,
      categoryText: categoryText || undefined,
      text,
      choices,
      answer: marker ? { kind: 'marker', value: marker } : undefined,
      explanation: collapseText(within('#kaisetsu').first().text()),
      sourceUrl,
    });
  }
  return result;
}
