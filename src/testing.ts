// テスト用の偽トランスポートとページ生成。
import type { FetchRequest, Transport, TransportResponse } from './types.js';

export interface RecordingTransport {
  transport: Transport;
  requests: FetchRequest[];
}

/**
 * 受け取ったリクエストを記録しつつ handler の応答を返すトランスポート。
 */
export function recordingTransport(
  handler: (request: FetchRequest, index: number) => TransportResponse | Promise<TransportResponse>,
): RecordingTransport {
  const requests: FetchRequest[] = [];
  const transport: Transport = async (request) => {
    requests.push(request);
    return handler(request, requests.length - 1);
  };
  return { transport, requests };
}

export function textResponse(body: string, status = 200, headers: Record<string, string> = {}): TransportResponse {
  return { status, headers: new Headers({ 'content-type': 'text/html; charset=utf-8', ...headers }), body };
}

export function jsonResponse(payload: unknown, status = 200): TransportResponse {
  return { status, headers: new Headers({ 'content-type': 'application/json' }), body: JSON.stringify(payload) };
}

/** 送信したフォームまたはクエリから qno を取り出す。 */
export function requestedQno(request: FetchRequest): number {
  const fromForm = request.form?.find(([name]) => name === 'qno')?.[1];
  return Number(fromForm ?? request.params?.qno ?? Number.NaN);
}

export interface QuestionPageOptions {
  /** `_q` hidden の末尾と見出しの「問N」に使う。省略時はどちらも出さない。 */
  seq?: number;
  qPrefix?: string;
  heading?: string;
  text: string;
  choices?: string[];
  answer?: string;
  category?: string;
  explanation?: string;
  total?: number;
  url?: string;
}

export function questionPage(options: QuestionPageOptions): string {
  const heading = options.heading ?? '令和7年春期';
  const choices = options.choices ?? ['選択肢ア', '選択肢イ', '選択肢ウ', '選択肢エ'];
  const ids = ['select_a', 'select_i', 'select_u', 'select_e'];
  const hiddenQ =
    options.seq === undefined ? '' : `<input type="hidden" name="_q" value="${options.qPrefix ?? '07_haru'}_${options.seq}">`;
  return `<!DOCTYPE html>
<html lang="ja">
<head>
<title>${heading} | 過去問演習</title>
${options.url ? `<meta property="og:url" content="${options.url}">` : ''}
</head>
<body>
<form method="post">
${hiddenQ}
<input type="hidden" name="result" value="1">
<input type="hidden" name="qno" value="0">
</form>
${options.total === undefined ? '' : `<p>選択中の問題 ${options.total} 問</p>`}
<h3 class="qno">${heading}${options.seq === undefined ? '' : ` 問${options.seq}`}</h3>
<div>${options.text}</div>
<ul class="selectList">
${choices.map((choice, index) => `<li><span id="${ids[index]}">${choice}</span></li>`).join('\n')}
</ul>
<h3>分類</h3>
<div>${options.category ?? 'テクノロジ系 » 技術要素 » ネットワーク'}</div>
<span id="answerChar">${options.answer ?? 'ア'}</span>
<div id="kaisetsu">${options.explanation ?? '解説文です。'}</div>
</body>
</html>
`;
}
