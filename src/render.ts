import type { CaptureBody, CaptureRecord, HeaderPair, JsonValue } from './types';

export const EMPTY_BODY_PLACEHOLDER = 'No body or query parameters received.';
export const EMPTY_STATE_MESSAGE = 'No requests captured yet.';

export interface PageModel {
  records: readonly CaptureRecord[];
  baseUrl: string;
}

export const htmlEscape = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

export function formatHeaders(headers: readonly HeaderPair[]): string {
  return headers.map((header) => `${header.name}: ${header.value}`).join('\n');
}

function isBlankJson(value: JsonValue): boolean {
  if (value === '' || value === 0 || value === false) return true;
  if (Array.isArray(value)) return value.length === 0;
  return value !== null && typeof value === 'object' && Object.keys(value).length === 0;
}

export function formatBody(body: CaptureBody): string {
  switch (body.kind) {
    case 'fields':
      return Object.keys(body.fields).length > 0 ? JSON.stringify(body.fields, null, 2) : EMPTY_BODY_PLACEHOLDER;
    case 'json':
      return isBlankJson(body.value) ? EMPTY_BODY_PLACEHOLDER : body.text;
    case 'raw':
      return body.text.length > 0 ? body.text : EMPTY_BODY_PLACEHOLDER;
    case 'empty':
      return EMPTY_BODY_PLACEHOLDER;
  }
}

function renderRecord(record: CaptureRecord): string {
  return `
      <article class="request-card" id="capture-${htmlEscape(record.id)}">
        <div class="request-header">
          <span><span class="method">${htmlEscape(record.method)}</span> ${htmlEscape(record.path)}</span>
          <span class="timestamp">${htmlEscape(record.timestamp)}</span>
        </div>
        <div class="request-body">
          <h3>Source</h3>
          <pre>IP: ${htmlEscape(record.clientAddress)}\nUser-Agent: ${htmlEscape(record.userAgent)}</pre>

          <h3>Headers</h3>
          <pre>${htmlEscape(formatHeaders(record.headers))}</pre>

          <h3>Body / Query Params</h3>
          <pre>${htmlEscape(formatBody(record.body))}</pre>
        </div>
      </article>`;
}

export function renderPage({ records, baseUrl }: PageModel): string {
  const content = records.length > 0
    ? records.map(renderRecord).join('\n')
    : `
      <div class="request-card empty-state">
        <p>${EMPTY_STATE_MESSAGE} Send a request to the URL above to get started.</p>
      </div>`;

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>HTTP Request Catcher</title>
  <style>
    :root {
      color-scheme: dark;
      --bg: #1a1a1a;
      --card: #252525;
      --card-header: #333;
      --ink: #e0e0e0;
      --muted: #aaa;
      --accent: #4a90e2;
      --method: #ffc107;
      --border: #444;
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif;
    }
    body {
      margin: 0;
      padding: 2rem;
      background: var(--bg);
      color: var(--ink);
    }
    .container { max-width: 900px; margin: auto; }
    h1, h2 {
      color: var(--accent);
      border-bottom: 2px solid var(--card-header);
      padding-bottom: 10px;
    }
    .info-box {
      background: #2a2a2a;
      border: 1px solid var(--border);
      border-radius: 8px;
      padding: 1rem;
      margin-bottom: 2rem;
      word-wrap: break-word;
    }
    .info-box code {
      background: var(--card-header);
      color: lightgreen;
      padding: 2px 5px;
      border-radius: 4px;
    }
    .request-card {
      background: var(--card);
      border: 1px solid var(--border);
      border-radius: 8px;
      margin-bottom: 1.5rem;
      overflow: hidden;
    }
    .request-header {
      background: var(--card-header);
      padding: 0.75rem 1rem;
      font-weight: bold;
      display: flex;
      justify-content: space-between;
      align-items: center;
    }
    .request-header .method { color: var(--method); }
    .request-header .timestamp { font-size: 0.8em; color: var(--muted); }
    .request-body { padding: 1rem; }
    .request-body h3 { margin-top: 0; color: var(--accent); }
    pre {
      background: #1e1e1e;
      padding: 1rem;
      border-radius: 5px;
      white-space: pre-wrap;
      word-wrap: break-word;
      color: #d4d4d4;
      font-family: "Fira Code", "Courier New", ui-monospace, monospace;
    }
    .empty-state { text-align: center; padding: 3rem; color: #777; }
  </style>
</head>
<body>
  <div class="container">
    <h1>HTTP Request Catcher</h1>
    <div class="info-box">
      <p>Send any HTTP request (GET, POST, etc.) to this URL to capture it:</p>
      <code>${htmlEscape(baseUrl)}</code>
      <p>The captured requests will appear below, with the newest one at the top.</p>
    </div>

    <h2>Captured Requests (${records.length})</h2>
    ${content}
  </div>
</body>
</html>
`;
}
