import { ulid } from 'ulid';
import type { CaptureBody, CaptureRecord, HeaderPair, InboundPayload, InboundRequest, JsonValue } from './types';

const BODY_METHODS = ['POST', 'PUT', 'PATCH'];

function pad(num: number): string {
  return num.toString().padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = pad(date.getMonth() + 1);
  const day = pad(date.getDate());
  const hours = pad(date.getHours());
  const minutes = pad(date.getMinutes());
  const seconds = pad(date.getSeconds());

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

export function toHeaderPairs(rawHeaders: readonly string[]): HeaderPair[] {
  const pairs: HeaderPair[] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    pairs.push({ name: rawHeaders[i], value: rawHeaders[i + 1] });
  }
  return pairs;
}

function findHeader(headers: readonly HeaderPair[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find((header) => header.name.toLowerCase() === wanted)?.value;
}

function decodePath(rawPath: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    // Malformed percent-encoding is kept verbatim
    decoded = rawPath;
  }
  return decoded.startsWith('/') ? decoded : `/${decoded}`;
}

/**
 * Parses `a=1&b=2` style input. Repeated keys keep their first value.
 */
export function parseFields(encoded: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(encoded)) {
    if (!(key in fields)) {
      fields[key] = value;
    }
  }
  return fields;
}

function mimeType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

export function isJsonContentType(contentType: string | undefined): boolean {
  const mime = mimeType(contentType);
  return mime === 'application/json' || (mime.startsWith('application/') && mime.endsWith('+json'));
}

function payloadText(payload: InboundPayload): string {
  return payload.kind === 'text' ? payload.text : '';
}

function extractFormFields(payload: InboundPayload, contentType: string | undefined): Record<string, string> {
  if (payload.kind === 'multipart') {
    return payload.fields;
  }
  if (payload.kind === 'text' && mimeType(contentType) === 'application/x-www-form-urlencoded') {
    return parseFields(payload.text);
  }
  return {};
}

function extractBody(method: string, query: string, contentType: string | undefined, payload: InboundPayload): CaptureBody {
  if (method === 'GET') {
    return { kind: 'fields', fields: parseFields(query) };
  }

  if (!BODY_METHODS.includes(method)) {
    return { kind: 'empty' };
  }

  const text = payloadText(payload);

  if (isJsonContentType(contentType)) {
    try {
      const value: JsonValue = JSON.parse(text);
      return { kind: 'json', value, text };
    } catch {
      return { kind: 'raw', text };
    }
  }

  const fields = extractFormFields(payload, contentType);
  if (Object.keys(fields).length > 0) {
    return { kind: 'fields', fields };
  }

  return { kind: 'raw', text };
}

/**
 * Builds the capture record for one inbound request. Total: malformed
 * structured bodies fall back to their raw text instead of failing.
 */
export function extractCapture(request: InboundRequest, now: Date = new Date()): CaptureRecord {
  const headers = toHeaderPairs(request.rawHeaders);
  const method = request.method.toUpperCase();

  const queryStart = request.url.indexOf('?');
  const rawPath = queryStart === -1 ? request.url : request.url.slice(0, queryStart);
  const query = queryStart === -1 ? '' : request.url.slice(queryStart + 1);

  const forwardedFor = findHeader(headers, 'x-forwarded-for');

  return {
    id: ulid(),
    timestamp: formatTimestamp(now),
    clientAddress: forwardedFor || request.peerAddress || 'unknown',
    userAgent: findHeader(headers, 'user-agent') ?? 'N/A',
    method,
    path: decodePath(rawPath),
    headers,
    body: extractBody(method, query, findHeader(headers, 'content-type'), request.payload),
  };
}
