// Type definitions for the application

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface HeaderPair {
  name: string;
  value: string;
}

export type CaptureBody =
  | { kind: 'fields'; fields: Record<string, string> }
  // `text` is the body as received; `value` alone loses integers beyond 2^53
  | { kind: 'json'; value: JsonValue; text: string }
  | { kind: 'raw'; text: string }
  | { kind: 'empty' };

export interface CaptureRecord {
  id: string;
  timestamp: string;
  clientAddress: string;
  userAgent: string;
  method: string;
  path: string;
  headers: HeaderPair[];
  body: CaptureBody;
}

/**
 * Body as handed over by the transport, before any interpretation.
 */
export type InboundPayload =
  | { kind: 'none' }
  | { kind: 'text'; text: string }
  | { kind: 'multipart'; fields: Record<string, string> };

export interface InboundRequest {
  method: string;
  url: string;
  // Alternating name/value entries, as Node exposes them on IncomingMessage.rawHeaders
  rawHeaders: readonly string[];
  peerAddress?: string;
  payload: InboundPayload;
}
