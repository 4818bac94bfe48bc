/**
 * Outgoing content and receive types.
 *
 * OutgoingContent is what the send pipeline must produce before the
 * response writer is called. Instances are branded and only built
 * through the constructors below.
 */

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

const OUTGOING_CONTENT_BRAND = Symbol.for('phaseline.OutgoingContent');

// ---------------------------------------------------------------------------
// OutgoingContent
// ---------------------------------------------------------------------------

interface ContentBase {
  readonly [OUTGOING_CONTENT_BRAND]: true;
  readonly headers: Readonly<Record<string, string>>;
}

export interface TextContent extends ContentBase {
  readonly kind: 'text';
  readonly text: string;
  readonly contentType: string;
  readonly status?: number;
}

export interface BytesContent extends ContentBase {
  readonly kind: 'bytes';
  readonly bytes: Uint8Array;
  readonly contentType: string;
  readonly status?: number;
}

export interface StatusContent extends ContentBase {
  readonly kind: 'status';
  readonly status: number;
}

export type OutgoingContent = TextContent | BytesContent | StatusContent;

export const TEXT_PLAIN_UTF8 = 'text/plain; charset=utf-8';
export const APPLICATION_OCTET_STREAM = 'application/octet-stream';

export function textContent(
  text: string,
  options: { contentType?: string; status?: number; headers?: Record<string, string> } = {},
): TextContent {
  const content: TextContent = {
    [OUTGOING_CONTENT_BRAND]: true,
    kind: 'text',
    text,
    contentType: options.contentType ?? TEXT_PLAIN_UTF8,
    headers: { ...options.headers },
    ...(options.status !== undefined ? { status: options.status } : {}),
  };
  return content;
}

export function bytesContent(
  bytes: Uint8Array,
  options: { contentType?: string; status?: number; headers?: Record<string, string> } = {},
): BytesContent {
  return {
    [OUTGOING_CONTENT_BRAND]: true,
    kind: 'bytes',
    bytes,
    contentType: options.contentType ?? APPLICATION_OCTET_STREAM,
    headers: { ...options.headers },
    ...(options.status !== undefined ? { status: options.status } : {}),
  };
}

/** Content made of a status code alone (no body). */
export function statusContent(status: number, headers: Record<string, string> = {}): StatusContent {
  if (!isStatusCode(status)) {
    throw new RangeError(`Invalid status code: ${status}`);
  }
  return { [OUTGOING_CONTENT_BRAND]: true, kind: 'status', status, headers: { ...headers } };
}

export function isOutgoingContent(value: unknown): value is OutgoingContent {
  return (
    typeof value === 'object' &&
    value !== null &&
    OUTGOING_CONTENT_BRAND in value &&
    (value as Record<symbol, unknown>)[OUTGOING_CONTENT_BRAND] === true
  );
}

/** Status carried by the content itself, if any. */
export function contentStatus(content: OutgoingContent): number | undefined {
  return content.status;
}

export function isStatusCode(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 100 && value <= 599;
}

// ---------------------------------------------------------------------------
// ReceiveType
// ---------------------------------------------------------------------------

/** A named type guard describing what `call.receive()` should produce. */
export interface ReceiveType<T> {
  readonly name: string;
  is(value: unknown): value is T;
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export function defineReceiveType<T>(name: string, is: (value: unknown) => value is T): ReceiveType<T> {
  return { name, is };
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      if (Object.getPrototypeOf(value) !== Object.prototype) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export const ReceiveTypes = {
  text: defineReceiveType('text', (value): value is string => typeof value === 'string'),
  bytes: defineReceiveType('bytes', (value): value is Uint8Array => value instanceof Uint8Array),
  json: defineReceiveType('json', isJsonValue),
} as const;

/** Subject of the receive pipeline. */
export interface ReceiveRequest {
  readonly type: ReceiveType<unknown>;
  readonly value: unknown;
}
