import { describe, it, expect } from 'vitest';
import {
  APPLICATION_OCTET_STREAM,
  TEXT_PLAIN_UTF8,
  bytesContent,
  contentStatus,
  defineReceiveType,
  isOutgoingContent,
  isStatusCode,
  ReceiveTypes,
  statusContent,
  textContent,
} from './content.js';

describe('OutgoingContent constructors', () => {
  it('builds text content with defaults', () => {
    const content = textContent('hello');

    expect(content.kind).toBe('text');
    expect(content.text).toBe('hello');
    expect(content.contentType).toBe(TEXT_PLAIN_UTF8);
    expect(content.headers).toEqual({});
    expect(contentStatus(content)).toBeUndefined();
  });

  it('builds text content with options', () => {
    const content = textContent('{}', {
      contentType: 'application/json',
      status: 201,
      headers: { 'X-Id': '1' },
    });

    expect(content.contentType).toBe('application/json');
    expect(contentStatus(content)).toBe(201);
    expect(content.headers).toEqual({ 'X-Id': '1' });
  });

  it('builds bytes content', () => {
    const content = bytesContent(new Uint8Array([1, 2]));

    expect(content.kind).toBe('bytes');
    expect(content.contentType).toBe(APPLICATION_OCTET_STREAM);
    expect([...content.bytes]).toEqual([1, 2]);
  });

  it('builds status content', () => {
    const content = statusContent(204, { 'Retry-After': '5' });

    expect(content.kind).toBe('status');
    expect(contentStatus(content)).toBe(204);
    expect(content.headers).toEqual({ 'Retry-After': '5' });
  });

  it('rejects invalid status codes', () => {
    expect(() => statusContent(99)).toThrow(RangeError);
    expect(() => statusContent(600)).toThrow('Invalid status code: 600');
    expect(() => statusContent(200.5)).toThrow(RangeError);
  });

  it('copies headers', () => {
    const headers = { 'X-A': '1' };
    const content = textContent('x', { headers });
    headers['X-A'] = '2';

    expect(content.headers).toEqual({ 'X-A': '1' });
  });
});

describe('isOutgoingContent', () => {
  it('accepts constructed content only', () => {
    expect(isOutgoingContent(textContent('x'))).toBe(true);
    expect(isOutgoingContent(statusContent(200))).toBe(true);
    expect(isOutgoingContent({ kind: 'text', text: 'x', contentType: TEXT_PLAIN_UTF8, headers: {} })).toBe(false);
    expect(isOutgoingContent('x')).toBe(false);
    expect(isOutgoingContent(null)).toBe(false);
  });
});

describe('isStatusCode', () => {
  it('accepts integers from 100 to 599', () => {
    expect(isStatusCode(100)).toBe(true);
    expect(isStatusCode(599)).toBe(true);
    expect(isStatusCode(600)).toBe(false);
    expect(isStatusCode('200')).toBe(false);
    expect(isStatusCode(Number.NaN)).toBe(false);
  });
});

describe('ReceiveTypes', () => {
  it('recognises text and bytes', () => {
    expect(ReceiveTypes.text.is('a')).toBe(true);
    expect(ReceiveTypes.text.is(new Uint8Array())).toBe(false);
    expect(ReceiveTypes.bytes.is(new Uint8Array())).toBe(true);
    expect(ReceiveTypes.bytes.is('a')).toBe(false);
  });

  it('recognises JSON values', () => {
    expect(ReceiveTypes.json.is({ a: [1, 'two', null, { b: true }] })).toBe(true);
    expect(ReceiveTypes.json.is('plain')).toBe(true);
    expect(ReceiveTypes.json.is(Number.POSITIVE_INFINITY)).toBe(false);
    expect(ReceiveTypes.json.is({ at: new Date(0) })).toBe(false);
    expect(ReceiveTypes.json.is(undefined)).toBe(false);
  });

  it('defines custom types from a guard', () => {
    const positive = defineReceiveType('positive', (value): value is number => typeof value === 'number' && value > 0);

    expect(positive.name).toBe('positive');
    expect(positive.is(3)).toBe(true);
    expect(positive.is(-3)).toBe(false);
  });
});
