import { describe, it, expect } from 'vitest';
import { CannotTransformContentError } from '../pipeline-error.js';
import { ApplicationCall } from './application-call.js';
import { isOutgoingContent, ReceiveTypes, defineReceiveType } from './content.js';
import {
  convertReceived,
  installDefaultReceiveTransformations,
  installDefaultSendTransformations,
  renderDefaultContent,
} from './default-transformations.js';
import { createReceivePipeline, createSendPipeline } from './phases.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

// ---------------------------------------------------------------------------
// Receive
// ---------------------------------------------------------------------------

describe('convertReceived', () => {
  it('decodes bytes to text', () => {
    expect(convertReceived({ type: ReceiveTypes.text, value: encode('héllo') })).toEqual({
      converted: true,
      value: 'héllo',
    });
  });

  it('leaves text that is already text alone', () => {
    expect(convertReceived({ type: ReceiveTypes.text, value: 'plain' })).toEqual({ converted: false });
  });

  it('encodes text to bytes', () => {
    const conversion = convertReceived({ type: ReceiveTypes.bytes, value: 'ab' });

    expect(conversion.converted).toBe(true);
    if (conversion.converted) {
      expect(conversion.value).toEqual(encode('ab'));
    }
  });

  it('parses JSON from text or bytes', () => {
    expect(convertReceived({ type: ReceiveTypes.json, value: '{"a":1}' })).toEqual({
      converted: true,
      value: { a: 1 },
    });
    expect(convertReceived({ type: ReceiveTypes.json, value: encode('[true]') })).toEqual({
      converted: true,
      value: [true],
    });
  });

  it('fails on malformed JSON', () => {
    expect(() => convertReceived({ type: ReceiveTypes.json, value: '{oops' })).toThrow(
      CannotTransformContentError,
    );
  });

  it('ignores types it does not know', () => {
    const custom = defineReceiveType('custom', (value): value is string => typeof value === 'string');
    expect(convertReceived({ type: custom, value: 'x' })).toEqual({ converted: false });
    expect(convertReceived({ type: ReceiveTypes.json, value: 42 })).toEqual({ converted: false });
  });
});

// ---------------------------------------------------------------------------
// Send
// ---------------------------------------------------------------------------

describe('renderDefaultContent', () => {
  it('renders strings, byte arrays and status codes', () => {
    expect(renderDefaultContent('hi')).toMatchObject({ kind: 'text', text: 'hi' });
    expect(renderDefaultContent(new Uint8Array([1]))).toMatchObject({ kind: 'bytes' });
    expect(renderDefaultContent(204)).toMatchObject({ kind: 'status', status: 204 });
  });

  it('returns null for other values', () => {
    expect(renderDefaultContent({ id: 1 })).toBeNull();
    expect(renderDefaultContent(42)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Installed interceptors
// ---------------------------------------------------------------------------

describe('default transformations in pipelines', () => {
  const receivePipeline = createReceivePipeline();
  const sendPipeline = createSendPipeline();
  installDefaultReceiveTransformations(receivePipeline);
  installDefaultSendTransformations(sendPipeline);

  const call = new ApplicationCall({
    id: 'call-1',
    request: { method: 'POST', path: '/' },
    pipelines: { receivePipeline, sendPipeline },
    readBody: async () => '',
  });

  it('converts in the receive Transform phase', async () => {
    const result = await receivePipeline.execute(call, { type: ReceiveTypes.json, value: '{"ok":true}' });
    expect(result.value).toEqual({ ok: true });
  });

  it('renders in the send Render phase', async () => {
    const result = await sendPipeline.execute(call, 'rendered');
    expect(isOutgoingContent(result)).toBe(true);
  });

  it('passes unknown values through', async () => {
    const message = { id: 1 };
    expect(await sendPipeline.execute(call, message)).toBe(message);
  });
});
