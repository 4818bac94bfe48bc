/**
 * Transformations every application gets before plugins install theirs.
 *
 * Receive (Transform phase): raw text/bytes → text, bytes or JSON.
 * Send (Render phase): strings, byte arrays and status codes → content.
 */

import { CannotTransformContentError } from '../pipeline-error.js';
import { bytesContent, isStatusCode, ReceiveTypes, statusContent, textContent } from './content.js';
import type { OutgoingContent, ReceiveRequest } from './content.js';
import { ReceivePhases, SendPhases } from './phases.js';
import type { ReceivePipeline, SendPipeline } from './phases.js';

type Conversion = { converted: true; value: unknown } | { converted: false };

const NOT_CONVERTED: Conversion = { converted: false };

// ---------------------------------------------------------------------------
// Receive
// ---------------------------------------------------------------------------

function asText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return new TextDecoder().decode(value);
  return null;
}

/** Convert the raw body to the requested built-in type, when it is one. */
export function convertReceived(request: ReceiveRequest): Conversion {
  const { type, value } = request;

  if (type === ReceiveTypes.text) {
    const text = asText(value);
    return text !== null && typeof value !== 'string' ? { converted: true, value: text } : NOT_CONVERTED;
  }

  if (type === ReceiveTypes.bytes) {
    return typeof value === 'string'
      ? { converted: true, value: new TextEncoder().encode(value) }
      : NOT_CONVERTED;
  }

  if (type === ReceiveTypes.json) {
    const text = asText(value);
    if (text === null) return NOT_CONVERTED;
    try {
      const parsed: unknown = JSON.parse(text);
      return { converted: true, value: parsed };
    } catch (error: unknown) {
      throw new CannotTransformContentError(type.name, { cause: error });
    }
  }

  return NOT_CONVERTED;
}

export function installDefaultReceiveTransformations(pipeline: ReceivePipeline): void {
  pipeline.intercept(ReceivePhases.Transform, async (context, request) => {
    const conversion = convertReceived(request);
    if (conversion.converted) {
      await context.proceedWith({ type: request.type, value: conversion.value });
    } else {
      await context.proceed();
    }
  });
}

// ---------------------------------------------------------------------------
// Send
// ---------------------------------------------------------------------------

/** Render plain values; returns null for anything else. */
export function renderDefaultContent(message: unknown): OutgoingContent | null {
  if (typeof message === 'string') return textContent(message);
  if (message instanceof Uint8Array) return bytesContent(message);
  if (isStatusCode(message)) return statusContent(message);
  return null;
}

export function installDefaultSendTransformations(pipeline: SendPipeline): void {
  pipeline.intercept(SendPhases.Render, async (context, message) => {
    const content = renderDefaultContent(message);
    if (content !== null) {
      await context.proceedWith(content);
    } else {
      await context.proceed();
    }
  });
}
