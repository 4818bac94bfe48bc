/**
 * The per-request call object threaded through every pipeline run.
 *
 * `respond()` and `receive()` start nested runs of the application's
 * send and receive pipelines; each nested run gets its own context
 * chained to the call's signal.
 */

import {
  CannotTransformContentError,
  RequestAlreadyConsumedError,
  ResponseAlreadySentError,
} from '../pipeline-error.js';
import { Attributes } from './attributes.js';
import type { OutgoingContent, ReceiveType } from './content.js';
import type { ReceivePipeline, SendPipeline } from './phases.js';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** A request as handed over by the connector. */
export interface IncomingRequest {
  method: string;
  path: string;
  headers?: Record<string, string | readonly string[]>;
  body?: string | Uint8Array;
}

/** Turns the wire body into the raw value the receive pipeline starts from. */
export type BodyReader = (request: IncomingRequest, signal: AbortSignal) => Promise<unknown>;

/** Turns final content into wire bytes. */
export type ResponseWriter = (call: ApplicationCall, content: OutgoingContent) => Promise<void>;

/** Pipelines a call runs nested work on. */
export interface CallPipelines {
  readonly receivePipeline: ReceivePipeline;
  readonly sendPipeline: SendPipeline;
}

// ---------------------------------------------------------------------------
// CallRequest
// ---------------------------------------------------------------------------

export class CallRequest {
  readonly method: string;
  readonly path: string;
  /** Header values by lower-cased name. */
  readonly headers: ReadonlyMap<string, readonly string[]>;

  constructor(request: IncomingRequest) {
    this.method = request.method.toUpperCase();
    this.path = request.path;

    const headers = new Map<string, string[]>();
    for (const [name, value] of Object.entries(request.headers ?? {})) {
      const key = name.toLowerCase();
      const values = headers.get(key) ?? [];
      if (typeof value === 'string') {
        values.push(value);
      } else {
        values.push(...value);
      }
      headers.set(key, values);
    }
    this.headers = headers;
  }

  /** First value of a header, case-insensitive. */
  header(name: string): string | undefined {
    return this.headers.get(name.toLowerCase())?.[0];
  }

  headerValues(name: string): readonly string[] {
    return this.headers.get(name.toLowerCase()) ?? [];
  }
}

// ---------------------------------------------------------------------------
// CallResponse
// ---------------------------------------------------------------------------

export class CallResponse {
  /** Status chosen by a handler before responding. */
  status: number | undefined = undefined;
  readonly headers = new Map<string, string>();

  private sent: OutgoingContent | null = null;

  get isSent(): boolean {
    return this.sent !== null;
  }

  /** Content handed to the response writer, once sent. */
  get content(): OutgoingContent | null {
    return this.sent;
  }

  /** @internal Called by the engine after the writer succeeded. */
  markSent(content: OutgoingContent): void {
    this.status = content.status ?? this.status ?? 200;
    for (const [name, value] of Object.entries(content.headers)) {
      this.headers.set(name.toLowerCase(), value);
    }
    this.sent = content;
  }
}

// ---------------------------------------------------------------------------
// ApplicationCall
// ---------------------------------------------------------------------------

export interface ApplicationCallOptions {
  id: string;
  request: IncomingRequest;
  pipelines: CallPipelines;
  readBody: BodyReader;
  signal?: AbortSignal;
}

export class ApplicationCall {
  readonly id: string;
  readonly request: CallRequest;
  readonly response = new CallResponse();
  readonly attributes = new Attributes();
  /** Aborts when the call is cancelled (client gone, timeout, shutdown). */
  readonly signal: AbortSignal;

  private readonly incoming: IncomingRequest;
  private readonly pipelines: CallPipelines;
  private readonly readBody: BodyReader;
  private bodyConsumed = false;

  constructor(options: ApplicationCallOptions) {
    this.id = options.id;
    this.incoming = options.request;
    this.request = new CallRequest(options.request);
    this.pipelines = options.pipelines;
    this.readBody = options.readBody;
    this.signal = options.signal ?? new AbortController().signal;
  }

  /**
   * Send `message` through the send pipeline. Plain strings, byte arrays
   * and status codes are rendered by default; other values need a plugin
   * that transforms them.
   *
   * @throws ResponseAlreadySentError when a response was already written.
   */
  async respond(message: unknown): Promise<void> {
    if (this.response.isSent) {
      throw new ResponseAlreadySentError();
    }
    await this.pipelines.sendPipeline.execute(this, message, { signal: this.signal });
  }

  /**
   * Read the body and run it through the receive pipeline.
   *
   * @throws CannotTransformContentError when no transformation produced `type`.
   * @throws RequestAlreadyConsumedError on a second call.
   */
  async receive<T>(type: ReceiveType<T>): Promise<T> {
    if (this.bodyConsumed) {
      throw new RequestAlreadyConsumedError();
    }
    this.bodyConsumed = true;

    const raw = await this.readBody(this.incoming, this.signal);
    const result = await this.pipelines.receivePipeline.execute(
      this,
      { type, value: raw },
      { signal: this.signal },
    );

    const { value } = result;
    if (!type.is(value)) {
      throw new CannotTransformContentError(type.name);
    }
    return value;
  }
}
