/**
 * Phaseline public API.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export * from './core/pipeline/index.js';
export * from './core/pipeline-error.js';
export {
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
  type Logger,
  LOG_LEVELS,
  createLogger,
  configureLogging,
  resetLogging,
} from './core/logger.js';

export { AttributeKey, Attributes } from './core/call/attributes.js';
export {
  type TextContent,
  type BytesContent,
  type StatusContent,
  type OutgoingContent,
  type ReceiveType,
  type ReceiveRequest,
  type JsonValue,
  TEXT_PLAIN_UTF8,
  APPLICATION_OCTET_STREAM,
  textContent,
  bytesContent,
  statusContent,
  isOutgoingContent,
  contentStatus,
  defineReceiveType,
  ReceiveTypes,
} from './core/call/content.js';
export {
  type CallPipeline,
  type ReceivePipeline,
  type SendPipeline,
  CallPhases,
  ReceivePhases,
  SendPhases,
  createCallPipeline,
  createReceivePipeline,
  createSendPipeline,
} from './core/call/phases.js';
export {
  type IncomingRequest,
  type BodyReader,
  type ResponseWriter,
  ApplicationCall,
  CallRequest,
  CallResponse,
} from './core/call/application-call.js';

export * from './core/plugin/index.js';
export { Application } from './core/application.js';
export {
  type EngineModule,
  type EngineCollaborators,
  type EngineOptions,
  type HandleOptions,
  Engine,
  RoutingFailureStatus,
} from './core/engine.js';
export { loadConfig, initialize, type InitResult } from './core/config-loader.js';

export {
  StatusPages,
  StatusPagesConfig,
  type ExceptionHandler,
  type StatusHandler,
} from './plugins/status-pages/status-pages.js';
export { CallLogging, CallLoggingConfig } from './plugins/call-logging/call-logging.js';
