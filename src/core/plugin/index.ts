export type {
  HookCategory,
  InstalledPlugin,
  Interception,
  InterceptionOwner,
  PluginDefinition,
  PluginHost,
  PluginReference,
} from './types.js';
export { OrderingConstraints } from './ordering.js';
export {
  AFTER_TRANSFORM_HOOK,
  CALL_HOOK,
  CallHandlingContext,
  OnCallContext,
  OnCallReceiveContext,
  OnCallRespondAfterTransformContext,
  OnCallRespondContext,
  RECEIVE_HOOK,
  RESPOND_HOOK,
  hookInterceptor,
} from './hooks.js';
export type {
  AfterTransformHandler,
  CallHandler,
  HookTarget,
  ReceiveHandler,
  RespondHandler,
} from './hooks.js';
export { CallHandlingBuilderBase } from './call-handling-builder.js';
export type { BuilderVariant, CallHandlingBuilder, OnCallRespond } from './call-handling-builder.js';
export { AfterPluginsBuilder, BeforePluginsBuilder, RelativePluginBuilder } from './relative-builder.js';
export { PluginBuilder } from './plugin-builder.js';
export { createConfigurablePlugin, createPlugin } from './create-plugin.js';
export type { NoConfiguration } from './create-plugin.js';
