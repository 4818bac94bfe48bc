export {
  ErrorKind,
  type ErrorKindValue,
  type ErrorPayload,
  ERROR_KIND_PARENT,
  kindLineage,
  isKindOf,
} from './errors.js';

export { CONFIG_JSON_SCHEMA } from './config-schema.js';

export {
  type EngineSection,
  type LoggingSection,
  type FallbackSection,
  type PhaselineConfig,
  DEFAULT_CONFIG,
  defaultConfig,
  resolveConfigPath,
  parseConfig,
} from './config.js';
