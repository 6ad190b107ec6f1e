export {
  FormatError,
  EngineError,
  EncodingError,
  StructureChangedError,
  ReorderError,
  describeError,
} from './errors';
export {
  FormatterConfigSchema,
  EngineConfigSchema,
  ConfigFileSchema,
  DEFAULT_FORMATTER_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  formatIssues,
} from './schemas';
export type { ConfigFile } from './schemas';
