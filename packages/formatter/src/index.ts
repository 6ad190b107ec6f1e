export { formatGdscript, formatGdscriptWithReport, decodeUtf8 } from './pipeline';
export type { FormatOptions, Reorderer } from './pipeline';
export {
  PassthroughEngine,
  TopiaryEngine,
  buildTopiaryArgs,
  buildTopiaryConfiguration,
  getProcessErrorMessage,
  indentUnit,
} from './engine';
export type { EngineInput, PrettyPrinter, TopiaryEngineOptions } from './engine';
export { ensureDeclarationSpacing, findSpacingInsertions } from './spacing';
export type { SpacingInsertion } from './spacing';
export {
  EXTENDS_BLANK_LINES,
  WHITESPACE_ONLY_LINES,
  DANGLING_SEMICOLONS,
  EXCESS_BLANK_LINES,
  PREPROCESS_PASSES,
  POSTPROCESS_PASSES,
  runPass,
  preprocess,
  postprocess,
} from './passes';
export type { TextPass } from './passes';
export { buildFingerprint, compareFingerprints } from './fingerprint';
export type { FingerprintOptions } from './fingerprint';
export {
  NORMALIZATION_RULESET_VERSION,
  TRAILING_SEMICOLONS,
  INLINE_VARIABLE_ANNOTATIONS,
  registerNormalizationRule,
  getNormalizationRule,
  listNormalizationRules,
  normalizeFingerprint,
} from './normalize';
export type { NormalizationRule } from './normalize';
