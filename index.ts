// ---- Setup ----
export { setupCardtrait } from './src/setup';
export type { CardtraitOptions, CardtraitContext } from './src/config';
export {
  DEFAULT_PACK_DIR,
  DEFAULT_TRANSLATIONS_DIR,
  DEFAULT_TRAITS_FILE,
  DEFAULT_LANGUAGE,
  DEFAULT_INDENT,
  languageDir,
  languageTraitsPath,
  languagePackDir,
} from './src/config';
export {
  loadConfig,
  loadConfigFromPath,
  validateRawConfig,
  mergeCliArgs,
  buildDefaultConfig,
  toOptions,
  indentOrDefault,
  type CardtraitFileConfig,
  type ConfigError,
} from './src/config-file';

// ---- Types ----
export type { CardRecord, TraitEntry } from './src/trait/types';
export { isCardRecord, isTraitEntry, compareTraitEntries } from './src/trait/types';
export {
  DirectoryNotFoundError,
  TraitsFileNotFoundError,
  LanguageNotFoundError,
  MissingTraitTranslationError,
  TextBridgeParseError,
  JsonFileError,
} from './src/trait/errors';

// ---- Pure utilities ----
export { splitTraits, mergeTraits } from './src/trait/codec';

// ---- File system ----
export { getJsonFiles } from './src/fs/json-files';
export { readCardFile, readTraitFile, writeJsonFile } from './src/fs/json-io';

// ---- Operations ----
export {
  makePlaceholder,
  updatePlaceholder,
  type MakePlaceholderResult,
  type UpdatePlaceholderResult,
} from './src/ops/placeholder';
export {
  updateTraits,
  type UpdateTraitsOptions,
  type UpdateTraitsResult,
  type PackTraitsChange,
} from './src/ops/propagate';
export { jsonToText, textToJson, type TextToJsonResult } from './src/ops/text-bridge';
export { runPipeline, type PipelineResult } from './src/ops/pipeline';
