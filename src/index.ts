export { createGameJobs, loadGameJobs, parseEnumerationConfig, parseSchemaCatalog } from './config/config-parser';
export type { GameConfigResult, GameJobEntry, LoadedGameJobs } from './config/config-parser';
export type { GameConfig, GameJobOverrides, SchemaCatalog } from './config/types';
export { buildDocument } from './enumeration/buildDocument';
export { enumerateCombinations, generateCombinations } from './enumeration/combinationGenerator';
export { DEFAULT_SIZE_THRESHOLD, checkSize, countCombinations } from './enumeration/countCombinations';
export type { SizeVerdict } from './enumeration/countCombinations';
export {
    ConfigError,
    EnumerationError,
    InvalidSpecError,
    SchemaLookupError,
    SinkError,
    SizeThresholdExceeded,
} from './enumeration/errors';
export { defaultValue, fillFallback } from './enumeration/fillFallback';
export { resolveGameOptions } from './enumeration/resolveGameOptions';
export { resolveOption } from './enumeration/resolveOption';
export { runGameJobs } from './enumeration/runGameJobs';
export type { ConfirmLargeGame, RunGameJobsOptions, RunSummary } from './enumeration/runGameJobs';
export { DEFAULT_SPLITS, sampleSplits } from './enumeration/sampleSplits';
export * from './enumeration/types';
export type { default as DocumentSink } from './output/DocumentSink';
export { default as MemoryDocumentSink } from './output/MemoryDocumentSink';
export { default as YamlFileSink } from './output/YamlFileSink';
export { formatDocument, toHostDocument } from './output/formatDocument';
