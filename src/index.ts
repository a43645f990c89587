export { StructuredLogger, LOG_LEVELS } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.js";

export { ConfigurationError, ERROR_CONFIGURATION } from "./config/errors.js";
export type { ConfigurationIssue } from "./config/errors.js";
export {
  CONFIG_FILE_ENV,
  loadSamplingConfig,
  readEnvOverrides,
  resolveSamplingConfig,
  validateSamplingConfig,
} from "./config/sampling.js";
export type { LoadConfigOptions, SamplingConfig, SamplingConfigInput } from "./config/sampling.js";

export { SampleGraph, edgeKey } from "./graph/sampleGraph.js";
export { GraphInvariantError } from "./graph/errors.js";
export { DisjointSet } from "./graph/unionFind.js";
export { EDGE_COLORS, invertColor } from "./graph/types.js";
export type { EdgeColor, EdgeRecord, VertexAttributes, VertexPair, VertexRecord } from "./graph/types.js";

export {
  AmbiguousTitleError,
  NotFoundError,
  ProviderError,
  isNotFoundError,
  isProviderError,
} from "./providers/errors.js";
export type {
  ContentProvider,
  DocumentProviders,
  LinkProvider,
  ProviderCallOptions,
  SummaryOptions,
  TranslationProvider,
} from "./providers/types.js";
export { InMemoryCorpus, loadCorpusFile, parseCorpus } from "./providers/corpus.js";
export {
  applyCallPolicy,
  composePolicies,
  concurrencyPolicy,
  directCall,
  retryPolicy,
  timeoutPolicy,
} from "./providers/policies.js";
export type { CallPolicy, ProviderOperation } from "./providers/policies.js";
export { filterLinkTitles, isValidTitle } from "./providers/titleFilter.js";
export { truncateAtSentence } from "./providers/summary.js";

export { crawlLanguage } from "./sampling/crawler.js";
export type { CrawlOptions, CrawlResult, TruncationMode } from "./sampling/crawler.js";
export { resolveTranslations } from "./sampling/translationResolver.js";
export type { TranslationTable } from "./sampling/translationResolver.js";
export { buildCliqueEdges } from "./sampling/cliqueBuilder.js";
export { assembleGraph, buildLanguagePalette } from "./sampling/assembler.js";
export type { AssemblyResult, AssemblyStats, ColorConflictPolicy } from "./sampling/assembler.js";
export { perturbGraph } from "./sampling/perturbation.js";
export type { PerturbationResult, PerturbationStats } from "./sampling/perturbation.js";
export { captureSummaries, captureSummary } from "./sampling/contentCapture.js";
export { createSeededRandom, deriveStream } from "./sampling/random.js";
export type { RandomSource } from "./sampling/random.js";
export { CrawlCancelledError, SamplingCancelledError } from "./sampling/errors.js";
export { GraphSampler, buildCallPolicy } from "./sampling/pipeline.js";
export type { LanguageOutcome, SamplingResult, SamplingStats } from "./sampling/pipeline.js";

export {
  buildOutputFileName,
  deserializeGraph,
  loadGraph,
  saveGraph,
  serializeGraph,
} from "./persistence/graphFile.js";
export type { GraphDocument } from "./persistence/graphFile.js";
