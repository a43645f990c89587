#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import type { EnvSource } from "./config/env.js";
import { ConfigurationError } from "./config/errors.js";
import { loadSamplingConfig, type SamplingConfig } from "./config/sampling.js";
import { StructuredLogger } from "./logger.js";
import { hasErrnoCode } from "./nodePrimitives.js";
import { InMemoryCorpus, loadCorpusFile } from "./providers/corpus.js";
import { resolveOutputPath, saveGraph } from "./persistence/graphFile.js";
import { GraphSampler, type SamplingResult } from "./sampling/pipeline.js";

export interface RunFromEnvironmentOptions {
  readonly env?: EnvSource;
  /** Defaults to a logger honouring `KG_LOG_LEVEL` and `KG_LOG_FILE`. */
  readonly logger?: StructuredLogger;
  readonly signal?: AbortSignal;
}

export interface RunSummary {
  readonly config: SamplingConfig;
  readonly outputPath: string;
  readonly result: SamplingResult;
}

/**
 * Loads the configuration and the offline corpus named by `KG_CORPUS_FILE`,
 * samples a graph and writes it under the configured output directory.
 */
export async function runFromEnvironment(options: RunFromEnvironmentOptions = {}): Promise<RunSummary> {
  const config = await loadSamplingConfig({ env: options.env ?? process.env });
  const logger = options.logger ?? new StructuredLogger({ level: config.logLevel, logFile: config.logFile });
  if (!config.corpusFile) {
    throw new ConfigurationError("no document corpus configured", [
      { path: "corpusFile", message: "set KG_CORPUS_FILE or corpusFile in the configuration file" },
    ]);
  }

  const corpus = new InMemoryCorpus(await loadCorpusFile(config.corpusFile));
  logger.info("corpus_loaded", { path: config.corpusFile, languages: corpus.languages() });
  const sampler = new GraphSampler({
    config,
    providers: { links: corpus, translations: corpus, content: corpus },
    logger,
  });
  const result = await sampler.run({ signal: options.signal });

  const firstLanguage = config.languages[0];
  const outputPath = resolveOutputPath(config.outputDir, {
    startId: config.startIds[firstLanguage] ?? firstLanguage,
    totalSamples: config.maxVerticesPerLanguage * config.languages.length,
    invertProbability: config.invertProbability,
    removeProbability: config.removeProbability,
  });
  await saveGraph(outputPath, result.graph, {
    generatedAt: new Date().toISOString(),
    languages: config.languages,
    startIds: config.startIds,
    seed: config.seed,
    maxVerticesPerLanguage: config.maxVerticesPerLanguage,
    invertProbability: config.invertProbability,
    removeProbability: config.removeProbability,
    outcomes: result.languages,
  });
  logger.info("graph_saved", {
    path: outputPath,
    vertices: result.graph.vertexCount,
    edges: result.graph.countEdgesByColor(),
  });
  await logger.flush();
  return { config, outputPath, result };
}

/**
 * True when {@link moduleUrl} is the script node was started with. The
 * script path is resolved first since npm runs bins through a symlink.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  let resolved: string;
  try {
    resolved = realpathSync(scriptPath);
  } catch (error) {
    if (!hasErrnoCode(error, "ENOENT")) {
      throw error;
    }
    return false;
  }
  return realpathSync(fileURLToPath(moduleUrl)) === resolved;
}

const isCliEntryPoint = isEntryPoint(import.meta.url, process.argv[1]);

if (isCliEntryPoint) {
  runFromEnvironment().catch((error: unknown) => {
    new StructuredLogger().error("sampling_run_failed", { error });
    process.exitCode = 1;
  });
}
