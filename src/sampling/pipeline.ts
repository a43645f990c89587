import { ConfigurationError } from "../config/errors.js";
import { validateSamplingConfig, type SamplingConfig } from "../config/sampling.js";
import type { SampleGraph } from "../graph/sampleGraph.js";
import type { StructuredLogger } from "../logger.js";
import {
  applyCallPolicy,
  composePolicies,
  concurrencyPolicy,
  retryPolicy,
  timeoutPolicy,
  type CallPolicy,
} from "../providers/policies.js";
import { AmbiguousTitleError, isNotFoundError, isProviderError } from "../providers/errors.js";
import type { ContentProvider, DocumentProviders } from "../providers/types.js";
import { assembleGraph, buildLanguagePalette, type AssemblyStats } from "./assembler.js";
import { buildCliqueEdges } from "./cliqueBuilder.js";
import { captureSummaries } from "./contentCapture.js";
import { crawlLanguage, type CrawlResult } from "./crawler.js";
import { CrawlCancelledError, SamplingCancelledError } from "./errors.js";
import { perturbGraph, type PerturbationStats } from "./perturbation.js";
import { deriveStream } from "./random.js";
import { resolveTranslations, type TranslationTable } from "./translationResolver.js";

export type LanguageStatus = "completed" | "failed" | "cancelled";

/** Stage a language was in when it stopped. */
export type LanguageStage = "crawl" | "content" | "translations";

export interface LanguageOutcome {
  readonly language: string;
  readonly startId: string;
  readonly status: LanguageStatus;
  /** Set when the language did not complete. */
  readonly stage: LanguageStage | null;
  /** Vertices discovered by the crawl, whether or not they were kept. */
  readonly vertices: number;
  readonly redEdges: number;
  readonly expansions: number;
  readonly missing: readonly string[];
  readonly error: { readonly code: string | null; readonly message: string } | null;
}

export interface SamplingStats {
  readonly assembly: AssemblyStats;
  readonly perturbation: PerturbationStats;
  readonly durationMs: number;
}

export interface SamplingResult {
  /** Perturbed graph. */
  readonly graph: SampleGraph;
  /** Assembled graph before perturbation. */
  readonly baseline: SampleGraph;
  readonly languages: readonly LanguageOutcome[];
  readonly stats: SamplingStats;
}

export interface GraphSamplerOptions {
  readonly config: SamplingConfig;
  readonly providers: DocumentProviders;
  readonly logger?: StructuredLogger;
  /** Replaces the retry/concurrency/timeout chain derived from the configuration. */
  readonly callPolicy?: CallPolicy;
  /** Clock used for the reported duration. */
  readonly now?: () => number;
}

export interface RunOptions {
  /** Aborting cancels every language and rejects the run. */
  readonly signal?: AbortSignal;
}

interface LanguageState {
  readonly language: string;
  readonly startId: string;
  readonly controller: AbortController;
  readonly logger?: StructuredLogger;
  status: LanguageStatus | "running";
  stage: LanguageStage;
  crawl: CrawlResult | null;
  summaries: Map<string, string> | null;
  translations: TranslationTable | null;
  error: unknown;
  /** First failure that ended the language; set before its signal is aborted. */
  failure: { readonly error: unknown } | null;
}

interface CompletedLanguage {
  readonly language: string;
  readonly crawl: CrawlResult;
  readonly translations: TranslationTable;
  readonly summaries: Map<string, string> | null;
}

/**
 * Retry outermost so backoff waits do not hold a concurrency slot; the timeout
 * covers one attempt. {@link failFast} runs inside the concurrency slot, so it
 * sees a failure before the next queued call is released.
 */
export function buildCallPolicy(config: SamplingConfig, logger?: StructuredLogger, failFast?: CallPolicy): CallPolicy {
  return composePolicies(
    retryPolicy({ maxRetries: config.maxRetries, baseDelayMs: config.retryBaseDelayMs, logger }),
    concurrencyPolicy(config.concurrency),
    ...(failFast ? [failFast] : []),
    timeoutPolicy(config.callTimeoutMs),
  );
}

/** Failures no retry will recover from and no stage absorbs. */
function isTerminalFailure(error: unknown): boolean {
  if (isNotFoundError(error) || error instanceof AmbiguousTitleError) {
    return false;
  }
  return !(isProviderError(error) && error.retriable);
}

/**
 * Runs a full sampling pass: one crawl per language in parallel, a join, the
 * translation lookups of every surviving language, clique building, assembly
 * and finally perturbation.
 *
 * Each language runs under its own abort controller. A language whose crawl,
 * content capture or translation lookup fails (or is cancelled through
 * {@link cancelLanguage}) is reported in the outcomes and contributes nothing
 * to the graph; the other languages are unaffected.
 */
export class GraphSampler {
  private readonly config: SamplingConfig;
  private readonly providers: DocumentProviders;
  private readonly content: ContentProvider | null;
  private readonly logger?: StructuredLogger;
  private readonly now: () => number;
  private active: Map<string, LanguageState> | null = null;

  constructor(options: GraphSamplerOptions) {
    this.config = validateSamplingConfig(options.config);
    if (this.config.captureContent && !options.providers.content) {
      throw new ConfigurationError("content capture is enabled but no content provider was supplied", [
        { path: "captureContent", message: "requires a content provider" },
      ]);
    }
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    const failFast: CallPolicy = async (_operation, call, signal) => {
      try {
        return await call(signal);
      } catch (error) {
        if (isTerminalFailure(error)) {
          this.failLanguage(signal, error);
        }
        throw error;
      }
    };
    const policy = options.callPolicy
      ? composePolicies(options.callPolicy, failFast)
      : buildCallPolicy(this.config, this.logger, failFast);
    this.providers = applyCallPolicy(options.providers, policy);
    this.content = this.config.captureContent ? this.providers.content ?? null : null;
  }

  /**
   * Abandons one language of the run in progress. Returns `false` when no run
   * is active or the language is unknown or already aborted.
   */
  cancelLanguage(language: string, reason?: unknown): boolean {
    const controller = this.active?.get(language)?.controller;
    if (!controller || controller.signal.aborted) {
      return false;
    }
    controller.abort(reason ?? `language '${language}' cancelled by caller`);
    return true;
  }

  /**
   * Marks the language owning {@link signal} as failed and aborts it, so its
   * queued provider calls are dropped instead of holding concurrency slots.
   */
  private failLanguage(signal: AbortSignal | undefined, error: unknown): void {
    if (!signal || signal.aborted) {
      return;
    }
    for (const state of this.active?.values() ?? []) {
      if (state.controller.signal === signal) {
        state.failure = { error };
        state.controller.abort(error);
        return;
      }
    }
  }

  async run(options: RunOptions = {}): Promise<SamplingResult> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new SamplingCancelledError(signal.reason);
    }
    if (this.active) {
      throw new Error("a sampling run is already in progress");
    }
    const startedAt = this.now();
    const config = this.config;
    this.logger?.info("sampling_started", {
      languages: config.languages,
      max_vertices: config.maxVerticesPerLanguage,
      capture_content: config.captureContent,
      seed: config.seed,
    });

    const states = config.languages.map((language) => this.createState(language));
    this.active = new Map(states.map((state) => [state.language, state]));
    const forwardAbort = (): void => {
      for (const state of states) {
        state.controller.abort(signal?.reason);
      }
    };
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      await Promise.all(states.map((state) => this.settle(state, "crawl", () => this.crawlAndCapture(state))));
      // Translations start once every crawl has settled.
      await Promise.all(
        states
          .filter((state) => state.status === "running")
          .map((state) => this.settle(state, "translations", () => this.translate(state))),
      );
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
      this.active = null;
    }

    if (signal?.aborted) {
      this.logger?.warn("sampling_cancelled", { reason: String(signal.reason) });
      throw new SamplingCancelledError(signal.reason);
    }

    const completed = collectCompleted(states);
    const knownIds = new Set<string>();
    for (const entry of completed) {
      for (const id of entry.crawl.vertices) {
        knownIds.add(id);
      }
    }
    const blueEdges = buildCliqueEdges(
      completed.map((entry) => entry.translations),
      knownIds,
    );
    const redEdges = completed.flatMap((entry) => entry.crawl.edges);

    const summaries = new Map<string, string>();
    for (const entry of completed) {
      for (const [id, summary] of entry.summaries ?? []) {
        if (!summaries.has(id)) {
          summaries.set(id, summary);
        }
      }
    }

    const palette = buildLanguagePalette(config.languages, deriveStream(config.seed, "palette"), config.languageColors);
    const assembly = assembleGraph(
      completed.map((entry) => ({ language: entry.language, vertices: entry.crawl.vertices })),
      redEdges,
      blueEdges,
      {
        colorConflict: config.colorConflict,
        palette,
        shapes: new Map(Object.entries(config.languageShapes)),
        ...(this.content ? { summaries } : {}),
        logger: this.logger,
      },
    );
    const perturbation = perturbGraph(assembly.graph, {
      invertProbability: config.invertProbability,
      removeProbability: config.removeProbability,
      rng: deriveStream(config.seed, "perturb"),
      logger: this.logger,
    });

    const languages = states.map(describeOutcome);
    const stats: SamplingStats = {
      assembly: assembly.stats,
      perturbation: perturbation.stats,
      durationMs: Math.max(0, this.now() - startedAt),
    };
    this.logger?.info("sampling_completed", {
      completed: languages.filter((outcome) => outcome.status === "completed").map((outcome) => outcome.language),
      failed: languages.filter((outcome) => outcome.status === "failed").map((outcome) => outcome.language),
      cancelled: languages.filter((outcome) => outcome.status === "cancelled").map((outcome) => outcome.language),
      vertices: perturbation.graph.vertexCount,
      edges: perturbation.graph.edgeCount,
      duration_ms: stats.durationMs,
    });
    return { graph: perturbation.graph, baseline: assembly.graph, languages, stats };
  }

  private createState(language: string): LanguageState {
    const startId = this.config.startIds[language];
    if (startId === undefined) {
      throw new ConfigurationError(`no start identifier configured for '${language}'`, [
        { path: `startIds.${language}`, message: "missing start identifier" },
      ]);
    }
    return {
      language,
      startId,
      controller: new AbortController(),
      logger: this.logger?.child({ language }),
      status: "running",
      stage: "crawl",
      crawl: null,
      summaries: null,
      translations: null,
      error: null,
      failure: null,
    };
  }

  private async crawlAndCapture(state: LanguageState): Promise<void> {
    const config = this.config;
    const signal = state.controller.signal;
    state.crawl = await crawlLanguage(this.providers.links, {
      startId: state.startId,
      language: state.language,
      maxVertices: config.maxVerticesPerLanguage,
      maxLinksPerExpansion: config.maxLinksPerExpansion,
      truncation: config.truncation,
      rng: deriveStream(config.seed, "crawl", state.language),
      signal,
      logger: state.logger,
    });
    if (this.content) {
      state.stage = "content";
      state.summaries = await captureSummaries(this.content, state.crawl.vertices, state.language, {
        maxChars: config.summaryMaxChars,
        signal,
        logger: state.logger,
      });
    }
  }

  private async translate(state: LanguageState): Promise<void> {
    if (!state.crawl) {
      return;
    }
    state.translations = await resolveTranslations(
      this.providers.translations,
      state.crawl.vertices,
      state.language,
      this.config.languages,
      { signal: state.controller.signal, logger: state.logger },
    );
  }

  /**
   * Runs one stage of a language and records, rather than propagates, its
   * failure. A failed language is aborted so its pending calls are dropped.
   */
  private async settle(state: LanguageState, stage: LanguageStage, work: () => Promise<void>): Promise<void> {
    state.stage = stage;
    try {
      await work();
    } catch (error) {
      const cancelled = error instanceof CrawlCancelledError || state.controller.signal.aborted;
      if (!state.failure && !cancelled) {
        state.failure = { error };
        state.controller.abort(error);
      }
      if (!state.failure) {
        state.error = error;
        state.status = "cancelled";
        state.logger?.warn("language_cancelled", { stage: state.stage, reason: describeError(error).message });
        return;
      }
      state.error = state.failure.error;
      state.status = "failed";
      state.logger?.error("language_failed", { stage: state.stage, error: state.failure.error });
    }
  }
}

function collectCompleted(states: LanguageState[]): CompletedLanguage[] {
  const completed: CompletedLanguage[] = [];
  for (const state of states) {
    if (state.status !== "running" || !state.crawl || !state.translations) {
      continue;
    }
    state.status = "completed";
    completed.push({
      language: state.language,
      crawl: state.crawl,
      translations: state.translations,
      summaries: state.summaries,
    });
  }
  return completed;
}

/** Public summary of one language; a state still `running` here never finished its stages. */
function describeOutcome(state: LanguageState): LanguageOutcome {
  const status: LanguageStatus = state.status === "running" ? "failed" : state.status;
  return {
    language: state.language,
    startId: state.startId,
    status,
    stage: status === "completed" ? null : state.stage,
    vertices: state.crawl?.vertices.length ?? 0,
    redEdges: state.crawl?.edges.length ?? 0,
    expansions: state.crawl?.expansions ?? 0,
    missing: state.crawl?.missing ?? [],
    error: status === "completed" ? null : describeError(state.error),
  };
}

function describeError(error: unknown): { code: string | null; message: string } {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : null;
    return { code, message: error.message };
  }
  return { code: null, message: String(error) };
}
