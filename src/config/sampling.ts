import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { COLOR_CONFLICT_POLICIES, type ColorConflictPolicy } from "../sampling/assembler.js";
import { TRUNCATION_MODES, type TruncationMode } from "../sampling/crawler.js";
import {
  readOptionalBool,
  readOptionalCsv,
  readOptionalEnum,
  readOptionalInt,
  readOptionalNumber,
  readOptionalString,
  type EnvSource,
} from "./env.js";
import { ConfigurationError, type ConfigurationIssue } from "./errors.js";

/** Languages crawled when nothing else is configured. */
const DEFAULT_LANGUAGES = ["en", "fr", "es"] as const;
/** Start documents matching {@link DEFAULT_LANGUAGES}. */
const DEFAULT_START_IDS = ["Mathematics", "Mathématiques", "Matemáticas"] as const;
const DEFAULT_MAX_VERTICES = 100;
const DEFAULT_INVERT_PROBABILITY = 0.1;
const DEFAULT_REMOVE_PROBABILITY = 0.8;
const DEFAULT_SEED = "kg-sampler";
const DEFAULT_SUMMARY_MAX_CHARS = 500;
const DEFAULT_CONCURRENCY = 4;
const DEFAULT_CALL_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_BASE_DELAY_MS = 250;
const DEFAULT_OUTPUT_DIR = "excavated-graphs";

/** Environment variable naming an optional YAML/JSON configuration file. */
export const CONFIG_FILE_ENV = "KG_SAMPLER_CONFIG";

/** Immutable, validated settings of one sampling run. */
export interface SamplingConfig {
  /** Language codes in crawl/assembly order. */
  readonly languages: readonly string[];
  /** One start identifier per language. */
  readonly startIds: Readonly<Record<string, string>>;
  readonly maxVerticesPerLanguage: number;
  readonly invertProbability: number;
  readonly removeProbability: number;
  readonly seed: string;
  readonly captureContent: boolean;
  readonly summaryMaxChars: number;
  readonly maxLinksPerExpansion: number | null;
  readonly truncation: TruncationMode;
  /** Provider calls in flight across all languages. */
  readonly concurrency: number;
  readonly callTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly colorConflict: ColorConflictPolicy;
  /** Explicit vertex colors; languages without one get a seeded random color. */
  readonly languageColors: Readonly<Record<string, string>>;
  /** Optional display shape per language, copied onto its vertices. */
  readonly languageShapes: Readonly<Record<string, string>>;
  readonly outputDir: string;
  /** Offline corpus consumed by the executable entry point. */
  readonly corpusFile: string | null;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

const probability = z.number().min(0, "must be >= 0").max(1, "must be <= 1");
const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "must be a #RRGGBB color");

/** Shape accepted from configuration files; every key is optional. */
const fileSchema = z
  .object({
    languages: z.array(z.string()).optional(),
    startIds: z.union([z.array(z.string()), z.record(z.string())]).optional(),
    maxVerticesPerLanguage: z.number().optional(),
    invertProbability: z.number().optional(),
    removeProbability: z.number().optional(),
    seed: z.union([z.string(), z.number()]).optional(),
    captureContent: z.boolean().optional(),
    summaryMaxChars: z.number().optional(),
    maxLinksPerExpansion: z.number().nullable().optional(),
    truncation: z.enum(["prefix", "random"]).optional(),
    concurrency: z.number().optional(),
    callTimeoutMs: z.number().optional(),
    maxRetries: z.number().optional(),
    retryBaseDelayMs: z.number().optional(),
    colorConflict: z.enum(["blue-wins", "red-wins"]).optional(),
    languageColors: z.record(z.string()).optional(),
    languageShapes: z.record(z.string()).optional(),
    outputDir: z.string().optional(),
    corpusFile: z.string().nullable().optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
    logFile: z.string().nullable().optional(),
  })
  .strict();

/** Partial settings layered over the defaults. */
export type SamplingConfigInput = z.infer<typeof fileSchema>;

const configSchema = z
  .object({
    languages: z
      .array(z.string().trim().min(1, "language codes must be non-empty"))
      .min(1, "at least one language is required")
      .refine((languages) => new Set(languages).size === languages.length, "languages must be unique"),
    startIds: z.record(z.string().trim().min(1, "start identifiers must be non-empty")),
    maxVerticesPerLanguage: z.number().int("must be an integer").positive("must be positive"),
    invertProbability: probability,
    removeProbability: probability,
    seed: z.string().min(1),
    captureContent: z.boolean(),
    summaryMaxChars: z.number().int().positive(),
    maxLinksPerExpansion: z.number().int().positive().nullable(),
    truncation: z.enum(["prefix", "random"]),
    concurrency: z.number().int().min(1).max(64),
    callTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0).max(10),
    retryBaseDelayMs: z.number().int().min(0),
    colorConflict: z.enum(["blue-wins", "red-wins"]),
    languageColors: z.record(hexColor),
    languageShapes: z.record(z.string().min(1)),
    outputDir: z.string().min(1),
    corpusFile: z.string().min(1).nullable(),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    logFile: z.string().min(1).nullable(),
  })
  .superRefine((config, ctx) => {
    for (const language of config.languages) {
      if (config.startIds[language] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["startIds", language],
          message: "missing start identifier",
        });
      }
    }
  });

function defaults(): SamplingConfig {
  return {
    languages: [...DEFAULT_LANGUAGES],
    startIds: zipStartIds([...DEFAULT_LANGUAGES], [...DEFAULT_START_IDS]),
    maxVerticesPerLanguage: DEFAULT_MAX_VERTICES,
    invertProbability: DEFAULT_INVERT_PROBABILITY,
    removeProbability: DEFAULT_REMOVE_PROBABILITY,
    seed: DEFAULT_SEED,
    captureContent: false,
    summaryMaxChars: DEFAULT_SUMMARY_MAX_CHARS,
    maxLinksPerExpansion: null,
    truncation: "prefix",
    concurrency: DEFAULT_CONCURRENCY,
    callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
    maxRetries: DEFAULT_MAX_RETRIES,
    retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
    colorConflict: "blue-wins",
    languageColors: {},
    languageShapes: {},
    outputDir: DEFAULT_OUTPUT_DIR,
    corpusFile: null,
    logLevel: "info",
    logFile: null,
  };
}

/** Pairs start identifiers with languages by position; extra entries are ignored. */
function zipStartIds(languages: readonly string[], ids: readonly string[]): Record<string, string> {
  const startIds: Record<string, string> = {};
  languages.forEach((language, index) => {
    const id = ids[index];
    if (id !== undefined) {
      startIds[language] = id;
    }
  });
  return startIds;
}

/**
 * Collects the overrides present in {@link env}. Every variable that is set to
 * a literal its reader rejects is reported in one {@link ConfigurationError};
 * out-of-range values are kept so the schema reports them.
 */
export function readEnvOverrides(env: EnvSource = process.env): SamplingConfigInput {
  const issues: ConfigurationIssue[] = [];
  const read = <T>(reader: () => T | undefined): T | undefined => {
    try {
      return reader();
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      issues.push(...error.issues);
      return undefined;
    }
  };

  const overrides: SamplingConfigInput = {};
  const languages = readOptionalCsv("KG_LANGUAGES", env);
  if (languages) overrides.languages = languages;
  const startIds = readOptionalCsv("KG_START_IDS", env);
  if (startIds) overrides.startIds = startIds;
  const maxVertices = read(() => readOptionalInt("KG_MAX_VERTICES", env));
  if (maxVertices !== undefined) overrides.maxVerticesPerLanguage = maxVertices;
  const invert = read(() => readOptionalNumber("KG_INVERT_PROBABILITY", env));
  if (invert !== undefined) overrides.invertProbability = invert;
  const remove = read(() => readOptionalNumber("KG_REMOVE_PROBABILITY", env));
  if (remove !== undefined) overrides.removeProbability = remove;
  const seed = readOptionalString("KG_SEED", env);
  if (seed !== undefined) overrides.seed = seed;
  const capture = read(() => readOptionalBool("KG_CAPTURE_CONTENT", env));
  if (capture !== undefined) overrides.captureContent = capture;
  const summaryMaxChars = read(() => readOptionalInt("KG_SUMMARY_MAX_CHARS", env));
  if (summaryMaxChars !== undefined) overrides.summaryMaxChars = summaryMaxChars;
  const maxLinks = read(() => readOptionalInt("KG_MAX_LINKS_PER_EXPANSION", env));
  if (maxLinks !== undefined) overrides.maxLinksPerExpansion = maxLinks === 0 ? null : maxLinks;
  const truncation = read(() => readOptionalEnum("KG_TRUNCATION", TRUNCATION_MODES, env));
  if (truncation !== undefined) overrides.truncation = truncation;
  const concurrency = read(() => readOptionalInt("KG_CONCURRENCY", env));
  if (concurrency !== undefined) overrides.concurrency = concurrency;
  const timeout = read(() => readOptionalInt("KG_CALL_TIMEOUT_MS", env));
  if (timeout !== undefined) overrides.callTimeoutMs = timeout;
  const retries = read(() => readOptionalInt("KG_MAX_RETRIES", env));
  if (retries !== undefined) overrides.maxRetries = retries;
  const retryDelay = read(() => readOptionalInt("KG_RETRY_BASE_DELAY_MS", env));
  if (retryDelay !== undefined) overrides.retryBaseDelayMs = retryDelay;
  const conflict = read(() => readOptionalEnum("KG_COLOR_CONFLICT", COLOR_CONFLICT_POLICIES, env));
  if (conflict !== undefined) overrides.colorConflict = conflict;
  const outputDir = readOptionalString("KG_OUTPUT_DIR", env);
  if (outputDir !== undefined) overrides.outputDir = outputDir;
  const corpusFile = readOptionalString("KG_CORPUS_FILE", env);
  if (corpusFile !== undefined) overrides.corpusFile = corpusFile;
  const logLevel = read(() => readOptionalEnum("KG_LOG_LEVEL", LOG_LEVELS, env));
  if (logLevel !== undefined) overrides.logLevel = logLevel;
  const logFile = readOptionalString("KG_LOG_FILE", env);
  if (logFile !== undefined) overrides.logFile = logFile;

  if (issues.length > 0) {
    throw new ConfigurationError("invalid environment overrides", issues);
  }
  return overrides;
}

/**
 * Layers {@link layers} (lowest precedence first) over the defaults and
 * validates the result. Start identifiers given as a list are matched to the
 * final language list by position.
 */
export function resolveSamplingConfig(...layers: SamplingConfigInput[]): SamplingConfig {
  const base = defaults();
  let languages: readonly string[] = base.languages;
  let startIdSource: string[] | Record<string, string> = { ...base.startIds };
  const merged: Record<string, unknown> = { ...base };

  for (const layer of layers) {
    const parsed = fileSchema.safeParse(layer);
    if (!parsed.success) {
      throw toConfigurationError("invalid sampler configuration", parsed.error);
    }
    const { languages: layerLanguages, startIds: layerStartIds, seed, ...rest } = parsed.data;
    if (layerLanguages) languages = layerLanguages;
    if (layerStartIds) startIdSource = layerStartIds;
    for (const [key, value] of Object.entries(rest)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
    if (seed !== undefined) {
      merged.seed = String(seed);
    }
  }

  const startIds = Array.isArray(startIdSource) ? zipStartIds(languages, startIdSource) : startIdSource;
  const validated = configSchema.safeParse({ ...merged, languages: [...languages], startIds });
  if (!validated.success) {
    throw toConfigurationError("invalid sampler configuration", validated.error);
  }
  const config = validated.data;
  return Object.freeze({
    ...config,
    languages: Object.freeze([...config.languages]),
    startIds: Object.freeze(pick(config.startIds, config.languages)),
    languageColors: Object.freeze({ ...config.languageColors }),
    languageShapes: Object.freeze({ ...config.languageShapes }),
  });
}

/**
 * Re-validates a configuration built by hand (for instance in tests or by an
 * embedding application) and returns its frozen, normalised form.
 */
export function validateSamplingConfig(config: SamplingConfig): SamplingConfig {
  return resolveSamplingConfig({
    ...config,
    languages: [...config.languages],
    startIds: { ...config.startIds },
    languageColors: { ...config.languageColors },
    languageShapes: { ...config.languageShapes },
  });
}

export interface LoadConfigOptions {
  readonly env?: EnvSource;
  /** Configuration file; defaults to the path named by `KG_SAMPLER_CONFIG`. */
  readonly file?: string | null;
}

/** Defaults, then the optional file, then environment overrides. */
export async function loadSamplingConfig(options: LoadConfigOptions = {}): Promise<SamplingConfig> {
  const env = options.env ?? process.env;
  const file = options.file === undefined ? readOptionalString(CONFIG_FILE_ENV, env) ?? null : options.file;
  const layers: SamplingConfigInput[] = [];
  if (file) {
    layers.push(await readConfigFile(file));
  }
  layers.push(readEnvOverrides(env));
  return resolveSamplingConfig(...layers);
}

async function readConfigFile(path: string): Promise<SamplingConfigInput> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`cannot read configuration file '${path}'`, [], { cause: error });
  }
  let decoded: unknown;
  try {
    decoded = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`configuration file '${path}' is not valid YAML/JSON`, [], { cause: error });
  }
  const parsed = fileSchema.safeParse(decoded ?? {});
  if (!parsed.success) {
    throw toConfigurationError(`invalid configuration file '${path}'`, parsed.error);
  }
  return parsed.data;
}

function toConfigurationError(message: string, error: z.ZodError): ConfigurationError {
  return new ConfigurationError(
    message,
    error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
  );
}

/** Copies the entries of {@link record} listed in {@link keys}, in key order. */
function pick(record: Record<string, string>, keys: readonly string[]): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}
