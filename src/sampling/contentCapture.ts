import type { StructuredLogger } from "../logger.js";
import { AmbiguousTitleError, isNotFoundError } from "../providers/errors.js";
import { truncateAtSentence } from "../providers/summary.js";
import type { ContentProvider } from "../providers/types.js";
import { throwIfCancelled } from "./errors.js";

export interface CaptureOptions {
  readonly maxChars: number;
  readonly signal?: AbortSignal;
  readonly logger?: StructuredLogger;
}

/**
 * Summary of one document. An ambiguous title falls back to the first
 * disambiguation candidate; when that fails too, or the document is missing,
 * the summary is empty and the vertex is kept. Transient provider failures
 * propagate.
 */
export async function captureSummary(
  provider: ContentProvider,
  id: string,
  language: string,
  options: CaptureOptions,
): Promise<string> {
  const request = { maxChars: options.maxChars, signal: options.signal };
  try {
    return truncateAtSentence(await provider.getSummary(id, language, request), options.maxChars);
  } catch (error) {
    if (isNotFoundError(error)) {
      options.logger?.debug("summary_missing", { id });
      return "";
    }
    if (!(error instanceof AmbiguousTitleError)) {
      throw error;
    }
    const candidate = error.candidates[0];
    if (candidate === undefined) {
      return "";
    }
    try {
      const summary = await provider.getSummary(candidate, language, request);
      options.logger?.debug("summary_disambiguated", { id, candidate });
      return truncateAtSentence(summary, options.maxChars);
    } catch (fallbackError) {
      if (isNotFoundError(fallbackError) || fallbackError instanceof AmbiguousTitleError) {
        options.logger?.debug("summary_unresolved", { id, candidate });
        return "";
      }
      throw fallbackError;
    }
  }
}

/** Captures the summary of every vertex of one language. */
export async function captureSummaries(
  provider: ContentProvider,
  vertices: readonly string[],
  language: string,
  options: CaptureOptions,
): Promise<Map<string, string>> {
  throwIfCancelled(options.signal, language);
  const entries = await Promise.all(
    vertices.map(async (id): Promise<[string, string]> => {
      try {
        return [id, await captureSummary(provider, id, language, options)];
      } catch (error) {
        throwIfCancelled(options.signal, language);
        throw error;
      }
    }),
  );
  options.logger?.info("summaries_captured", {
    vertices: entries.length,
    empty: entries.filter(([, summary]) => summary.length === 0).length,
  });
  return new Map(entries);
}
