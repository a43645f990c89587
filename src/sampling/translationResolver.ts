import type { StructuredLogger } from "../logger.js";
import { isNotFoundError } from "../providers/errors.js";
import type { TranslationProvider } from "../providers/types.js";
import { throwIfCancelled } from "./errors.js";

/**
 * Translation records of one language: `table.get(vertex)` maps target
 * language codes to the equivalent identifier in that language.
 */
export type TranslationTable = Map<string, Map<string, string>>;

export interface ResolveOptions {
  readonly signal?: AbortSignal;
  readonly logger?: StructuredLogger;
}

/**
 * Queries the provider once per vertex of {@link language} and keeps the
 * entries whose language belongs to {@link targetLanguages}. The vertex's own
 * language and self references are dropped; a missing document yields an
 * empty record. Calls are issued together so the provider's call policy
 * decides how many run at once.
 */
export async function resolveTranslations(
  provider: TranslationProvider,
  vertices: Iterable<string>,
  language: string,
  targetLanguages: Iterable<string>,
  options: ResolveOptions = {},
): Promise<TranslationTable> {
  const targets = new Set(targetLanguages);
  targets.delete(language);
  const ids = Array.from(new Set(vertices));

  throwIfCancelled(options.signal, language);
  const records = await Promise.all(
    ids.map(async (id): Promise<[string, Map<string, string>]> => {
      try {
        const translations = await provider.getTranslations(id, language, { signal: options.signal });
        return [id, keepTargets(id, translations, targets)];
      } catch (error) {
        if (isNotFoundError(error)) {
          options.logger?.warn("translation_vertex_missing", { id });
          return [id, new Map()];
        }
        throwIfCancelled(options.signal, language);
        throw error;
      }
    }),
  );

  const table: TranslationTable = new Map(records);
  let pairs = 0;
  for (const record of table.values()) {
    pairs += record.size;
  }
  options.logger?.info("translations_resolved", { vertices: table.size, pairs });
  return table;
}

/** Entries pointing at a configured target language and at another identifier. */
function keepTargets(id: string, translations: Record<string, string>, targets: ReadonlySet<string>): Map<string, string> {
  const kept = new Map<string, string>();
  for (const [targetLanguage, equivalent] of Object.entries(translations)) {
    if (targets.has(targetLanguage) && equivalent.length > 0 && equivalent !== id) {
      kept.set(targetLanguage, equivalent);
    }
  }
  return kept;
}
