import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigurationError } from "../config/errors.js";
import { AmbiguousTitleError, NotFoundError, ProviderError } from "./errors.js";
import { truncateAtSentence } from "./summary.js";
import { filterLinkTitles, isValidTitle } from "./titleFilter.js";
import type {
  ContentProvider,
  LinkProvider,
  ProviderCallOptions,
  SummaryOptions,
  TranslationProvider,
} from "./types.js";

/** One document of an offline corpus. */
const corpusDocumentSchema = z
  .object({
    links: z.array(z.string()).default([]),
    translations: z.record(z.string()).default({}),
    summary: z.string().optional(),
    /** Disambiguation candidates; `getSummary` rejects with them. */
    ambiguous: z.array(z.string().min(1)).min(1).optional(),
    /** Simulates a source outage: every call rejects with a retriable ProviderError. */
    unavailable: z.boolean().default(false),
  })
  .strict();

const corpusSchema = z
  .object({
    languages: z.record(z.record(corpusDocumentSchema)),
  })
  .strict();

export type CorpusDocument = z.infer<typeof corpusDocumentSchema>;
export type CorpusDefinition = z.infer<typeof corpusSchema>;
/** Input accepted by {@link parseCorpus}; optional fields may be omitted. */
export type CorpusInput = z.input<typeof corpusSchema>;

/**
 * Validates a raw corpus payload (decoded JSON/YAML) and fills defaults.
 * Invalid payloads raise a {@link ConfigurationError} listing every issue.
 */
export function parseCorpus(raw: unknown): CorpusDefinition {
  const parsed = corpusSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "invalid corpus definition",
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return parsed.data;
}

/** Reads a YAML or JSON corpus file (JSON is valid YAML). */
export async function loadCorpusFile(path: string): Promise<CorpusDefinition> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`cannot read corpus file '${path}'`, [], { cause: error });
  }
  let decoded: unknown;
  try {
    decoded = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`corpus file '${path}' is not valid YAML/JSON`, [], { cause: error });
  }
  return parseCorpus(decoded);
}

/**
 * Offline document source implementing every provider interface over an
 * in-memory corpus. Link lists go through the same title filtering a live
 * source would apply.
 */
export class InMemoryCorpus implements LinkProvider, TranslationProvider, ContentProvider {
  private readonly documents: CorpusDefinition["languages"];

  constructor(definition: CorpusDefinition) {
    this.documents = definition.languages;
  }

  static fromInput(input: CorpusInput): InMemoryCorpus {
    return new InMemoryCorpus(parseCorpus(input));
  }

  /** Languages declared by the corpus, in declaration order. */
  languages(): string[] {
    return Object.keys(this.documents);
  }

  async getLinks(id: string, language: string, options: ProviderCallOptions = {}): Promise<string[]> {
    const document = this.lookup(id, language, options.signal);
    return filterLinkTitles(document.links, id);
  }

  async getTranslations(
    id: string,
    language: string,
    options: ProviderCallOptions = {},
  ): Promise<Record<string, string>> {
    const document = this.lookup(id, language, options.signal);
    const translations: Record<string, string> = {};
    for (const [targetLanguage, title] of Object.entries(document.translations)) {
      if (isValidTitle(title)) {
        translations[targetLanguage] = title.trim();
      }
    }
    return translations;
  }

  async getSummary(id: string, language: string, options: SummaryOptions): Promise<string> {
    const document = this.lookup(id, language, options.signal);
    if (document.ambiguous) {
      throw new AmbiguousTitleError({ id, language }, document.ambiguous);
    }
    return truncateAtSentence(document.summary ?? "", options.maxChars);
  }

  private lookup(id: string, language: string, signal: AbortSignal | undefined): CorpusDocument {
    signal?.throwIfAborted();
    const document = this.documents[language]?.[id];
    if (!document) {
      throw new NotFoundError({ id, language });
    }
    if (document.unavailable) {
      throw new ProviderError(`document '${id}' in '${language}' is temporarily unavailable`, {
        document: { id, language },
        retriable: true,
      });
    }
    return document;
  }
}
