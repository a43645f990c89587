/**
 * Narrow interfaces through which the sampler reaches the document source.
 * Implementations fail with the errors declared in `./errors.ts`:
 * `NotFoundError` for absent documents, `ProviderError` for transient
 * failures and, for content only, `AmbiguousTitleError`.
 */

/** Options shared by every provider call. */
export interface ProviderCallOptions {
  /** Aborts the call; implementations reject with the signal's reason. */
  readonly signal?: AbortSignal;
}

export interface SummaryOptions extends ProviderCallOptions {
  /** Character budget; the text is cut at a sentence boundary within it. */
  readonly maxChars: number;
}

export interface LinkProvider {
  /**
   * Ordered outbound link identifiers of the document's lead section, with
   * invalid and self-referential identifiers already removed.
   */
  getLinks(id: string, language: string, options?: ProviderCallOptions): Promise<string[]>;
}

export interface TranslationProvider {
  /** Equivalent identifiers of the document keyed by language code. */
  getTranslations(id: string, language: string, options?: ProviderCallOptions): Promise<Record<string, string>>;
}

export interface ContentProvider {
  /** Plain-text summary of the document, truncated to `options.maxChars`. */
  getSummary(id: string, language: string, options: SummaryOptions): Promise<string>;
}

/** Bundle of collaborators handed to the sampler. */
export interface DocumentProviders {
  readonly links: LinkProvider;
  readonly translations: TranslationProvider;
  /** Only consulted when content capture is enabled. */
  readonly content?: ContentProvider;
}
