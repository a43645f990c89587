/** Error code emitted when a document does not exist. */
export const ERROR_NOT_FOUND = "E-KG-NOT-FOUND" as const;
/** Error code emitted when a title resolves to a disambiguation page. */
export const ERROR_AMBIGUOUS_TITLE = "E-KG-AMBIGUOUS" as const;
/** Error code emitted for transient fetch failures. */
export const ERROR_PROVIDER = "E-KG-PROVIDER" as const;

/** Coordinates of the document a provider was asked about. */
export interface DocumentRef {
  readonly id: string;
  readonly language: string;
}

/**
 * The requested document is absent. The crawl skips the vertex and keeps
 * going.
 */
export class NotFoundError extends Error {
  public readonly code = ERROR_NOT_FOUND;
  public readonly document: DocumentRef;

  constructor(document: DocumentRef, options?: ErrorOptions) {
    super(`document '${document.id}' does not exist in '${document.language}'`, options);
    this.name = "NotFoundError";
    this.document = document;
  }
}

/**
 * The title matched several documents. Only content capture raises it; the
 * candidates are listed in the provider's preferred order.
 */
export class AmbiguousTitleError extends Error {
  public readonly code = ERROR_AMBIGUOUS_TITLE;
  public readonly document: DocumentRef;
  public readonly candidates: readonly string[];

  constructor(document: DocumentRef, candidates: readonly string[], options?: ErrorOptions) {
    super(`title '${document.id}' is ambiguous in '${document.language}' (${candidates.length} candidates)`, options);
    this.name = "AmbiguousTitleError";
    this.document = document;
    this.candidates = [...candidates];
  }
}

/**
 * Transient failure while talking to the document source (network error,
 * throttling, timeout). Retry policies only act on `retriable` instances.
 */
export class ProviderError extends Error {
  public readonly code = ERROR_PROVIDER;
  public readonly document: DocumentRef | null;
  public readonly retriable: boolean;

  constructor(
    message: string,
    options: { document?: DocumentRef | null; retriable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.document = options.document ?? null;
    this.retriable = options.retriable ?? true;
  }
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
