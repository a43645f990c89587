/** Error code raised when a language's crawl observes its abort signal. */
export const ERROR_CRAWL_CANCELLED = "E-KG-CANCELLED" as const;

/**
 * Raised when a per-language task is aborted (caller cancellation or a
 * sibling failure policy). The partial crawl of that language is discarded.
 */
export class CrawlCancelledError extends Error {
  public readonly code = ERROR_CRAWL_CANCELLED;
  public readonly language: string;
  public readonly reason: string | null;

  constructor(language: string, reason: unknown) {
    const detail = describeAbortReason(reason);
    super(detail ? `crawl for '${language}' cancelled: ${detail}` : `crawl for '${language}' cancelled`);
    this.name = "CrawlCancelledError";
    this.language = language;
    this.reason = detail;
  }
}

function describeAbortReason(reason: unknown): string | null {
  if (reason instanceof Error) {
    return reason.message;
  }
  if (typeof reason === "string" && reason.length > 0) {
    return reason;
  }
  return null;
}

/** Throws {@link CrawlCancelledError} when {@link signal} has been aborted. */
export function throwIfCancelled(signal: AbortSignal | undefined, language: string): void {
  if (signal?.aborted) {
    throw new CrawlCancelledError(language, signal.reason);
  }
}

export const ERROR_SAMPLING_CANCELLED = "E-KG-RUN-CANCELLED" as const;

/** Raised by a sampling run whose caller aborted it as a whole. */
export class SamplingCancelledError extends Error {
  public readonly code = ERROR_SAMPLING_CANCELLED;
  public readonly reason: string | null;

  constructor(reason: unknown) {
    const detail = describeAbortReason(reason);
    super(detail ? `sampling run cancelled: ${detail}` : "sampling run cancelled");
    this.name = "SamplingCancelledError";
    this.reason = detail;
  }
}
