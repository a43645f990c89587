import { setTimeout as delay } from "node:timers/promises";
import pLimit from "p-limit";

import type { StructuredLogger } from "../logger.js";
import { ProviderError } from "./errors.js";
import type {
  ContentProvider,
  DocumentProviders,
  LinkProvider,
  ProviderCallOptions,
  TranslationProvider,
} from "./types.js";

/** Describes the provider call a policy is wrapping, for logs and errors. */
export interface ProviderOperation {
  readonly kind: "links" | "translations" | "summary";
  readonly id: string;
  readonly language: string;
}

/** A provider call parameterised by the signal it must honour. */
export type ProviderCall<T> = (signal: AbortSignal | undefined) => Promise<T>;

/**
 * Cross-cutting behaviour applied around every provider call (retries,
 * timeouts, concurrency). Policies receive the caller's signal and decide
 * which signal the wrapped call observes.
 */
export type CallPolicy = <T>(
  operation: ProviderOperation,
  call: ProviderCall<T>,
  signal: AbortSignal | undefined,
) => Promise<T>;

/** Policy that simply forwards the call. */
export const directCall: CallPolicy = (_operation, call, signal) => call(signal);

/**
 * Composes policies outermost first: `composePolicies(a, b)` runs `a` around
 * `b` around the call.
 */
export function composePolicies(...policies: CallPolicy[]): CallPolicy {
  return policies.reduceRight<CallPolicy>(
    (inner, outer) =>
      <T>(operation: ProviderOperation, call: ProviderCall<T>, signal: AbortSignal | undefined) =>
        outer(operation, (innerSignal) => inner(operation, call, innerSignal), signal),
    directCall,
  );
}

/**
 * Bounds the number of provider calls in flight across every language. All
 * calls wrapped by the returned policy share one `p-limit` queue.
 */
export function concurrencyPolicy(concurrency: number): CallPolicy {
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  return (_operation, call, signal) =>
    limit(() => {
      // Queued calls whose language was abandoned meanwhile never reach the source.
      signal?.throwIfAborted();
      return call(signal);
    });
}

/**
 * Gives a single call {@link timeoutMs}: its signal is aborted and the policy
 * rejects at the deadline even when the provider ignores the signal. The
 * timeout surfaces as a retriable {@link ProviderError}; the caller's own
 * cancellation is rethrown unchanged.
 */
export function timeoutPolicy(timeoutMs: number): CallPolicy {
  return async (operation, call, signal) => {
    const timedOut = (cause?: unknown): ProviderError =>
      new ProviderError(
        `${operation.kind} call for '${operation.id}' (${operation.language}) timed out after ${timeoutMs} ms`,
        { document: { id: operation.id, language: operation.language }, retriable: true, cause },
      );
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = timedOut();
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });
    const combined = signal ? AbortSignal.any([signal, controller.signal]) : controller.signal;
    try {
      return await Promise.race([call(combined), deadline]);
    } catch (error) {
      // Only the deadline aborts this controller.
      if (controller.signal.aborted && !signal?.aborted) {
        throw error instanceof ProviderError && error === controller.signal.reason ? error : timedOut(error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };
}

export interface RetryPolicyOptions {
  /** Additional attempts after the first one. */
  readonly maxRetries: number;
  /** Linear backoff step; attempt `n` waits `n * baseDelayMs` plus jitter. */
  readonly baseDelayMs: number;
  /** Jitter source in `[0, 1)`; defaults to no jitter so runs stay reproducible. */
  readonly jitter?: () => number;
  readonly logger?: StructuredLogger;
}

/**
 * Retries calls rejected with a retriable {@link ProviderError}. Every other
 * error, including `NotFoundError` and cancellations, is rethrown at once.
 */
export function retryPolicy(options: RetryPolicyOptions): CallPolicy {
  const maxAttempts = Math.max(1, Math.floor(options.maxRetries) + 1);
  return async (operation, call, signal) => {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        return await call(signal);
      } catch (error) {
        const retriable = error instanceof ProviderError && error.retriable;
        if (!retriable || attempt >= maxAttempts || signal?.aborted) {
          throw error;
        }
        const backoffMs = options.baseDelayMs * attempt + Math.floor((options.jitter?.() ?? 0) * options.baseDelayMs);
        options.logger?.warn("provider_call_retry", {
          kind: operation.kind,
          id: operation.id,
          language: operation.language,
          attempt,
          backoff_ms: backoffMs,
          error,
        });
        await delay(backoffMs, undefined, { signal });
      }
    }
  };
}

/** Wraps every method of {@link providers} with {@link policy}. */
export function applyCallPolicy(providers: DocumentProviders, policy: CallPolicy): DocumentProviders {
  const links: LinkProvider = {
    getLinks: (id, language, options: ProviderCallOptions = {}) =>
      policy({ kind: "links", id, language }, (signal) => providers.links.getLinks(id, language, { signal }), options.signal),
  };
  const translations: TranslationProvider = {
    getTranslations: (id, language, options: ProviderCallOptions = {}) =>
      policy(
        { kind: "translations", id, language },
        (signal) => providers.translations.getTranslations(id, language, { signal }),
        options.signal,
      ),
  };
  const source = providers.content;
  if (!source) {
    return { links, translations };
  }
  const content: ContentProvider = {
    getSummary: (id, language, options) =>
      policy(
        { kind: "summary", id, language },
        (signal) => source.getSummary(id, language, { maxChars: options.maxChars, signal }),
        options.signal,
      ),
  };
  return { links, translations, content };
}
