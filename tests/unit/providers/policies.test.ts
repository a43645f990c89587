import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { NotFoundError, ProviderError } from "../../../src/providers/errors.js";
import {
  applyCallPolicy,
  composePolicies,
  concurrencyPolicy,
  directCall,
  retryPolicy,
  timeoutPolicy,
  type CallPolicy,
  type ProviderOperation,
} from "../../../src/providers/policies.js";
import { expectRejection } from "../../helpers/assertions.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

const operation: ProviderOperation = { kind: "links", id: "A", language: "en" };

/** Promise whose settlement is controlled by the test. */
function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

/** Never settles on its own; rejects with the signal's reason once aborted. */
function untilAborted(signal: AbortSignal | undefined): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("providers/policies", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("composes policies outermost first", async () => {
    const trace: string[] = [];
    const tracing =
      (name: string): CallPolicy =>
      async (_op, call, signal) => {
        trace.push(`${name}:enter`);
        const result = await call(signal);
        trace.push(`${name}:exit`);
        return result;
      };

    const result = await composePolicies(tracing("outer"), tracing("inner"))(operation, async () => {
      trace.push("call");
      return 42;
    }, undefined);

    expect(result).to.equal(42);
    expect(trace).to.deep.equal(["outer:enter", "inner:enter", "call", "inner:exit", "outer:exit"]);
  });

  it("forwards calls untouched with the direct policy", async () => {
    const controller = new AbortController();
    const call = sinon.stub().resolves("ok");
    expect(await directCall(operation, call, controller.signal)).to.equal("ok");
    expect(call.firstCall.args[0]).to.equal(controller.signal);
  });

  it("bounds the number of calls in flight", async () => {
    const policy = concurrencyPolicy(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>(), deferred<void>()];
    let inFlight = 0;
    let peak = 0;

    const runs = gates.map((gate, index) =>
      policy(operation, async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await gate.promise;
        inFlight -= 1;
        return index;
      }, undefined),
    );
    for (const gate of gates) {
      await new Promise((resolve) => setImmediate(resolve));
      gate.resolve();
    }

    expect(await Promise.all(runs)).to.deep.equal([0, 1, 2, 3]);
    expect(peak).to.equal(2);
  });

  it("skips queued calls whose signal aborted meanwhile", async () => {
    const policy = concurrencyPolicy(1);
    const gate = deferred<void>();
    const controller = new AbortController();
    const queued = sinon.stub().resolves("late");

    const first = policy(operation, async () => {
      await gate.promise;
      return "first";
    }, undefined);
    const second = policy(operation, queued, controller.signal);
    controller.abort(new Error("language dropped"));
    gate.resolve();

    expect(await first).to.equal("first");
    const error = await expectRejection(second, Error);
    expect(error.message).to.equal("language dropped");
    expect(queued.called).to.equal(false);
  });

  it("turns a timeout into a retriable provider error", async () => {
    const error = await expectRejection(timeoutPolicy(10)(operation, untilAborted, undefined), ProviderError);
    expect(error.retriable).to.equal(true);
    expect(error.message).to.equal("links call for 'A' (en) timed out after 10 ms");
    expect(error.document).to.deep.equal({ id: "A", language: "en" });
  });

  it("times out a call whose provider ignores the abort signal", async () => {
    const seen: { signal?: AbortSignal } = {};
    const stuck = (signal: AbortSignal | undefined): Promise<string> => {
      seen.signal = signal;
      return new Promise<string>(() => undefined);
    };
    const error = await expectRejection(timeoutPolicy(10)(operation, stuck, undefined), ProviderError);
    expect(error.message).to.equal("links call for 'A' (en) timed out after 10 ms");
    expect(seen.signal?.aborted).to.equal(true);
    expect(seen.signal?.reason).to.equal(error);
  });

  it("keeps the provider's own failure when it rejects before the deadline", async () => {
    const failure = new NotFoundError({ id: "A", language: "en" });
    const error = await expectRejection(
      timeoutPolicy(1_000)(operation, () => Promise.reject(failure), undefined),
      NotFoundError,
    );
    expect(error).to.equal(failure);
  });

  it("rethrows the caller's own cancellation unchanged", async () => {
    const controller = new AbortController();
    const pending = timeoutPolicy(1_000)(operation, untilAborted, controller.signal);
    controller.abort(new Error("caller stop"));
    const error = await expectRejection(pending, Error);
    expect(error).to.not.be.instanceOf(ProviderError);
    expect(error.message).to.equal("caller stop");
  });

  it("retries retriable failures and logs each attempt", async () => {
    const logger = new RecordingLogger();
    const call = sinon.stub();
    call.onCall(0).rejects(new ProviderError("flaky"));
    call.onCall(1).rejects(new ProviderError("flaky"));
    call.onCall(2).resolves(["B"]);

    const result = await retryPolicy({ maxRetries: 2, baseDelayMs: 0, logger })(operation, call, undefined);

    expect(result).to.deep.equal(["B"]);
    expect(call.callCount).to.equal(3);
    expect(logger.find("provider_call_retry").map((entry) => entry.payload)).to.deep.equal([
      {
        kind: "links",
        id: "A",
        language: "en",
        attempt: 1,
        backoff_ms: 0,
        error: { name: "ProviderError", message: "flaky", code: "E-KG-PROVIDER" },
      },
      {
        kind: "links",
        id: "A",
        language: "en",
        attempt: 2,
        backoff_ms: 0,
        error: { name: "ProviderError", message: "flaky", code: "E-KG-PROVIDER" },
      },
    ]);
  });

  it("gives up after the configured number of retries", async () => {
    const call = sinon.stub().rejects(new ProviderError("down"));
    await expectRejection(retryPolicy({ maxRetries: 1, baseDelayMs: 0 })(operation, call, undefined), ProviderError);
    expect(call.callCount).to.equal(2);
  });

  it("does not retry missing documents or permanent failures", async () => {
    const missing = sinon.stub().rejects(new NotFoundError({ id: "A", language: "en" }));
    await expectRejection(retryPolicy({ maxRetries: 3, baseDelayMs: 0 })(operation, missing, undefined), NotFoundError);
    expect(missing.callCount).to.equal(1);

    const permanent = sinon.stub().rejects(new ProviderError("bad request", { retriable: false }));
    await expectRejection(retryPolicy({ maxRetries: 3, baseDelayMs: 0 })(operation, permanent, undefined), ProviderError);
    expect(permanent.callCount).to.equal(1);
  });

  it("waits a linear backoff with jitter between attempts", async () => {
    const logger = new RecordingLogger();
    const call = sinon.stub();
    call.onCall(0).rejects(new ProviderError("flaky"));
    call.onCall(1).rejects(new ProviderError("flaky"));
    call.onCall(2).resolves("ok");

    const policy = retryPolicy({ maxRetries: 2, baseDelayMs: 5, jitter: () => 0.5, logger });
    expect(await policy(operation, call, undefined)).to.equal("ok");
    expect(logger.find("provider_call_retry").map((entry) => entry.payload)).to.have.nested.property("[1].backoff_ms", 12);
    expect(logger.find("provider_call_retry")[0]?.payload).to.have.property("backoff_ms", 7);
  });

  it("routes every provider method through the policy", async () => {
    const seen: ProviderOperation["kind"][] = [];
    const policy: CallPolicy = (op, call, signal) => {
      seen.push(op.kind);
      return call(signal);
    };
    const wrapped = applyCallPolicy(
      {
        links: { getLinks: async () => ["B"] },
        translations: { getTranslations: async () => ({ fr: "A" }) },
        content: { getSummary: async (_id, _language, options) => "x".repeat(options.maxChars) },
      },
      policy,
    );

    expect(await wrapped.links.getLinks("A", "en")).to.deep.equal(["B"]);
    expect(await wrapped.translations.getTranslations("A", "en")).to.deep.equal({ fr: "A" });
    expect(await wrapped.content?.getSummary("A", "en", { maxChars: 3 })).to.equal("xxx");
    expect(seen).to.deep.equal(["links", "translations", "summary"]);
  });

  it("leaves content out when no content provider is given", () => {
    const wrapped = applyCallPolicy(
      { links: { getLinks: async () => [] }, translations: { getTranslations: async () => ({}) } },
      directCall,
    );
    expect(wrapped.content).to.equal(undefined);
  });
});
