import { expect } from "chai";

/** Returns `true` when the value is a plain object record (not an array or `null`). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Asserts that the provided value is a plain object record. Tests rely on this
 * guard before dereferencing properties of decoded JSON or log payloads.
 */
export function assertPlainObject(
  value: unknown,
  description: string,
): asserts value is Record<string, unknown> {
  expect(isPlainObject(value), `${description} should be a plain object`).to.equal(true);
}

/**
 * Awaits {@link promise}, asserts it rejected with an instance of
 * {@link type} and returns the narrowed error for further assertions.
 */
export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(type);
    if (error instanceof type) {
      return error;
    }
  }
  throw new Error(`expected a rejection with ${type.name}`);
}

/** Synchronous counterpart of {@link expectRejection}. */
export function expectThrow<E extends Error>(run: () => unknown, type: new (...args: never[]) => E): E {
  try {
    run();
  } catch (error) {
    expect(error).to.be.instanceOf(type);
    if (error instanceof type) {
      return error;
    }
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
