/**
 * Errno-flavoured error raised by the Node.js filesystem helpers. Only the
 * fields the runtime inspects are declared.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown rejection to an errno-style error carrying {@link code}. */
export function hasErrnoCode(error: unknown, code: string): error is ErrnoException {
  return error instanceof Error && "code" in error && error.code === code;
}
