/**
 * Transport-level failure on a single connection: reset, broken pipe,
 * write after close. Terminal for that connection only.
 */
export class ConnectionIOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionIOError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
