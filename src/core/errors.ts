/**
 * Error taxonomy
 *
 * Gateway and completion failures are values (carried in a Result) because the
 * dispatcher branches on their kind. Configuration and persistence failures
 * are thrown.
 */

export type GatewayError =
  | { kind: "disconnected"; message: string }
  | { kind: "send_failed"; message: string; retryable: boolean }
  | { kind: "timeout"; message: string };

export type CompletionError =
  | { kind: "rate_limited"; retryAfterMs: number; message: string }
  | { kind: "transient"; message: string }
  | { kind: "fatal"; message: string }
  | { kind: "timeout"; message: string };

export type DispatchError =
  | ({ source: "completion" } & CompletionError)
  | ({ source: "gateway" } & GatewayError);

/** Malformed configuration or policy. Aborts startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type PersistenceOperation = "write_failed" | "read_failed";

export class PersistenceError extends Error {
  constructor(
    public readonly kind: PersistenceOperation,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
