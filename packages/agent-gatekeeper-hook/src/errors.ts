/**
 * Failure taxonomy for the gatekeeper.
 *
 * Only ConfigurationError and LockTimeoutError escape to the router; the rest are
 * converted into WARN decisions where they occur.
 */

export class GatekeeperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Session cannot be scoped, a mode is invalid, or the registry names an unknown gate. */
export class ConfigurationError extends GatekeeperError {}

export class ExternalCheckTimeout extends GatekeeperError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Compliance check did not respond within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class StateCorruptionError extends GatekeeperError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Session state at ${filePath} is unreadable: ${detail}`, options);
    this.filePath = filePath;
  }
}

export class GateInternalError extends GatekeeperError {
  readonly gate: string;

  constructor(gate: string, cause: unknown) {
    super(`Gate '${gate}' failed: ${describeError(cause)}`, { cause });
    this.gate = gate;
  }
}

export class LockTimeoutError extends GatekeeperError {
  readonly lockFilePath: string;

  constructor(lockFilePath: string, waitedMs: number) {
    super(`Failed to acquire session lock at ${lockFilePath} after ${waitedMs}ms`);
    this.lockFilePath = lockFilePath;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
