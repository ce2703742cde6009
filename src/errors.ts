export type Phase = "config" | "lock" | "mirror-update" | "scan" | "reconcile" | "roster";

/**
 * A failure that identifies which phase of a run went wrong, so the caller can decide whether
 * to retry the whole operation.
 */
export class PhaseError extends Error {
  override readonly cause?: unknown;

  constructor(
    readonly phase: Phase,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "PhaseError";
    this.cause = options?.cause;
  }
}

export class ConfigurationError extends PhaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigurationError";
  }
}

export class LockTimeoutError extends PhaseError {
  constructor(
    readonly lockPath: string,
    readonly ownerPid: number | undefined,
  ) {
    const owner = ownerPid === undefined ? "" : ` (held by PID ${ownerPid})`;
    super("lock", `Timed out waiting for lock ${lockPath}${owner}`);
    this.name = "LockTimeoutError";
  }
}

export class MirrorUpdateError extends PhaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("mirror-update", message, options);
    this.name = "MirrorUpdateError";
  }
}

export class ScanError extends PhaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("scan", message, options);
    this.name = "ScanError";
  }
}

export class ReconcileError extends PhaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("reconcile", message, options);
    this.name = "ReconcileError";
  }
}

export class RosterError extends PhaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("roster", message, options);
    this.name = "RosterError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
