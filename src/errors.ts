export type TermhubErrorCode =
  | "spawn_failed"
  | "cwd_missing"
  | "resize_failed"
  | "subscription_closed";

export class TermhubError extends Error {
  readonly code: TermhubErrorCode;

  constructor(code: TermhubErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The command could not be located or the PTY backend refused to start it. */
export class SpawnError extends TermhubError {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super("spawn_failed", message, options);
    this.command = command;
  }
}

export class WorkingDirectoryMissingError extends TermhubError {
  readonly cwd: string;

  constructor(cwd: string) {
    super("cwd_missing", `Working directory does not exist: ${cwd}`);
    this.cwd = cwd;
  }
}

export class ResizeFailedError extends TermhubError {
  constructor(rows: number, cols: number, options?: { cause?: unknown }) {
    super("resize_failed", `Failed to resize terminal to ${rows}x${cols}`, options);
  }
}

export class SubscriptionClosedError extends TermhubError {
  constructor() {
    super("subscription_closed", "Subscription is closed");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
