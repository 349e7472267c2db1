/**
 * Error raised by any goalkit operation whose precondition is not met.
 * The CLI prints `message` as an `[ERROR]` line and `hint` as a follow-up
 * `[INFO]` line, then exits with `exitCode`.
 */
export class GoalKitError extends Error {
  readonly hint?: string;
  readonly exitCode: number;

  constructor(
    message: string,
    options: { hint?: string; exitCode?: number; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GoalKitError";
    this.hint = options.hint;
    this.exitCode = options.exitCode ?? 1;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === code
  );
}
