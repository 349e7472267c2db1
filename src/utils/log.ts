import pc from "picocolors";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  step(message: string): void;
  /** Plain, unprefixed line (summaries, indented details). */
  detail(message: string): void;
  /** Only printed with --verbose. */
  debug(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /**
   * Send every line to stderr. Used in --json mode so stdout carries
   * nothing but the JSON object.
   */
  stderrOnly?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const out = options.stderrOnly
    ? (line: string) => console.error(line)
    : (line: string) => console.log(line);

  return {
    info: (message) => out(pc.blue(`[INFO] ${message}`)),
    success: (message) => out(pc.green(`[SUCCESS] ${message}`)),
    warn: (message) => out(pc.yellow(`[WARNING] ${message}`)),
    error: (message) => console.error(pc.red(`[ERROR] ${message}`)),
    step: (message) => out(pc.cyan(`[STEP] ${message}`)),
    detail: (message) => out(message),
    debug: (message) => {
      if (options.verbose) out(pc.dim(`[DEBUG] ${message}`));
    },
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
  step: noop,
  detail: noop,
  debug: noop,
};
