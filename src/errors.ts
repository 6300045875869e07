export class ToolUnavailableError extends Error {
  constructor(readonly command: string, readonly installationDirective?: string) {
    super(
      installationDirective
        ? `The "${command}" command line is not available. ${installationDirective}`
        : `The "${command}" command line is not available.`
    );
    this.name = 'ToolUnavailableError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The child process could not be started at all. Never thrown on its own by the
 * converter: it ends up as the `cause` of a {@link ConversionFailedError}.
 */
export class LaunchFailedError extends Error {
  readonly code?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LaunchFailedError';
    const cause = options?.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
      this.code = cause.code;
    }
  }
}

export interface ConversionFailureDetails {
  commandLine: string;
  exitCode: number | null;
  timedOut: boolean;
  timeoutMs: number;
  cause?: Error;
}

export class ConversionFailedError extends Error {
  readonly commandLine: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;
  readonly timeoutMs: number;

  constructor(message: string, details: ConversionFailureDetails) {
    super(message, details.cause ? { cause: details.cause } : undefined);
    this.name = 'ConversionFailedError';
    this.commandLine = details.commandLine;
    this.exitCode = details.exitCode;
    this.timedOut = details.timedOut;
    this.timeoutMs = details.timeoutMs;
  }
}
