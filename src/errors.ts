/**
 * Process exit codes. Scripts wrapping the CLI depend on these values.
 */
export const ExitCode = {
  Success: 0,
  MissingDependency: 10,
  NoInput: 11,
  ConfigInvalid: 12,
  ApiFailure: 13,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base class for every failure the CLI reports to the operator.
 * The message is printed as a single line; the exit code ends the process.
 */
export abstract class PoznoteCliError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A runtime capability or external utility (fetch, xclip, wl-clipboard) is unavailable.
 */
export class MissingDependencyError extends PoznoteCliError {
  readonly exitCode = ExitCode.MissingDependency;
}

export class ClipboardError extends PoznoteCliError {
  readonly exitCode = ExitCode.MissingDependency;
}

export class InputError extends PoznoteCliError {
  readonly exitCode = ExitCode.NoInput;
}

export type ConfigErrorReason =
  | 'missing-credentials'
  | 'invalid-url'
  | 'unreadable-file'
  | 'advanced-disabled'
  | 'usage';

export class ConfigError extends PoznoteCliError {
  readonly exitCode = ExitCode.ConfigInvalid;

  constructor(
    readonly reason: ConfigErrorReason,
    message: string,
  ) {
    super(message);
  }
}

export type ApiErrorReason =
  | 'unauthorized'
  | 'not-found'
  | 'server-error'
  | 'client-error'
  | 'network-error'
  | 'timeout'
  | 'invalid-response'
  | 'burn-aborted';

export class ApiError extends PoznoteCliError {
  readonly exitCode = ExitCode.ApiFailure;

  constructor(
    readonly reason: ApiErrorReason,
    message: string,
  ) {
    super(message);
  }
}
