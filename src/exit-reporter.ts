import { ExitCode, type PoznoteCliError } from './errors.js';

/**
 * Collects the outcome of an invocation. Results go to stdout, diagnostics
 * to stderr. When several failures are reported (a burn whose delete fails
 * after the clipboard also failed) the highest exit code wins.
 */
export class ExitReporter {
  private code: ExitCode = ExitCode.Success;

  get exitCode(): ExitCode {
    return this.code;
  }

  result(line: string): void {
    console.log(line);
  }

  info(line: string): void {
    console.error(`[Info] ${line}`);
  }

  fail(error: PoznoteCliError): void {
    console.error(`[Error] ${error.message}`);
    if (error.exitCode > this.code) {
      this.code = error.exitCode;
    }
  }
}
