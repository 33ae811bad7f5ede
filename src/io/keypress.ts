import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import type { Readable } from 'stream';

export interface KeyPressWaiter {
  /** Resolves once the operator confirms; rejects if they interrupt instead. */
  waitForKeyPress(prompt: string): Promise<void>;
}

export class KeyPressAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyPressAbortedError';
  }
}

/**
 * Waits for Enter on the controlling terminal. stdin is usually the pipe
 * the note came from, so the terminal is opened directly.
 */
export class TerminalKeyPressWaiter implements KeyPressWaiter {
  constructor(
    private readonly openTerminal: () => Readable = () =>
      createReadStream('/dev/tty'),
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  waitForKeyPress(prompt: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const input = this.openTerminal();
      const rl = createInterface({ input, terminal: false });
      let settled = false;

      const settle = (error?: KeyPressAbortedError) => {
        if (settled) return;
        settled = true;
        process.removeListener('SIGINT', onInterrupt);
        rl.close();
        input.destroy();
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onInterrupt = () => {
        this.output.write('\n');
        settle(new KeyPressAbortedError('Interrupted before confirmation'));
      };

      // readline re-emits errors from its input stream
      rl.once('error', (error: Error) => {
        settle(
          new KeyPressAbortedError(`No terminal available: ${error.message}`),
        );
      });
      rl.once('line', () => settle());
      rl.once('close', () =>
        settle(new KeyPressAbortedError('Terminal closed before confirmation')),
      );
      process.once('SIGINT', onInterrupt);

      this.output.write(prompt);
    });
  }
}
