import { spawn, type StdioOptions } from 'child_process';
import { accessSync, constants } from 'fs';
import { delimiter, join } from 'path';
import { ClipboardError, MissingDependencyError } from '../errors.js';

export interface Clipboard {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export type DisplayServer = 'wayland' | 'x11';

export interface ClipboardUtility {
  name: string;
  read: [string, ...string[]];
  write: [string, ...string[]];
}

export const XCLIP: ClipboardUtility = {
  name: 'xclip',
  read: ['xclip', '-selection', 'clipboard', '-o'],
  write: ['xclip', '-selection', 'clipboard'],
};

export const WL_CLIPBOARD: ClipboardUtility = {
  name: 'wl-clipboard',
  read: ['wl-paste', '--no-newline'],
  write: ['wl-copy'],
};

export type CommandRunner = (
  command: string,
  args: string[],
  input?: string,
) => Promise<string>;

export type ExecutableLookup = (name: string) => boolean;

export function detectDisplayServer(
  env: NodeJS.ProcessEnv = process.env,
): DisplayServer {
  if (env.WAYLAND_DISPLAY || env.XDG_SESSION_TYPE === 'wayland') {
    return 'wayland';
  }
  return 'x11';
}

/**
 * Check whether an executable with this name is on PATH.
 */
export function isOnPath(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    try {
      accessSync(join(dir, name), constants.X_OK);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

/**
 * Run a clipboard utility. When writing, stdout/stderr are not piped:
 * xclip forks a child that keeps owning the selection, and that child
 * would hold the pipes open.
 */
export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve, reject) => {
    const writing = input !== undefined;
    const stdio: StdioOptions = writing
      ? ['pipe', 'ignore', 'ignore']
      : ['ignore', 'pipe', 'pipe'];
    const child = spawn(command, args, { stdio });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.once('error', (error) => {
      reject(new ClipboardError(`${command} failed to start: ${error.message}`));
    });
    child.once(writing ? 'exit' : 'close', (code: number | null) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout).toString('utf-8'));
        return;
      }
      const detail = Buffer.concat(stderr).toString('utf-8').trim();
      reject(
        new ClipboardError(
          `${command} exited with code ${code ?? 'unknown'}${detail ? `: ${detail}` : ''}`,
        ),
      );
    });

    if (writing) {
      child.stdin?.end(input);
    }
  });

export interface SystemClipboardOptions {
  env?: NodeJS.ProcessEnv;
  hasExecutable?: ExecutableLookup;
  run?: CommandRunner;
}

/**
 * Clipboard backed by xclip (X11) or wl-clipboard (Wayland). The utility
 * matching the current display server is preferred; the other is a fallback.
 */
export class SystemClipboard implements Clipboard {
  private readonly displayServer: DisplayServer;
  private readonly hasExecutable: ExecutableLookup;
  private readonly run: CommandRunner;

  constructor(options: SystemClipboardOptions = {}) {
    const env = options.env ?? process.env;
    this.displayServer = detectDisplayServer(env);
    this.hasExecutable =
      options.hasExecutable ?? ((name) => isOnPath(name, env));
    this.run = options.run ?? runCommand;
  }

  resolveUtility(): ClipboardUtility {
    const candidates =
      this.displayServer === 'wayland'
        ? [WL_CLIPBOARD, XCLIP]
        : [XCLIP, WL_CLIPBOARD];

    const utility = candidates.find(
      (candidate) =>
        this.hasExecutable(candidate.read[0]) &&
        this.hasExecutable(candidate.write[0]),
    );
    if (!utility) {
      throw new MissingDependencyError(
        'No clipboard utility found: install xclip (X11) or wl-clipboard (Wayland)',
      );
    }
    return utility;
  }

  async read(): Promise<string> {
    const [command, ...args] = this.resolveUtility().read;
    return this.run(command, args);
  }

  async write(text: string): Promise<void> {
    const [command, ...args] = this.resolveUtility().write;
    await this.run(command, args, text);
  }
}
