import { Command, CommanderError, Option } from 'commander';
import { getVersion } from './version.js';
import { loadConfigSource } from './config/config-file.js';
import { resolveConfig } from './config/resolve-config.js';
import { requiresBody, selectAction, type CliFlags } from './actions.js';
import { PoznoteApiClient } from './api/client.js';
import { assertFetchAvailable } from './api/http-client.js';
import { buildRequest, type Clock } from './api/request-builder.js';
import { ExitCode, PoznoteCliError } from './errors.js';
import { ExitReporter } from './exit-reporter.js';
import { SystemClipboard, type Clipboard } from './io/clipboard.js';
import {
  acquireContent,
  createNoteBody,
  type InputStream,
} from './io/input.js';
import {
  TerminalKeyPressWaiter,
  type KeyPressWaiter,
} from './io/keypress.js';
import { SideEffectRunner } from './side-effects.js';
import type { NoteBody, PoznoteConfig } from './types/poznote.js';

export { resolveConfig } from './config/resolve-config.js';
export { loadConfigSource, getConfigPath } from './config/config-file.js';
export { selectAction, parseTags } from './actions.js';
export { buildRequest, renderCurl } from './api/request-builder.js';
export { PoznoteApiClient, buildNoteUrl } from './api/client.js';
export { classifyStatus } from './api/http-client.js';
export { ExitCode } from './errors.js';

export interface PoznoteCliOptions {
  loadConfig?: () => PoznoteConfig;
  clipboard?: Clipboard;
  stdin?: InputStream;
  keyPress?: KeyPressWaiter;
  clock?: Clock;
  timeoutMs?: number;
  commandName?: string;
}

export function createProgram(
  advancedFeaturesEnabled: boolean,
  commandName = 'poznote',
): Command {
  const advanced = (option: Option) =>
    option.hideHelp(!advancedFeaturesEnabled);

  return new Command()
    .name(commandName)
    .description(
      'Post, update, or delete Poznote notes from the terminal. Expects piped input when posting or updating.',
    )
    .version(getVersion())
    .argument('[id]', 'note ID for -U or -D')
    .option('-c, --clipboard', 'post content from the clipboard')
    .option('-t, --tags <tags>', 'comma-separated tags')
    .option('-b, --burn', 'interactively delete the note after posting')
    .option('-d, --show-delete', 'show the command that deletes the new note')
    .option('-u, --show-update', 'show the command that updates the new note')
    .option('--debug', 'display the equivalent curl command')
    .addOption(advanced(new Option('-L, --last', 'list the most recent note')))
    .addOption(
      advanced(
        new Option('-s, --search <query>', 'search notes by keyword'),
      ),
    )
    .addOption(
      advanced(
        new Option('-U, --update [id]', 'update a specific note by ID'),
      ),
    )
    .addOption(
      advanced(
        new Option('-D, --delete [id]', 'delete a specific note by ID'),
      ),
    )
    .exitOverride();
}

/**
 * One invocation of the CLI: config, action, input, request, side effects.
 */
export class PoznoteCli {
  private readonly loadConfig: () => PoznoteConfig;
  private readonly clipboard: Clipboard;
  private readonly stdin: InputStream;
  private readonly keyPress: KeyPressWaiter;
  private readonly clock: Clock;
  private readonly timeoutMs?: number;
  private readonly commandName: string;

  constructor(options: PoznoteCliOptions = {}) {
    this.loadConfig =
      options.loadConfig ?? (() => resolveConfig(loadConfigSource()));
    this.clipboard = options.clipboard ?? new SystemClipboard();
    this.stdin = options.stdin ?? process.stdin;
    this.keyPress = options.keyPress ?? new TerminalKeyPressWaiter();
    this.clock = options.clock ?? Date.now;
    this.timeoutMs = options.timeoutMs;
    this.commandName = options.commandName ?? 'poznote';
  }

  async run(argv: string[]): Promise<ExitCode> {
    const reporter = new ExitReporter();

    try {
      await this.execute(argv, reporter);
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode === 0 ? ExitCode.Success : ExitCode.ConfigInvalid;
      }
      if (error instanceof PoznoteCliError) {
        reporter.fail(error);
      } else {
        throw error;
      }
    }

    return reporter.exitCode;
  }

  private async execute(argv: string[], reporter: ExitReporter): Promise<void> {
    assertFetchAvailable();
    const config = this.loadConfig();

    const program = createProgram(
      config.advancedFeaturesEnabled,
      this.commandName,
    );
    program.parse(argv, { from: 'user' });
    const flags = program.opts<CliFlags>();
    const [positionalId] = program.args;

    const action = selectAction(flags, config, positionalId);

    let body: NoteBody | undefined;
    if (requiresBody(action)) {
      const source = action.kind === 'update' ? 'stdin' : action.source;
      const content = await acquireContent(source, {
        stdin: this.stdin,
        clipboard: this.clipboard,
      });
      if (!content) {
        reporter.info('Input is empty, nothing to send.');
        return;
      }
      body = createNoteBody(
        content,
        action.kind === 'update' ? [] : action.tags,
      );
    }

    const client = new PoznoteApiClient(config, this.timeoutMs);
    const sideEffects = new SideEffectRunner(
      {
        config,
        client,
        clipboard: this.clipboard,
        keyPress: this.keyPress,
        reporter,
      },
      {
        debug: flags.debug,
        showDelete: flags.showDelete,
        showUpdate: flags.showUpdate,
        commandName: this.commandName,
      },
    );

    const request = buildRequest(action, config, body, this.clock);
    sideEffects.echoRequest(request);
    const result = await client.execute(action, request);
    await sideEffects.handle(action, result);
  }
}
