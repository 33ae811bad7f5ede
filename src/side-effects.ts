import { describeFailure, type PoznoteApiClient } from './api/client.js';
import { buildRequest, renderCurl } from './api/request-builder.js';
import { ApiError, PoznoteCliError } from './errors.js';
import type { ExitReporter } from './exit-reporter.js';
import type { Clipboard } from './io/clipboard.js';
import { KeyPressAbortedError, type KeyPressWaiter } from './io/keypress.js';
import type {
  Action,
  ApiResult,
  HttpRequest,
  PoznoteConfig,
} from './types/poznote.js';

export interface SideEffectOptions {
  debug?: boolean;
  showDelete?: boolean;
  showUpdate?: boolean;
  /** Name printed in the -d/-u hint lines */
  commandName?: string;
}

export interface SideEffectDeps {
  config: PoznoteConfig;
  client: PoznoteApiClient;
  clipboard: Clipboard;
  keyPress: KeyPressWaiter;
  reporter: ExitReporter;
}

const DIVIDER = '-'.repeat(40);

/**
 * Everything that happens around a request: the debug echo before it, and
 * the clipboard copy, burn deletion and result lines after it.
 */
export class SideEffectRunner {
  private readonly config: PoznoteConfig;
  private readonly client: PoznoteApiClient;
  private readonly clipboard: Clipboard;
  private readonly keyPress: KeyPressWaiter;
  private readonly reporter: ExitReporter;
  private readonly options: SideEffectOptions;

  constructor(deps: SideEffectDeps, options: SideEffectOptions = {}) {
    this.config = deps.config;
    this.client = deps.client;
    this.clipboard = deps.clipboard;
    this.keyPress = deps.keyPress;
    this.reporter = deps.reporter;
    this.options = options;
  }

  echoRequest(request: HttpRequest): void {
    if (!this.options.debug) return;
    console.log('\n--- DEBUG: CURL COMMAND ---');
    console.log(renderCurl(request, this.config.username));
    console.log('---------------------------\n');
  }

  async handle(action: Action, result: ApiResult): Promise<void> {
    if (result.statusCategory !== 'success') {
      this.reporter.fail(describeFailure(result));
      return;
    }

    switch (action.kind) {
      case 'create':
      case 'burn':
        return this.handleCreated(action, result);
      case 'update':
        this.reporter.result(`Success: Note ${action.noteId} updated.`);
        if (result.noteUrl) {
          this.reporter.result(`URL: ${result.noteUrl}`);
          await this.copy(result.noteUrl);
        }
        return;
      case 'list-last':
      case 'search':
        return this.handleFound(action, result);
      case 'delete':
        this.reporter.result(`Success: Note ${action.noteId} deleted.`);
        return;
    }
  }

  private async handleCreated(
    action: Extract<Action, { kind: 'create' | 'burn' }>,
    result: ApiResult,
  ): Promise<void> {
    const { noteId, noteUrl } = result;
    if (noteId === undefined || noteUrl === undefined) {
      this.reporter.fail(
        new ApiError(
          'invalid-response',
          'Note was created but the response did not include its ID',
        ),
      );
      return;
    }

    this.reporter.result(`Success: ${noteUrl}`);
    await this.copy(noteUrl);

    const command = this.options.commandName ?? 'poznote';
    if (this.options.showDelete) {
      this.reporter.result(`To delete this note run: ${command} -D ${noteId}`);
    }
    if (this.options.showUpdate) {
      this.reporter.result(
        `To update this note run: [command] | ${command} -U ${noteId}`,
      );
    }

    if (action.kind === 'burn') {
      await this.burn(noteId);
    }
  }

  private async handleFound(
    action: Extract<Action, { kind: 'list-last' | 'search' }>,
    result: ApiResult,
  ): Promise<void> {
    const { workspace } = this.config;
    const { note, noteId, noteUrl } = result;

    if (!note || noteId === undefined || noteUrl === undefined) {
      this.reporter.result(
        action.kind === 'search'
          ? `No notes found matching '${action.query}' in workspace: ${workspace}`
          : `No notes found in workspace: ${workspace}`,
      );
      return;
    }

    this.reporter.result(
      action.kind === 'search'
        ? `First match for '${action.query}' in ${workspace} [ID: ${noteId}]`
        : `--- Latest Note in ${workspace} [ID: ${noteId}] ---`,
    );
    this.reporter.result(note.heading || 'No Title');
    if (note.content) {
      this.reporter.result(note.content);
    }
    this.reporter.result(DIVIDER);
    this.reporter.result(`URL: ${noteUrl}`);
    await this.copy(noteUrl);
  }

  /**
   * The URL has already been printed and copied. Block until the operator
   * confirms, then delete the note. Interrupting leaves the note in place.
   */
  private async burn(noteId: string): Promise<void> {
    this.reporter.result(
      `\nBURN MODE: Note will be deleted from ${this.config.workspace} when you proceed.`,
    );

    try {
      await this.keyPress.waitForKeyPress('Press [Enter] to delete...');
    } catch (error) {
      if (error instanceof KeyPressAbortedError) {
        this.reporter.fail(
          new ApiError(
            'burn-aborted',
            `Burn aborted (${error.message}): note ${noteId} was not deleted`,
          ),
        );
        return;
      }
      throw error;
    }

    const action: Action = { kind: 'delete', noteId };
    const request = buildRequest(action, this.config);
    this.echoRequest(request);
    const result = await this.client.execute(action, request);

    if (result.statusCategory === 'success') {
      this.reporter.result(`Success: Note ${noteId} deleted.`);
      return;
    }

    const failure = describeFailure(result);
    this.reporter.fail(
      new ApiError(
        failure.reason,
        `Note ${noteId} was created but not deleted: ${failure.message}`,
      ),
    );
  }

  private async copy(text: string): Promise<void> {
    try {
      await this.clipboard.write(text);
    } catch (error) {
      if (error instanceof PoznoteCliError) {
        this.reporter.fail(error);
        return;
      }
      throw error;
    }
  }
}
