import { ConfigError } from './errors.js';
import type {
  Action,
  BodyAction,
  InputSource,
  PoznoteConfig,
} from './types/poznote.js';

/**
 * Flags as commander hands them over. `update` and `delete` are `true`
 * when given without a value.
 */
export type CliFlags = {
  clipboard?: boolean;
  tags?: string;
  burn?: boolean;
  debug?: boolean;
  last?: boolean;
  search?: string;
  update?: string | boolean;
  delete?: string | boolean;
  showDelete?: boolean;
  showUpdate?: boolean;
};

const ADVANCED_KINDS = new Set<Action['kind']>([
  'list-last',
  'search',
  'update',
  'delete',
]);

export function isAdvancedAction(action: Action): boolean {
  return ADVANCED_KINDS.has(action.kind);
}

export function requiresBody(action: Action): action is BodyAction {
  return (
    action.kind === 'create' ||
    action.kind === 'burn' ||
    action.kind === 'update'
  );
}

/**
 * Split a comma-separated tag list. Entries are trimmed and blank ones
 * dropped; order and duplicates are kept.
 */
export function parseTags(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

function resolveNoteId(
  flagValue: string | boolean,
  positionalId: string | undefined,
  flagName: string,
): string {
  const candidate = typeof flagValue === 'string' ? flagValue : positionalId;
  const noteId = candidate?.trim();
  if (!noteId) {
    throw new ConfigError('usage', `${flagName} requires a note ID`);
  }
  return noteId;
}

/**
 * Map parsed flags onto exactly one action.
 *
 * Precedence when several action flags are present:
 * burn > delete > update > search > last > create.
 * Advanced actions are rejected here, before any input is read or any
 * request is built, when the config does not enable them.
 */
export function selectAction(
  flags: CliFlags,
  config: Pick<PoznoteConfig, 'advancedFeaturesEnabled'>,
  positionalId?: string,
): Action {
  const source: InputSource = flags.clipboard ? 'clipboard' : 'stdin';
  const tags = parseTags(flags.tags);
  let action: Action;

  if (flags.burn) {
    action = { kind: 'burn', source, tags };
  } else if (flags.delete !== undefined && flags.delete !== false) {
    action = {
      kind: 'delete',
      noteId: resolveNoteId(flags.delete, positionalId, '-D/--delete'),
    };
  } else if (flags.update !== undefined && flags.update !== false) {
    action = {
      kind: 'update',
      noteId: resolveNoteId(flags.update, positionalId, '-U/--update'),
    };
  } else if (flags.search !== undefined) {
    const query = flags.search.trim();
    if (!query) {
      throw new ConfigError('usage', '-s/--search requires a query');
    }
    action = { kind: 'search', query };
  } else if (flags.last) {
    action = { kind: 'list-last' };
  } else {
    action = { kind: 'create', source, tags };
  }

  if (
    positionalId !== undefined &&
    action.kind !== 'update' &&
    action.kind !== 'delete'
  ) {
    throw new ConfigError(
      'usage',
      `Unexpected argument "${positionalId}": a note ID is only accepted with -U or -D`,
    );
  }

  // Updates always read stdin and the API takes no tags on PATCH.
  if (
    (flags.clipboard || flags.tags !== undefined) &&
    action.kind !== 'create' &&
    action.kind !== 'burn'
  ) {
    throw new ConfigError(
      'usage',
      '-c/--clipboard and -t/--tags only apply when creating a note',
    );
  }

  if (isAdvancedAction(action) && !config.advancedFeaturesEnabled) {
    throw new ConfigError(
      'advanced-disabled',
      'Advanced features are disabled in ~/.poznote.conf (set POZNOTE_ADVANCED_FEATURES="true")',
    );
  }

  return action;
}
