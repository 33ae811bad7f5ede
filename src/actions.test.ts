import { describe, it, expect } from 'vitest';
import {
  isAdvancedAction,
  parseTags,
  requiresBody,
  selectAction,
  type CliFlags,
} from './actions.js';
import { ConfigError } from './errors.js';

const enabled = { advancedFeaturesEnabled: true };
const disabled = { advancedFeaturesEnabled: false };

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('parseTags', () => {
  it('should return an empty list when no tags are given', () => {
    expect(parseTags(undefined)).toEqual([]);
    expect(parseTags('')).toEqual([]);
  });

  it('should trim tags, drop blanks and keep order and duplicates', () => {
    expect(parseTags(' work, ideas ,,work , ')).toEqual([
      'work',
      'ideas',
      'work',
    ]);
  });
});

describe('selectAction', () => {
  it('should create a note from stdin when no action flag is set', () => {
    expect(selectAction({}, disabled)).toEqual({
      kind: 'create',
      source: 'stdin',
      tags: [],
    });
  });

  it('should read from the clipboard with -c and attach tags', () => {
    expect(selectAction({ clipboard: true, tags: 'a,b' }, disabled)).toEqual({
      kind: 'create',
      source: 'clipboard',
      tags: ['a', 'b'],
    });
  });

  it('should select burn mode without advanced features', () => {
    expect(selectAction({ burn: true, clipboard: true }, disabled)).toEqual({
      kind: 'burn',
      source: 'clipboard',
      tags: [],
    });
  });

  describe('Precedence', () => {
    const all: CliFlags = {
      burn: true,
      delete: '5',
      update: '6',
      search: 'query',
      last: true,
    };

    it('should prefer burn over every other action', () => {
      expect(selectAction(all, enabled).kind).toBe('burn');
    });

    it('should prefer delete over update, search and last', () => {
      expect(selectAction({ ...all, burn: false }, enabled)).toEqual({
        kind: 'delete',
        noteId: '5',
      });
    });

    it('should prefer update over search and last', () => {
      expect(
        selectAction({ update: '6', search: 'query', last: true }, enabled),
      ).toEqual({ kind: 'update', noteId: '6' });
    });

    it('should prefer search over last', () => {
      expect(selectAction({ search: 'query', last: true }, enabled)).toEqual({
        kind: 'search',
        query: 'query',
      });
    });

    it('should select list-last on its own', () => {
      expect(selectAction({ last: true }, enabled)).toEqual({
        kind: 'list-last',
      });
    });
  });

  describe('Note IDs', () => {
    it('should take the ID from the positional argument when -U has no value', () => {
      expect(selectAction({ update: true }, enabled, '42')).toEqual({
        kind: 'update',
        noteId: '42',
      });
    });

    it('should take the ID from the positional argument when -D has no value', () => {
      expect(selectAction({ delete: true }, enabled, ' 42 ')).toEqual({
        kind: 'delete',
        noteId: '42',
      });
    });

    it('should reject -D without any ID', () => {
      const error = captureError(() => selectAction({ delete: true }, enabled));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        reason: 'usage',
        message: '-D/--delete requires a note ID',
      });
    });

    it('should reject a positional ID without -U or -D', () => {
      const error = captureError(() => selectAction({}, enabled, '42'));

      expect(error).toMatchObject({ reason: 'usage', exitCode: 12 });
    });

    it.each<[string, CliFlags]>([
      ['-U with -t', { update: '42', tags: 'work' }],
      ['-U with -c', { update: '42', clipboard: true }],
      ['-D with -t', { delete: '42', tags: 'work' }],
      ['-L with -c', { last: true, clipboard: true }],
    ])('should reject %s as a usage error', (_, flags) => {
      const error = captureError(() => selectAction(flags, enabled));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        reason: 'usage',
        exitCode: 12,
        message: '-c/--clipboard and -t/--tags only apply when creating a note',
      });
    });

    it('should reject a blank search query', () => {
      const error = captureError(() => selectAction({ search: '  ' }, enabled));

      expect(error).toMatchObject({
        reason: 'usage',
        message: '-s/--search requires a query',
      });
    });
  });

  describe('Advanced features gate', () => {
    it.each<[string, CliFlags]>([
      ['list-last', { last: true }],
      ['search', { search: 'foo' }],
      ['update', { update: '42' }],
      ['delete', { delete: '42' }],
    ])('should reject %s when advanced features are disabled', (_, flags) => {
      const error = captureError(() => selectAction(flags, disabled));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        reason: 'advanced-disabled',
        exitCode: 12,
      });
    });

    it('should allow advanced actions when enabled', () => {
      expect(selectAction({ delete: '42' }, enabled).kind).toBe('delete');
    });
  });
});

describe('Action traits', () => {
  it('should mark list, search, update and delete as advanced', () => {
    expect(isAdvancedAction({ kind: 'list-last' })).toBe(true);
    expect(isAdvancedAction({ kind: 'search', query: 'x' })).toBe(true);
    expect(isAdvancedAction({ kind: 'delete', noteId: '1' })).toBe(true);
    expect(
      isAdvancedAction({ kind: 'create', source: 'stdin', tags: [] }),
    ).toBe(false);
    expect(isAdvancedAction({ kind: 'burn', source: 'stdin', tags: [] })).toBe(
      false,
    );
  });

  it('should require a body for create, burn and update only', () => {
    expect(requiresBody({ kind: 'create', source: 'stdin', tags: [] })).toBe(
      true,
    );
    expect(
      requiresBody({ kind: 'update', noteId: '1' }),
    ).toBe(true);
    expect(requiresBody({ kind: 'list-last' })).toBe(false);
    expect(requiresBody({ kind: 'delete', noteId: '1' })).toBe(false);
  });
});
