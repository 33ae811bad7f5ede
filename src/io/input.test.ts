import { describe, it, expect, vi } from 'vitest';
import {
  acquireContent,
  createNoteBody,
  readStream,
  type InputStream,
} from './input.js';
import type { Clipboard } from './clipboard.js';
import { InputError, MissingDependencyError } from '../errors.js';

function fakeStdin(chunks: Array<string | Buffer>, isTTY = false): InputStream {
  return {
    isTTY,
    async *[Symbol.asyncIterator]() {
      for (const chunk of chunks) {
        yield chunk;
      }
    },
  };
}

function fakeClipboard(text = ''): Clipboard {
  return {
    read: vi.fn<Clipboard['read']>().mockResolvedValue(text),
    write: vi.fn<Clipboard['write']>().mockResolvedValue(undefined),
  };
}

describe('readStream', () => {
  it('should concatenate string and buffer chunks', async () => {
    await expect(
      readStream(fakeStdin(['hel', Buffer.from('lo '), 'world'])),
    ).resolves.toBe('hello world');
  });
});

describe('acquireContent', () => {
  it('should read and trim piped stdin', async () => {
    const clipboard = fakeClipboard();

    const content = await acquireContent('stdin', {
      stdin: fakeStdin(['hello\n']),
      clipboard,
    });

    expect(content).toBe('hello');
    expect(clipboard.read).not.toHaveBeenCalled();
  });

  it('should refuse to read from an interactive terminal', async () => {
    const clipboard = fakeClipboard();

    const pending = acquireContent('stdin', {
      stdin: fakeStdin([], true),
      clipboard,
    });

    await expect(pending).rejects.toBeInstanceOf(InputError);
    await expect(pending).rejects.toMatchObject({ exitCode: 11 });
  });

  it('should read the clipboard even when stdin is a terminal', async () => {
    const clipboard = fakeClipboard('  from clipboard \n');

    const content = await acquireContent('clipboard', {
      stdin: fakeStdin([], true),
      clipboard,
    });

    expect(content).toBe('from clipboard');
  });

  it('should propagate a missing clipboard utility', async () => {
    const clipboard = fakeClipboard();
    vi.mocked(clipboard.read).mockRejectedValue(
      new MissingDependencyError('No clipboard utility found'),
    );

    await expect(
      acquireContent('clipboard', { stdin: fakeStdin([]), clipboard }),
    ).rejects.toMatchObject({ exitCode: 10 });
  });
});

describe('createNoteBody', () => {
  it('should copy the tags and freeze the body', () => {
    const tags = ['a', 'b'];
    const body = createNoteBody('text', tags);
    tags.push('c');

    expect(body).toEqual({ content: 'text', tags: ['a', 'b'] });
    expect(Object.isFrozen(body)).toBe(true);
  });
});
