import { InputError } from '../errors.js';
import type { InputSource, NoteBody } from '../types/poznote.js';
import type { Clipboard } from './clipboard.js';

export interface InputStream extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

export interface InputSources {
  stdin: InputStream;
  clipboard: Clipboard;
}

export async function readStream(stream: InputStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Capture the note text from the clipboard or from piped stdin.
 * Surrounding whitespace is trimmed.
 */
export async function acquireContent(
  source: InputSource,
  { stdin, clipboard }: InputSources,
): Promise<string> {
  if (source === 'clipboard') {
    return (await clipboard.read()).trim();
  }

  if (stdin.isTTY) {
    throw new InputError(
      'No piped input detected. Pipe text in or use -c to post from the clipboard.',
    );
  }

  return (await readStream(stdin)).trim();
}

export function createNoteBody(content: string, tags: string[] = []): NoteBody {
  return Object.freeze({ content, tags: [...tags] });
}
