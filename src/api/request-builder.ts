import {
  HEADING_PREFIX,
  MASKED_SECRET,
  NOTE_TYPE,
  NOTES_ENDPOINT,
} from '../constants.js';
import type {
  Action,
  HttpMethod,
  HttpRequest,
  NoteBody,
  PoznoteConfig,
} from '../types/poznote.js';

export type Clock = () => number;

function noteEndpoint(noteId: string): string {
  return `${NOTES_ENDPOINT}/${encodeURIComponent(noteId)}`;
}

function authorizationHeader(config: PoznoteConfig): string {
  const credentials = `${config.username}:${config.password}`;
  return `Basic ${Buffer.from(credentials, 'utf-8').toString('base64')}`;
}

function createRequest(
  config: PoznoteConfig,
  method: HttpMethod,
  path: string,
  query: Record<string, string> = {},
  payload?: Record<string, unknown>,
): HttpRequest {
  const search = new URLSearchParams(query).toString();
  const headers: Record<string, string> = {
    Authorization: authorizationHeader(config),
    'X-User-ID': config.userId,
    Accept: 'application/json',
  };

  const request: HttpRequest = {
    method,
    url: `${config.baseUrl}${path}${search ? `?${search}` : ''}`,
    path,
    query,
    headers,
  };

  if (payload) {
    headers['Content-Type'] = 'application/json';
    request.body = JSON.stringify(payload);
  }

  return request;
}

function requireBody(action: Action, body: NoteBody | undefined): NoteBody {
  if (!body) {
    throw new Error(`A note body is required to build a ${action.kind} request`);
  }
  return body;
}

/**
 * Map an action onto the Poznote REST call that performs it.
 * Pure: no I/O, and the same inputs (including the clock) give the same request.
 */
export function buildRequest(
  action: Action,
  config: PoznoteConfig,
  body?: NoteBody,
  clock: Clock = Date.now,
): HttpRequest {
  switch (action.kind) {
    case 'create':
    case 'burn': {
      const note = requireBody(action, body);
      const payload: Record<string, unknown> = {
        heading: `${HEADING_PREFIX}${Math.floor(clock() / 1000)}`,
        content: note.content,
        workspace: config.workspace,
        type: NOTE_TYPE,
      };
      if (note.tags.length > 0) payload.tags = note.tags;
      return createRequest(config, 'POST', NOTES_ENDPOINT, {}, payload);
    }
    case 'list-last':
      return createRequest(config, 'GET', NOTES_ENDPOINT, {
        workspace: config.workspace,
      });
    case 'search':
      return createRequest(config, 'GET', NOTES_ENDPOINT, {
        workspace: config.workspace,
        search: action.query,
      });
    case 'update': {
      const note = requireBody(action, body);
      return createRequest(
        config,
        'PATCH',
        noteEndpoint(action.noteId),
        {},
        { content: note.content },
      );
    }
    case 'delete':
      return createRequest(config, 'DELETE', noteEndpoint(action.noteId));
  }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a request as the equivalent curl invocation. The password is
 * masked and the Authorization header is expressed through `-u`.
 */
export function renderCurl(request: HttpRequest, username: string): string {
  const parts = [
    `curl -X ${request.method} ${shellQuote(request.url)}`,
    `-u ${shellQuote(`${username}:${MASKED_SECRET}`)}`,
  ];

  for (const [name, value] of Object.entries(request.headers)) {
    if (name === 'Authorization') continue;
    parts.push(`-H ${shellQuote(`${name}: ${value}`)}`);
  }

  if (request.body !== undefined) {
    parts.push(`-d ${shellQuote(request.body)}`);
  }

  return parts.join(' ');
}
