import { DEFAULT_REQUEST_TIMEOUT_MS } from '../constants.js';
import { ApiError } from '../errors.js';
import type {
  Action,
  ApiResult,
  HttpRequest,
  PoznoteConfig,
  PoznoteNote,
} from '../types/poznote.js';
import {
  NoteEnvelopeSchema,
  NoteListResponseSchema,
} from '../types/validators.js';
import { HttpClient, classifyStatus } from './http-client.js';

function parseJson(text: string): unknown {
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Share link for a note in the Poznote web UI.
 */
export function buildNoteUrl(config: PoznoteConfig, noteId: string): string {
  return `${config.baseUrl}/index.php?workspace=${encodeURIComponent(config.workspace)}&note=${encodeURIComponent(noteId)}`;
}

/**
 * Turn a non-success result into the single line reported to the operator.
 */
export function describeFailure(result: ApiResult): ApiError {
  const status = result.httpStatus;
  switch (result.statusCategory) {
    case 'unauthorized':
      return new ApiError(
        'unauthorized',
        `API request failed: ${status} Unauthorized (check POZNOTE_USER and POZNOTE_PASS)`,
      );
    case 'not-found':
      return new ApiError('not-found', `API request failed: ${status} Not Found`);
    case 'server-error':
      return new ApiError(
        'server-error',
        `API request failed: ${status} Server Error`,
      );
    case 'client-error':
      return new ApiError('client-error', `API request failed: ${status}`);
    case 'timeout':
      return new ApiError(
        'timeout',
        `API request failed: ${result.message ?? 'request timed out'}`,
      );
    case 'network-error':
      return new ApiError(
        'network-error',
        `API request failed: ${result.message ?? 'network error'}`,
      );
    case 'success':
      return new ApiError(
        'invalid-response',
        'API request succeeded but the response could not be used',
      );
  }
}

/**
 * Poznote API client: sends the built request and interprets the response
 * for the action that produced it.
 */
export class PoznoteApiClient extends HttpClient {
  private readonly config: PoznoteConfig;

  constructor(
    config: PoznoteConfig,
    timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {
    super(timeoutMs);
    this.config = config;
  }

  async execute(action: Action, request: HttpRequest): Promise<ApiResult> {
    const outcome = await this.send(request);

    if (outcome.kind === 'failure') {
      return {
        statusCategory: outcome.category,
        rawBody: '',
        message: outcome.message,
      };
    }

    const statusCategory = classifyStatus(outcome.status);
    const result: ApiResult = {
      statusCategory,
      httpStatus: outcome.status,
      rawBody: outcome.body,
    };

    if (statusCategory !== 'success') {
      return result;
    }

    const { noteId, note } = this.extractNote(action, parseJson(outcome.body));
    if (noteId !== undefined) {
      result.noteId = noteId;
      if (action.kind !== 'delete') {
        result.noteUrl = buildNoteUrl(this.config, noteId);
      }
    }
    if (note) {
      result.note = note;
    }

    return result;
  }

  private extractNote(
    action: Action,
    data: unknown,
  ): { noteId?: string; note?: PoznoteNote } {
    switch (action.kind) {
      case 'create':
      case 'burn': {
        const parsed = NoteEnvelopeSchema.safeParse(data);
        const note = parsed.success ? parsed.data.note : undefined;
        return { noteId: note?.id, note };
      }
      case 'update': {
        const parsed = NoteEnvelopeSchema.safeParse(data);
        const note = parsed.success ? parsed.data.note : undefined;
        return { noteId: note?.id ?? action.noteId, note };
      }
      case 'list-last':
      case 'search': {
        const parsed = NoteListResponseSchema.safeParse(data);
        const first = parsed.success ? parsed.data.notes?.[0] : undefined;
        return { noteId: first?.id, note: first };
      }
      case 'delete':
        return { noteId: action.noteId };
    }
  }
}
