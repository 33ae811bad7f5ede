export interface PoznoteConfig {
  baseUrl: string;
  username: string;
  password: string;
  userId: string;
  workspace: string;
  advancedFeaturesEnabled: boolean;
}

export interface PoznoteNote {
  id: string;
  heading?: string | null;
  content?: string | null;
  workspace?: string | null;
}

export interface NoteEnvelope {
  note?: PoznoteNote;
}

export interface NoteListResponse {
  notes?: PoznoteNote[];
}

export type InputSource = 'stdin' | 'clipboard';

/**
 * The single operation an invocation performs.
 */
export type Action =
  | { kind: 'create'; source: InputSource; tags: string[] }
  | { kind: 'burn'; source: InputSource; tags: string[] }
  | { kind: 'list-last' }
  | { kind: 'search'; query: string }
  | { kind: 'update'; noteId: string }
  | { kind: 'delete'; noteId: string };

export type ActionKind = Action['kind'];

export type BodyAction = Extract<Action, { kind: 'create' | 'burn' | 'update' }>;

export interface NoteBody {
  content: string;
  tags: string[];
}

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body?: string;
}

export type StatusCategory =
  | 'success'
  | 'unauthorized'
  | 'not-found'
  | 'server-error'
  | 'client-error'
  | 'network-error'
  | 'timeout';

export interface ApiResult {
  statusCategory: StatusCategory;
  httpStatus?: number;
  noteId?: string;
  noteUrl?: string;
  note?: PoznoteNote;
  rawBody: string;
  /** Transport failure detail for network errors and timeouts */
  message?: string;
}
