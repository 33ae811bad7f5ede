export const CONFIG_FILE_NAME = '.poznote.conf';

export const CONFIG_KEYS = [
  'POZNOTE_URL',
  'POZNOTE_USER',
  'POZNOTE_PASS',
  'POZNOTE_USER_ID',
  'POZNOTE_WORKSPACE',
  'POZNOTE_ADVANCED_FEATURES',
] as const;

export const REQUIRED_CONFIG_KEYS = [
  'POZNOTE_URL',
  'POZNOTE_USER',
  'POZNOTE_PASS',
] as const;

export const DEFAULT_USER_ID = '1';
export const DEFAULT_WORKSPACE = 'Poznote';

export const NOTES_ENDPOINT = '/api/v1/notes';
export const NOTE_TYPE = 'markdown';
export const HEADING_PREFIX = 'cli-';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const MASKED_SECRET = '****';
