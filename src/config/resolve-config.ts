import { z } from 'zod';
import { DEFAULT_USER_ID, DEFAULT_WORKSPACE } from '../constants.js';
import { ConfigError } from '../errors.js';
import type { PoznoteConfig } from '../types/poznote.js';
import type { ConfigSource } from './config-file.js';

const requiredSetting = z
  .string({ required_error: 'is required' })
  .min(1, 'is required');

const optionalSetting = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const ConfigSourceSchema = z.object({
  POZNOTE_URL: requiredSetting
    .trim()
    .min(1, 'is required')
    .url('must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), 'must use http or https'),
  POZNOTE_USER: requiredSetting,
  POZNOTE_PASS: requiredSetting,
  POZNOTE_USER_ID: optionalSetting,
  POZNOTE_WORKSPACE: optionalSetting,
  POZNOTE_ADVANCED_FEATURES: z.string().optional(),
});

const CREDENTIAL_ISSUE_CODES = new Set<string>([
  z.ZodIssueCode.invalid_type,
  z.ZodIssueCode.too_small,
]);

/**
 * Only the literal "true" (any case) turns advanced features on.
 */
export function parseAdvancedFlag(value: string | undefined): boolean {
  return value?.toLowerCase() === 'true';
}

/**
 * Validate raw settings and produce the immutable config for this invocation.
 */
export function resolveConfig(source: ConfigSource): Readonly<PoznoteConfig> {
  const result = ConfigSourceSchema.safeParse(source);

  if (!result.success) {
    const missing = result.error.issues
      .filter((issue) => CREDENTIAL_ISSUE_CODES.has(issue.code))
      .map((issue) => String(issue.path[0]));

    if (missing.length > 0) {
      throw new ConfigError(
        'missing-credentials',
        `Credentials missing: ${[...new Set(missing)].join(', ')}`,
      );
    }

    const details = result.error.issues
      .map((issue) => `${String(issue.path[0])} ${issue.message}`)
      .join(', ');
    throw new ConfigError('invalid-url', `Invalid configuration: ${details}`);
  }

  const settings = result.data;

  return Object.freeze({
    baseUrl: settings.POZNOTE_URL.replace(/\/+$/, ''),
    username: settings.POZNOTE_USER,
    password: settings.POZNOTE_PASS,
    userId: settings.POZNOTE_USER_ID ?? DEFAULT_USER_ID,
    workspace: settings.POZNOTE_WORKSPACE ?? DEFAULT_WORKSPACE,
    advancedFeaturesEnabled: parseAdvancedFlag(
      settings.POZNOTE_ADVANCED_FEATURES,
    ),
  });
}
