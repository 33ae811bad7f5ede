import { z } from 'zod';
import type {
  NoteEnvelope,
  NoteListResponse,
  PoznoteNote,
} from './poznote.js';

// Poznote returns numeric ids; the CLI carries them as strings.
// A missing or null id fails validation.
const NoteIdSchema = z
  .union([z.string().trim().min(1), z.number()])
  .transform(String);

export const PoznoteNoteSchema = z.object({
  id: NoteIdSchema,
  heading: z.string().nullish(),
  content: z.string().nullish(),
  workspace: z.string().nullish(),
}) satisfies z.ZodType<PoznoteNote, z.ZodTypeDef, unknown>;

export const NoteEnvelopeSchema = z.object({
  note: PoznoteNoteSchema.optional(),
}) satisfies z.ZodType<NoteEnvelope, z.ZodTypeDef, unknown>;

export const NoteListResponseSchema = z.object({
  notes: z.array(PoznoteNoteSchema).optional(),
}) satisfies z.ZodType<NoteListResponse, z.ZodTypeDef, unknown>;

export const PackageJsonSchema = z.object({
  version: z.string(),
});
