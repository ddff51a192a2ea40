import { z } from 'zod';

import { ValidationError } from './SongError';

const requiredText = (field: string) => z.string({ required_error: `${field} is required` }).trim().min(1, `${field} is required`);
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const kidSongRequestSchema = z.object({
  child_name: requiredText('child_name'),
  theme: requiredText('theme'),
  occasion: z.string().trim().min(1).default('everyday'),
  vibe: z.string().trim().min(1).default('sunny_kids'),
  voice_type: z.string().trim().min(1).default('any'),
  duration_seconds: z.coerce.number().int().min(20).max(180).default(60),
});

export const adultSongRequestSchema = z.object({
  recipient_name: requiredText('recipient_name'),
  relationship: z.string().trim().min(1).default('friend'),
  occasion: z.string().trim().min(1).default('birthday'),
  story_or_details: requiredText('story_or_details'),
  genre: z.string().trim().min(1).default('pop'),
  vibe: z.string().trim().min(1).default('fun'),
  voice_type: z.string().trim().min(1).default('any'),
  duration_seconds: z.coerce.number().int().min(30).max(240).default(75),
});

export const checkoutRequestSchema = z.object({
  song_id: requiredText('song_id'),
  recipient_name: optionalText,
  subject: optionalText,
});

export const createShareLinkRequestSchema = z.object({
  song_id: requiredText('song_id'),
  title: optionalText,
  recipient_name: optionalText,
  subject: optionalText,
  lyrics: optionalText,
});

export const subscribeRequestSchema = z.object({
  email: requiredText('email').email('email must be a valid address'),
  source: optionalText,
});

export type KidSongRequest = z.infer<typeof kidSongRequestSchema>;
export type AdultSongRequest = z.infer<typeof adultSongRequestSchema>;

/**
 * Parses a request body, turning the first schema issue into a ValidationError
 * such as `theme: Expected string, received number`.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.');
    const message = issue?.message ?? 'Invalid request body';
    throw new ValidationError(field && !message.startsWith(field) ? `${field}: ${message}` : message);
  }
  return result.data;
}
