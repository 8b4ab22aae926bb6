/**
 * Zod schemas for request validation.
 *
 * Bodies and query strings are parsed with parseRequest, which turns a zod
 * failure into a ValidationError whose details list every issue.
 */

import { z } from 'zod';
import { ValidationError } from './errors.ts';
import { VIDEO_STATUSES } from '../types/video.ts';

/** Required, non-blank string field. */
function requiredString(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, { message: `${field} is required` });
}

/** POST /api/video/upload-url body. */
export const UploadUrlRequestSchema = z.object({
  fileName: requiredString('fileName')
    .refine((name) => !name.includes('/'), { message: 'fileName must not contain "/"' })
    .refine((name) => !name.includes('..'), { message: 'fileName must not contain ".."' }),
  contentType: z.string().trim().min(1).default('video/mp4'),
});

export type UploadUrlRequest = z.infer<typeof UploadUrlRequestSchema>;

/** POST /api/video/analyze/:videoId body (optional). */
export const AnalyzeRequestSchema = z.object({
  projectArn: z.string().trim().min(1).optional(),
});

/** POST /api/agent/conversation/start body. */
export const StartConversationSchema = z.object({
  videoId: z.string().trim().min(1).optional(),
});

/** POST /api/agent/conversation/message body. */
export const SendMessageSchema = z.object({
  sessionId: requiredString('sessionId'),
  message: requiredString('message'),
});

/** POST /api/agent/conversation/end body. */
export const EndConversationSchema = z.object({
  sessionId: requiredString('sessionId'),
});

/** POST /api/query/ask body. */
export const AskRequestSchema = z.object({
  videoId: requiredString('videoId'),
  question: requiredString('question'),
  sessionId: z.string().trim().min(1).optional(),
  responseFormat: z.enum(['detailed', 'summary', 'timestamps']).default('detailed'),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;

/** POST /api/query/search body. */
export const SearchRequestSchema = z.object({
  videoId: requiredString('videoId'),
  searchQuery: requiredString('searchQuery'),
  searchType: z.enum(['players', 'events', 'all']).default('all'),
});

/**
 * GET /api/videos query parameters.
 *
 * All fields arrive as strings; numeric fields are coerced.
 */
export const VideoListQuerySchema = z.object({
  status: z.enum(VIDEO_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

/** GET /api/query/summary/:videoId query parameters. */
export const SummaryQuerySchema = z.object({
  summaryType: z.enum(['comprehensive', 'brief']).default('comprehensive'),
});

/**
 * Parses input against a schema.
 *
 * @param message - Top-level error message, e.g. "Invalid request body"
 * @throws ValidationError with "path: message" details joined by "; "
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(message, details);
  }

  return result.data;
}
