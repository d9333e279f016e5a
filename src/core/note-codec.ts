import { z } from 'zod';

import type { CreateNoteRequest, Note } from '../types/index.js';

export const createNoteRequestSchema = z.object({
  title: z.string(),
  content: z.string(),
});

export const noteParamsSchema = z.object({
  id: z.string().min(1),
});

/**
 * Serialize a note body into the payload stored by the Redis and GCS
 * backends. The id is the storage key and is not embedded.
 */
export function encodeNotePayload(request: CreateNoteRequest): string {
  return JSON.stringify({ title: request.title, content: request.content });
}

/**
 * Parse a stored payload back into a note.
 * Throws when the payload is not JSON or lacks string title/content.
 */
export function decodeNotePayload(id: string, payload: string): Note {
  const parsed = createNoteRequestSchema.parse(JSON.parse(payload));
  return { id, title: parsed.title, content: parsed.content };
}
