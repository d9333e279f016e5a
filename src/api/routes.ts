import { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';

import { BackendUnavailableError, NoteNotFoundError } from '../core/errors.js';
import { createNoteRequestSchema, noteParamsSchema } from '../core/note-codec.js';
import { NoteService } from '../services/note-service.js';
import logger from '../utils/logger.js';

function clientErrorStatus(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return undefined;
}

export async function registerRoutes(app: FastifyInstance, noteService: NoteService) {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NoteNotFoundError) {
      return reply.code(404).send({ error: 'Note not found' });
    }
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Invalid note', issues: error.issues });
    }
    if (error instanceof BackendUnavailableError) {
      logger.error(
        { error, backend: error.backend, operation: error.operation, url: request.url },
        'Storage backend unavailable'
      );
      return reply.code(503).send({ error: 'Storage backend unavailable' });
    }
    const status = clientErrorStatus(error);
    if (status !== undefined && error instanceof Error) {
      return reply.code(status).send({ error: error.message });
    }
    logger.error({ error, url: request.url }, 'Unhandled request error');
    return reply.code(500).send({ error: 'Internal Server Error' });
  });

  app.get('/', async (_request, reply) => {
    return reply.redirect('/notes');
  });

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  app.get('/notes', async () => {
    return noteService.listNotes();
  });

  app.get('/notes/:id', async (request) => {
    const { id } = noteParamsSchema.parse(request.params);
    return noteService.getNote(id);
  });

  // Full replacement; creates the note if the id is unknown
  app.put('/notes/:id', async (request, reply) => {
    const { id } = noteParamsSchema.parse(request.params);
    const body = createNoteRequestSchema.parse(request.body);
    await noteService.updateNote(id, body);
    return reply.code(204).send();
  });

  app.post('/notes', async (request, reply) => {
    const body = createNoteRequestSchema.parse(request.body);
    const id = await noteService.createNote(body);
    return reply.code(201).type('application/json').send(JSON.stringify(id));
  });
}
