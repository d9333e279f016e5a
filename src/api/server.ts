import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { NoteService } from '../services/note-service.js';
import { registerRoutes } from './routes.js';

export async function buildServer(noteService: NoteService): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, noteService);

  return app;
}
