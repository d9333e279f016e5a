import { buildServer } from './api/server.js';
import { BackendProvider } from './backends/backend-provider.js';
import { NoteService } from './services/note-service.js';
import { loadServerConfig, loadStorageConfig } from './utils/config.js';
import logger from './utils/logger.js';

async function main() {
  const serverConfig = loadServerConfig();

  // The storage section is read when the first request needs a backend
  const backends = new BackendProvider({ readConfig: loadStorageConfig });
  const noteService = new NoteService(backends);

  const app = await buildServer(noteService);

  try {
    await app.listen({
      port: serverConfig.port,
      host: serverConfig.host,
    });
    logger.info(
      { port: serverConfig.port, host: serverConfig.host },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    try {
      await app.close();
      await backends.close();
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
