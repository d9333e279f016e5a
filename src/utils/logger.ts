import pino from 'pino';

// Call sites log failures under `error`, not pino's default `err`
const logger = pino({
  name: 'notes-api',
  level: process.env.LOG_LEVEL || 'info',
  serializers: {
    error: pino.stdSerializers.err,
  },
});

export default logger;
