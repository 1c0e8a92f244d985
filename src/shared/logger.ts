import pino from 'pino';

// stdout belongs to the child processes we echo, so log records go to stderr.
export const logger = pino(
  {
    name: 'target-exec',
    level: process.env['TARGET_EXEC_LOG_LEVEL'] ?? 'info',
  },
  pino.destination(2)
);
