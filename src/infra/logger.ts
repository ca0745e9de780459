import pino from 'pino';

// Pino logger instance configured for the app
// name: identifies this logger in output
// level: LOG_LEVEL wins, otherwise production uses info, tests stay silent and dev uses debug
// redact: removes credentials from anything that gets logged with an account attached
// destination 2 is stderr, so log lines never interleave with the REPL on stdout
function defaultLevel(nodeEnv: string | undefined): string {
  if (nodeEnv === 'production') return 'info';
  if (nodeEnv === 'test') return 'silent';
  return 'debug';
}

export const logger = pino(
  {
    name: 'bto-portal',
    level: process.env.LOG_LEVEL ?? defaultLevel(process.env.NODE_ENV),
    redact: {
      paths: ['credential', '*.credential', 'password', '*.password'],
      remove: true,
    },
  },
  pino.destination(2),
);
