import pino from 'pino';

function defaultLevel(): string {
  if (process.env['LOG_LEVEL']) return process.env['LOG_LEVEL'];
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

// Logs go to stderr; stdout belongs to the caller.
export const logger = pino({ name: 'pig-latin', level: defaultLevel() }, pino.destination(2));
