import { pino, type BaseLogger, type Bindings, type Level } from 'pino';

/**
 * The slice of a pino logger the pipeline relies on. Fastify's `app.log`
 * satisfies it, so the gateway hands its own logger down.
 */
export interface Logger extends BaseLogger {
  child(bindings: Bindings): Logger;
}

export function createLogger(level: Level | 'silent' = 'info', name = 'taskrelay'): Logger {
  return pino({ name, level });
}
