import pino from 'pino';
import type { Logger } from './types.js';
import { resolveLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * JSON lines on stderr, written synchronously: the last shutdown entries are
 * emitted right before the process exits and must not sit in a buffer.
 */
export function createRootLogger(env: Record<string, string | undefined> = process.env): Logger {
  return pino(
    {
      level: resolveLogLevel(env),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.destination({ dest: 2, sync: true })
  );
}
