/**
 * Redaction configuration for pino.
 *
 * Services log their own context on shutdown (connection strings, client
 * options); keys that commonly carry secrets are censored.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    'headers.authorization',
    'headers.Authorization',
    'headers.x-api-key',
  ],
  censor: '[REDACTED]',
};
