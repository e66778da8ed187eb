import type { Logger } from './types.js';
import { createRootLogger } from './root-logger.js';

/**
 * Logger for code that runs before the DI container exists, and the default
 * for shutdown groups and termination handles built without one.
 *
 * After DI is ready, prefer the injected ILoggerFactory.
 */
let bootstrapLogger: Logger | undefined;

export function getBootstrapLogger(): Logger {
  bootstrapLogger ??= createRootLogger();
  return bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
