import 'reflect-metadata';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { createRootLogger } from './root-logger.js';

/**
 * Logger factory: one root logger, child loggers per component.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  readonly root: Logger = createRootLogger();

  create(component: string): Logger {
    return this.root.child({ component });
  }
}
