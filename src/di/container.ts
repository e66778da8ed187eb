import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { TerminationSignals } from '../runtime/ports/termination-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import { createBootstrapLogger, PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import { ShutdownGroup } from '../shutdown/shutdown-group.js';
import type { DescribableError } from '../shutdown/graceful.js';
import { installTerminationHandle } from '../shutdown/termination-handle.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment the config is parsed from. Defaults to `process.env`. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  // Tests may pre-register fakes for the process ports.
  if (!container.isRegistered(DI.Runtime.ProcessSignals)) {
    const signals: ProcessSignals =
      policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  }

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Tests inject config explicitly before initialization; don't overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: options.env ?? process.env });

  if (configResult.isErr()) {
    createBootstrapLogger('DI').fatal(formatAppError(configResult.error));
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    return terminator.terminate({ kind: 'failure' });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SHUTDOWN REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerShutdown(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  container.register<TerminationSignals>(DI.Runtime.TerminationSignals, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return installTerminationHandle({
        signals: config.termination.signals,
        processSignals: c.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
        terminator: c.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('TerminationHandle'),
      });
    }),
  });

  container.register<ShutdownGroup<DescribableError>>(DI.Shutdown.Group, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new ShutdownGroup<DescribableError>({
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('ShutdownGroup'),
        failurePolicy: config.shutdown.failurePolicy,
      });
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 * Idempotent: calls after the first one return immediately.
 *
 * Registration order matters: the terminator must exist before config
 * parsing, which exits through it on invalid config.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig(options);
  registerShutdown();
  initialized = true;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
