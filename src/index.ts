import 'reflect-metadata';

// Shutdown coordination
export { ShutdownGroup, ShutdownFailure } from './shutdown/shutdown-group.js';
export type { ShutdownGroupOptions, CompositeShutdown, TerminationOutcome } from './shutdown/shutdown-group.js';
export { SharedForceSignal } from './shutdown/force-signal.js';
export type { ForceHandle, ForceSignalState } from './shutdown/force-signal.js';
export { gracefulFromAsync } from './shutdown/graceful.js';
export type { Graceful, DescribableError } from './shutdown/graceful.js';
export { failuresOf } from './shutdown/shutdown-report.js';
export type { FailurePolicy, ServiceOutcome, FailedOutcome, ShutdownReport } from './shutdown/shutdown-report.js';
export { ShutdownErr, formatShutdownError, describeFailure } from './shutdown/errors.js';
export type { AlreadyShuttingDownError, ServicesFailedError, ShutdownError } from './shutdown/errors.js';
export { installTerminationHandle } from './shutdown/termination-handle.js';
export type { InstallTerminationOptions } from './shutdown/termination-handle.js';
export { withShutdownGroup } from './shutdown/scope.js';

// Runtime ports and adapters
export type { ProcessSignal, ProcessSignals } from './runtime/ports/process-signals.js';
export type { ExitCode, ProcessTerminator } from './runtime/ports/process-terminator.js';
export type {
  TerminationEvent,
  TerminationSignal,
  TerminationSignals,
  TerminationDeliveryError,
  Unsubscribe,
} from './runtime/ports/termination-signals.js';
export { InMemoryTerminationSignals } from './runtime/adapters/in-memory-termination-signals.js';
export { NodeProcessSignals } from './runtime/adapters/node-process-signals.js';
export { NoopProcessSignals } from './runtime/adapters/noop-process-signals.js';
export { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
export { ThrowingProcessTerminator } from './runtime/adapters/throwing-process-terminator.js';
export { dropGuard } from './runtime/drop-guard.js';
export type { DisposeContext } from './runtime/drop-guard.js';

// Service adapters
export { HttpServerGraceful } from './adapters/http-server-graceful.js';
export type { ClosableServer, HttpServerCloseFailedError } from './adapters/http-server-graceful.js';

// Composition root
export { runUntilTerminated } from './application/run-until-terminated.js';
export type { RegisterServices } from './application/run-until-terminated.js';
export { initializeContainer, resetContainer, container } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';
export { loadConfig, createValidatedConfig, DEFAULT_CONFIG } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export type { AppError, ConfigIssue, ConfigInvalidError, UnexpectedError } from './errors/index.js';
export { Err, formatAppError } from './errors/index.js';
