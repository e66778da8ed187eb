/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by concern, not by type.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Termination broadcast fed by the installed signal handlers */
    TerminationSignals: Symbol('Runtime.TerminationSignals'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SHUTDOWN
  // ═══════════════════════════════════════════════════════════════════
  Shutdown: {
    /** The process-wide shutdown group */
    Group: Symbol('Shutdown.Group'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated) */
    App: Symbol('Config.App'),
  },
} as const;

