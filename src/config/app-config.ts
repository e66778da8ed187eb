/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { TerminationSignal } from '../runtime/ports/termination-signals.js';
import type { FailurePolicy } from '../shutdown/shutdown-report.js';

// =============================================================================
// Types
// =============================================================================

export const SUPPORTED_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'] as const satisfies readonly TerminationSignal[];

export interface AppConfig {
  readonly termination: {
    /** Process signals that request shutdown; the second delivery forces it. */
    readonly signals: readonly TerminationSignal[];
  };
  readonly shutdown: {
    readonly failurePolicy: FailurePolicy;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  GRACEFUL_STOP_SIGNALS: z
    .string()
    .default('SIGINT')
    .transform((v) =>
      v
        .split(',')
        .map((s) => s.trim().toUpperCase())
        .filter((s) => s.length > 0)
    )
    .pipe(z.array(z.enum(SUPPORTED_SIGNALS)).min(1, 'At least one signal is required')),

  GRACEFUL_STOP_FAILURE_POLICY: z.enum(['report', 'fail_on_error']).default('report'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: brands a config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

export const DEFAULT_CONFIG: AppConfig = {
  termination: { signals: ['SIGINT'] },
  shutdown: { failurePolicy: { kind: 'report' } },
};

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  // Duplicates would install the same handler twice and emit twice per signal.
  const signals = [...new Set(env.GRACEFUL_STOP_SIGNALS)];

  return {
    termination: { signals },
    shutdown: { failurePolicy: { kind: env.GRACEFUL_STOP_FAILURE_POLICY } },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
