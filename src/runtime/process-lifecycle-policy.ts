/**
 * Whether this process may touch process-level signal handlers.
 * A union instead of a boolean flag so call sites read as intent.
 */
export type ProcessLifecyclePolicy =
  | { readonly kind: 'install_signal_handlers' }
  | { readonly kind: 'no_signal_handlers' };
