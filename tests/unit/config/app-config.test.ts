import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../../../src/config/app-config.js';
import { formatAppError } from '../../../src/errors/formatter.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('uses the defaults on an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'empty env');

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('parses a comma-separated signal list', () => {
    const config = expectOk(loadConfig({ env: { GRACEFUL_STOP_SIGNALS: ' sigterm, SIGINT ,' } }), 'signals');

    expect(config.termination.signals).toEqual(['SIGTERM', 'SIGINT']);
  });

  it('drops duplicate signals', () => {
    const config = expectOk(loadConfig({ env: { GRACEFUL_STOP_SIGNALS: 'SIGINT,sigint,SIGHUP' } }), 'duplicates');

    expect(config.termination.signals).toEqual(['SIGINT', 'SIGHUP']);
  });

  it('reads the failure policy', () => {
    const config = expectOk(loadConfig({ env: { GRACEFUL_STOP_FAILURE_POLICY: 'fail_on_error' } }), 'policy');

    expect(config.shutdown.failurePolicy).toEqual({ kind: 'fail_on_error' });
  });

  it('rejects signals it cannot handle', () => {
    const error = expectErr(loadConfig({ env: { GRACEFUL_STOP_SIGNALS: 'SIGINT,SIGKILL' } }), 'bad signal');

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues.map((i) => i.path)).toEqual(['GRACEFUL_STOP_SIGNALS.1']);
  });

  it('rejects an empty signal list', () => {
    const error = expectErr(loadConfig({ env: { GRACEFUL_STOP_SIGNALS: ' , ' } }), 'empty list');

    expect(error.issues).toEqual([{ path: 'GRACEFUL_STOP_SIGNALS', message: 'At least one signal is required' }]);
  });

  it('rejects an unknown failure policy and formats the issues', () => {
    const error = expectErr(loadConfig({ env: { GRACEFUL_STOP_FAILURE_POLICY: 'ignore' } }), 'bad policy');

    expect(error.issues.map((i) => i.path)).toEqual(['GRACEFUL_STOP_FAILURE_POLICY']);
    expect(formatAppError(error)).toMatch(/^Invalid configuration\n\n {2}- GRACEFUL_STOP_FAILURE_POLICY: /);
  });
});
