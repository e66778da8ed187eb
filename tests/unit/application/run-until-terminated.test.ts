import { describe, it, expect, beforeEach } from 'vitest';
import { runUntilTerminated } from '../../../src/application/run-until-terminated.js';
import { container } from '../../../src/di/container.js';
import { DI } from '../../../src/di/tokens.js';
import type { ProcessSignals } from '../../../src/runtime/ports/process-signals.js';
import { FakeProcessSignals } from '../../fakes/process-signals.fake.js';
import { FailingService, ImmediateService, SlowService } from '../../fakes/services.fake.js';
import { CaptureLoggerFactory } from '../../helpers/capture-logger.js';
import { flushMicrotasks } from '../../helpers/async.js';

describe('runUntilTerminated', () => {
  let processSignals: FakeProcessSignals;
  let loggers: CaptureLoggerFactory;

  beforeEach(() => {
    processSignals = new FakeProcessSignals();
    loggers = new CaptureLoggerFactory();
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: processSignals });
    container.register(DI.Logging.Factory, { useValue: loggers });
  });

  it('exits with success after a forced two-phase shutdown', async () => {
    const slow = new SlowService('worker');
    const exit = runUntilTerminated(
      (group) => {
        group.push(slow);
      },
      { runtimeMode: { kind: 'test' }, env: {} }
    ).catch((e: unknown) => e);

    await flushMicrotasks();
    expect(loggers.capture.hasEntry('info', 'Services running; waiting for termination signal')).toBe(true);

    await processSignals.deliver('SIGINT');
    expect(slow.callCount).toBe(1);
    expect(slow.finished).toBe(false);

    await processSignals.deliver('SIGINT');

    expect(await exit).toMatchObject({ message: '[ProcessTerminator] terminate(success)' });
    expect(slow.finished).toBe(true);
  });

  it('exits with success on the first signal when services stop on their own', async () => {
    const exit = runUntilTerminated(
      (group) => {
        group.push(new ImmediateService('cache'));
      },
      { runtimeMode: { kind: 'test' }, env: { GRACEFUL_STOP_SIGNALS: 'SIGTERM' } }
    ).catch((e: unknown) => e);

    await flushMicrotasks();
    await processSignals.deliver('SIGTERM');

    expect(await exit).toMatchObject({ message: '[ProcessTerminator] terminate(success)' });
  });

  it('exits with failure when a service fails under fail_on_error', async () => {
    const exit = runUntilTerminated(
      (group) => {
        group.push(new FailingService('journal'));
      },
      { runtimeMode: { kind: 'test' }, env: { GRACEFUL_STOP_FAILURE_POLICY: 'fail_on_error' } }
    ).catch((e: unknown) => e);

    await flushMicrotasks();
    await processSignals.deliver('SIGINT');

    expect(await exit).toMatchObject({ message: '[ProcessTerminator] terminate(failure)' });
  });

  it('tears down what was registered and exits with failure when registration throws', async () => {
    const started = new ImmediateService('started');

    const exit = await runUntilTerminated(
      async (group) => {
        group.push(started);
        throw new Error('port in use');
      },
      { runtimeMode: { kind: 'test' }, env: {} }
    ).catch((e: unknown) => e);

    expect(exit).toMatchObject({ message: '[ProcessTerminator] terminate(failure)' });
    expect(started.callCount).toBe(1);
    expect(started.lastForce?.isFired).toBe(true);
    expect(loggers.capture.entries.find((e) => e.msg === 'Service registration failed')).toMatchObject({
      level: 'fatal',
      component: 'Application',
      err: { message: 'port in use' },
    });
  });

  it('still exits with failure when teardown after a failed registration fails too', async () => {
    const journal = new FailingService('journal');

    const exit = await runUntilTerminated(
      async (group) => {
        group.push(journal);
        throw new Error('port in use');
      },
      { runtimeMode: { kind: 'test' }, env: { GRACEFUL_STOP_FAILURE_POLICY: 'fail_on_error' } }
    ).catch((e: unknown) => e);

    expect(exit).toMatchObject({ message: '[ProcessTerminator] terminate(failure)' });
    expect(journal.callCount).toBe(1);
    expect(loggers.capture.hasEntry('error', 'Cleanup failed while unwinding from another failure')).toBe(true);
  });
});
