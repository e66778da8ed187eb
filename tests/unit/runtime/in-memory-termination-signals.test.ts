import { describe, it, expect } from 'vitest';
import { InMemoryTerminationSignals } from '../../../src/runtime/adapters/in-memory-termination-signals.js';
import type { TerminationEvent } from '../../../src/runtime/ports/termination-signals.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const sigterm: TerminationEvent = { kind: 'termination_requested', signal: 'SIGTERM' };

describe('InMemoryTerminationSignals', () => {
  it('delivers to every listener and returns how many were reached', () => {
    const source = new InMemoryTerminationSignals();
    const seen: string[] = [];
    source.onTermination(() => seen.push('a'));
    source.onTermination(() => seen.push('b'));

    expect(expectOk(source.emit(sigterm), 'emit')).toBe(2);
    expect(seen).toEqual(['a', 'b']);
  });

  it('reports NoListeners when nobody subscribed', () => {
    const source = new InMemoryTerminationSignals();

    expect(expectErr(source.emit(sigterm), 'emit')).toEqual({
      _tag: 'NoListeners',
      signal: 'SIGTERM',
      message: 'No listener for SIGTERM',
    });
  });

  it('stops delivering to a listener after it unsubscribes', () => {
    const source = new InMemoryTerminationSignals();
    let calls = 0;
    const unsubscribe = source.onTermination(() => {
      calls += 1;
    });

    source.emit(sigterm);
    unsubscribe();
    unsubscribe();

    expect(source.emit(sigterm).isErr()).toBe(true);
    expect(calls).toBe(1);
    expect(source.listenerCount).toBe(0);
  });

  it('treats the same function subscribed twice as two listeners', () => {
    const source = new InMemoryTerminationSignals();
    let calls = 0;
    const listener = (): void => {
      calls += 1;
    };
    const first = source.onTermination(listener);
    source.onTermination(listener);

    first();
    source.emit(sigterm);

    expect(calls).toBe(1);
  });

  it('does not deliver the current event to listeners added during delivery', () => {
    const source = new InMemoryTerminationSignals();
    const late: TerminationEvent[] = [];
    source.onTermination(() => {
      source.onTermination((event) => late.push(event));
    });

    source.emit(sigterm);
    expect(late).toEqual([]);

    const sigint: TerminationEvent = { kind: 'termination_requested', signal: 'SIGINT' };
    source.emit(sigint);
    expect(late).toEqual([sigint]);
  });

  it('calls every listener even when one throws, then reports ListenerFailed', () => {
    const source = new InMemoryTerminationSignals();
    const bug = new Error('bug');
    const seen: string[] = [];
    source.onTermination(() => {
      throw bug;
    });
    source.onTermination(() => seen.push('second'));

    const error = expectErr(source.emit(sigterm), 'emit');

    expect(seen).toEqual(['second']);
    expect(error).toEqual({
      _tag: 'ListenerFailed',
      signal: 'SIGTERM',
      failures: [bug],
      message: '1 of 2 listener(s) failed on SIGTERM',
    });
  });
});
