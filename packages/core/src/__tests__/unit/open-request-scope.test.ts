import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { openRequestScope } from '../../utils/request/index.js';

describe('openRequestScope', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts and reports a timeout once the deadline passes', () => {
    const scope = openRequestScope(1000);

    vi.advanceTimersByTime(999);
    expect(scope.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut()).toBe(true);
  });

  it('follows the caller signal without reporting a timeout', () => {
    const controller = new AbortController();
    const scope = openRequestScope(1000, controller.signal);

    controller.abort();

    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut()).toBe(false);
  });

  it('stops the timer and the forwarding on dispose', () => {
    const controller = new AbortController();
    const scope = openRequestScope(1000, controller.signal);

    scope.dispose();
    vi.advanceTimersByTime(5000);
    controller.abort();

    expect(scope.signal.aborted).toBe(false);
    expect(scope.timedOut()).toBe(false);
  });
});
