import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CancellationError,
  KernelError,
  SchemaError,
  ToolExecutionError,
  generateCallId,
  isRecord,
  linkSignals,
  raceAbort,
  sleep,
  toKernelError,
} from '../src/index.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('generateCallId', () => {
  it('produces prefixed 24-char hex ids', () => {
    const id = generateCallId();
    expect(id).toMatch(/^call_[0-9a-f]{24}$/);
  });

  it('does not repeat', () => {
    const ids = new Set(Array.from({ length: 200 }, () => generateCallId()));
    expect(ids.size).toBe(200);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('raceAbort', () => {
  it('resolves with the promise value when not aborted', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(7), controller.signal, () => 'aborted')).resolves.toBe(7);
  });

  it('rejects immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      raceAbort(Promise.resolve(7), controller.signal, () => new CancellationError('aborted')),
    ).rejects.toBeInstanceOf(CancellationError);
  });

  it('rejects when the signal fires before the promise settles', async () => {
    const controller = new AbortController();
    const pending = new Promise<number>(() => {});
    const raced = raceAbort(pending, controller.signal, () => new Error('stop'));
    controller.abort();
    await expect(raced).rejects.toThrow('stop');
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const done = vi.fn();
    const wait = sleep(100, controller.signal, () => new Error('stop')).then(done);
    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await wait;
    expect(done).toHaveBeenCalledOnce();
  });

  it('rejects early on abort', async () => {
    const controller = new AbortController();
    const wait = sleep(10_000, controller.signal, () => new Error('stop'));
    controller.abort();
    await expect(wait).rejects.toThrow('stop');
  });
});

describe('linkSignals', () => {
  it('aborts when a parent aborts', () => {
    const parent = new AbortController();
    const linked = linkSignals([parent.signal, undefined]);
    expect(linked.signal.aborted).toBe(false);
    parent.abort();
    expect(linked.signal.aborted).toBe(true);
    expect(linked.timedOut()).toBe(false);
    linked.dispose();
  });

  it('starts aborted when a parent already is', () => {
    const parent = new AbortController();
    parent.abort();
    const linked = linkSignals([parent.signal], 1000);
    expect(linked.signal.aborted).toBe(true);
    linked.dispose();
  });

  it('aborts and flags a timeout', () => {
    vi.useFakeTimers();
    const linked = linkSignals([], 50);
    vi.advanceTimersByTime(50);
    expect(linked.signal.aborted).toBe(true);
    expect(linked.timedOut()).toBe(true);
    linked.dispose();
  });

  it('stops forwarding after dispose', () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const linked = linkSignals([parent.signal], 50);
    linked.dispose();
    parent.abort();
    vi.advanceTimersByTime(100);
    expect(linked.signal.aborted).toBe(false);
  });
});

describe('errors', () => {
  it('formats schema errors with the offending path', () => {
    const err = new SchemaError('lookup', 'properties.value', 'anyOf is not supported');
    expect(err.kind).toBe('schema');
    expect(err.message).toBe('Tool "lookup" cannot be constrained at properties.value: anyOf is not supported');
    expect(new SchemaError('lookup', '', 'root must be an object').message).toBe(
      'Tool "lookup" cannot be constrained at <root>: root must be an object',
    );
  });

  it('wraps tool failures with the cause message', () => {
    const cause = new Error('division by zero');
    const err = new ToolExecutionError('divide', 'call_1', cause);
    expect(err.message).toBe('Tool "divide" failed: division by zero');
    expect(err.cause).toBe(cause);
  });

  it('describes cancellation reasons', () => {
    expect(new CancellationError('timeout').message).toBe('Run timed out');
    expect(new CancellationError('aborted').message).toBe('Run cancelled');
  });

  it('normalises unknown throwables as internal errors', () => {
    const err = toKernelError('boom');
    expect(err).toBeInstanceOf(KernelError);
    expect(err.kind).toBe('internal');
    expect(err.message).toBe('boom');

    const existing = new CancellationError('aborted');
    expect(toKernelError(existing)).toBe(existing);
  });
});
