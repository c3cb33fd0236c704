import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@gramloop/core';
import type { ToolCall, ToolResult, ToolSource } from '@gramloop/core';
import { dispatchToolCalls, CANCELLED_OUTPUT } from '../src/dispatcher.js';
import { ToolRegistry } from '../src/registry.js';

function makeCall(name: string, args: Record<string, unknown>, id: string): ToolCall {
  return { id, name, arguments: args };
}

/** Registry whose `sleep` tool waits `ms` and tracks peak concurrency. */
function timedRegistry() {
  const stats = { active: 0, peak: 0, started: [] as string[] };
  const registry = new ToolRegistry();
  registry.register(
    { name: 'sleep', description: 'Wait and echo', parameters: { type: 'object' } },
    async (args) => {
      stats.active++;
      stats.peak = Math.max(stats.peak, stats.active);
      stats.started.push(String(args['tag']));
      await new Promise((resolve) => setTimeout(resolve, Number(args['ms'])));
      stats.active--;
      return args['tag'];
    },
  );
  registry.register(
    { name: 'fail', description: 'Always throws', parameters: { type: 'object' } },
    async () => {
      throw new Error('division by zero');
    },
  );
  registry.register(
    { name: 'hang', description: 'Never settles on its own', parameters: { type: 'object' } },
    () => new Promise(() => {}),
  );
  return { registry, stats };
}

const DELAYS = [12, 1, 8, 3, 0, 5];

describe('dispatchToolCalls', () => {
  it.each([1, 2, 3, 4, 5, 6, 10])('returns results in call order with limit %i', async (limit) => {
    const { registry, stats } = timedRegistry();
    const calls = DELAYS.map((ms, i) => makeCall('sleep', { ms, tag: `t${i}` }, `call_${i}`));

    const results = await dispatchToolCalls(calls, registry, { concurrencyLimit: limit });

    expect(results.map((r) => r.callId)).toEqual(calls.map((c) => c.id));
    expect(results.map((r) => r.output)).toEqual(['t0', 't1', 't2', 't3', 't4', 't5']);
    expect(results.every((r) => !r.isError)).toBe(true);
    expect(stats.peak).toBeLessThanOrEqual(limit);
    expect(stats.started).toEqual(['t0', 't1', 't2', 't3', 't4', 't5']);
  });

  it('reaches the concurrency limit when there is enough work', async () => {
    const { registry, stats } = timedRegistry();
    const calls = [0, 1, 2, 3].map((i) => makeCall('sleep', { ms: 5, tag: i }, `call_${i}`));
    await dispatchToolCalls(calls, registry, { concurrencyLimit: 3 });
    expect(stats.peak).toBe(3);
  });

  it('isolates failures', async () => {
    const { registry } = timedRegistry();
    const calls = [
      makeCall('sleep', { ms: 1, tag: 'before' }, 'call_a'),
      makeCall('fail', {}, 'call_b'),
      makeCall('sleep', { ms: 1, tag: 'after' }, 'call_c'),
    ];

    const results = await dispatchToolCalls(calls, registry, { concurrencyLimit: 2 });

    expect(results.map((r) => [r.isError, r.output])).toEqual([
      [false, 'before'],
      [true, 'Tool "fail" failed: division by zero'],
      [false, 'after'],
    ]);
  });

  it('reports unknown tools without executing anything', async () => {
    const registry = new ToolRegistry();
    const execute = vi.spyOn(registry, 'execute');

    const results = await dispatchToolCalls([makeCall('nope', {}, 'call_x')], registry, { concurrencyLimit: 1 });

    expect(results).toEqual([
      { callId: 'call_x', toolName: 'nope', output: 'Unknown tool: nope', isError: true, durationMs: 0 },
    ]);
    expect(execute).not.toHaveBeenCalled();
  });

  it('turns a failing tool lookup into an error result for that call only', async () => {
    const { registry } = timedRegistry();
    const source: ToolSource = {
      listTools: () => registry.listTools(),
      resolve: (name) => {
        if (name === 'broken') throw new Error('lookup backend down');
        return registry.resolve(name);
      },
      execute: (call, signal) => registry.execute(call, signal),
    };
    const calls = [makeCall('broken', {}, 'call_a'), makeCall('sleep', { ms: 0, tag: 'ok' }, 'call_b')];

    const results = await dispatchToolCalls(calls, source, { concurrencyLimit: 2 });

    expect(results[0]).toEqual({
      callId: 'call_a',
      toolName: 'broken',
      output: 'Failed to resolve tool broken: lookup backend down',
      isError: true,
      durationMs: 0,
    });
    expect(results[1]).toMatchObject({ callId: 'call_b', output: 'ok', isError: false });
  });

  it('returns an empty list for no calls', async () => {
    expect(await dispatchToolCalls([], new ToolRegistry(), { concurrencyLimit: 1 })).toEqual([]);
  });

  it('rejects invalid concurrency limits', async () => {
    for (const limit of [0, -1, 1.5, Number.NaN]) {
      await expect(
        dispatchToolCalls([], new ToolRegistry(), { concurrencyLimit: limit }),
      ).rejects.toBeInstanceOf(ConfigurationError);
    }
  });

  it('fires onCallIssued in issuance order and onResult in completion order', async () => {
    const { registry } = timedRegistry();
    const calls = [
      makeCall('sleep', { ms: 15, tag: 'slow' }, 'call_slow'),
      makeCall('sleep', { ms: 0, tag: 'fast' }, 'call_fast'),
      makeCall('missing', {}, 'call_missing'),
    ];
    const issued: string[] = [];
    const completed: string[] = [];

    await dispatchToolCalls(calls, registry, {
      concurrencyLimit: 2,
      onCallIssued: (call) => issued.push(call.id),
      onResult: (result: ToolResult) => completed.push(result.callId),
    });

    expect(issued).toEqual(['call_slow', 'call_fast', 'call_missing']);
    expect(completed).toEqual(['call_missing', 'call_fast', 'call_slow']);
  });

  it('ignores listener errors', async () => {
    const { registry } = timedRegistry();
    const warn = vi.fn();
    const results = await dispatchToolCalls([makeCall('sleep', { ms: 0, tag: 'x' }, 'call_1')], registry, {
      concurrencyLimit: 1,
      onCallIssued: () => {
        throw new Error('listener broke');
      },
      onResult: () => {
        throw new Error('listener broke again');
      },
      logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() },
    });

    expect(results[0]?.output).toBe('x');
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('cancels in-flight and pending calls when the signal aborts', async () => {
    const { registry } = timedRegistry();
    const controller = new AbortController();
    const calls = [
      makeCall('sleep', { ms: 0, tag: 'done' }, 'call_1'),
      makeCall('hang', {}, 'call_2'),
      makeCall('hang', {}, 'call_3'),
    ];

    const pending = dispatchToolCalls(calls, registry, {
      concurrencyLimit: 2,
      signal: controller.signal,
      onResult: (result) => {
        if (result.callId === 'call_1') setTimeout(() => controller.abort(), 5);
      },
    });
    const results = await pending;

    expect(results.map((r) => [r.callId, r.isError, r.output])).toEqual([
      ['call_1', false, 'done'],
      ['call_2', true, CANCELLED_OUTPUT],
      ['call_3', true, CANCELLED_OUTPUT],
    ]);
  });

  it('does not start anything when already aborted', async () => {
    const { registry, stats } = timedRegistry();
    const controller = new AbortController();
    controller.abort();

    const results = await dispatchToolCalls([makeCall('sleep', { ms: 0, tag: 'x' }, 'call_1')], registry, {
      concurrencyLimit: 1,
      signal: controller.signal,
    });

    expect(results[0]).toMatchObject({ isError: true, output: CANCELLED_OUTPUT });
    expect(stats.started).toEqual([]);
  });
});
