import { describe, expect, test } from 'vitest';

import { PermitGate } from './permit-gate';

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('PermitGate', () => {
  test('grants permits up to capacity immediately', async () => {
    const gate = new PermitGate(2);

    await gate.acquire();
    await gate.acquire();

    expect(gate.active).toBe(2);
    expect(gate.pending).toBe(0);
  });

  test('queues callers beyond capacity and serves them in order', async () => {
    const gate = new PermitGate(1);
    const order: string[] = [];

    await gate.acquire();
    const first = gate.acquire().then(() => order.push('first'));
    const second = gate.acquire().then(() => order.push('second'));
    await flush();

    expect(gate.pending).toBe(2);
    expect(order).toEqual([]);

    gate.release();
    await first;
    expect(order).toEqual(['first']);

    gate.release();
    await second;
    expect(order).toEqual(['first', 'second']);
    expect(gate.active).toBe(1);
  });

  test('shrinking keeps held permits and delays new grants', async () => {
    const gate = new PermitGate(3);
    await gate.acquire();
    await gate.acquire();
    await gate.acquire();

    gate.resize(1);
    expect(gate.active).toBe(3);

    let granted = false;
    const waiting = gate.acquire().then(() => {
      granted = true;
    });

    gate.release();
    gate.release();
    await flush();
    expect(granted).toBe(false);
    expect(gate.active).toBe(1);

    gate.release();
    await waiting;
    expect(granted).toBe(true);
    expect(gate.active).toBe(1);
  });

  test('growing wakes waiters at once', async () => {
    const gate = new PermitGate(1);
    await gate.acquire();
    const a = gate.acquire();
    const b = gate.acquire();

    gate.resize(3);
    await Promise.all([a, b]);

    expect(gate.active).toBe(3);
    expect(gate.limit).toBe(3);
  });

  test('rejects a waiter whose signal aborts', async () => {
    const gate = new PermitGate(1);
    await gate.acquire();
    const controller = new AbortController();

    const waiting = gate.acquire(controller.signal);
    controller.abort(new Error('stopped'));

    await expect(waiting).rejects.toThrow('stopped');
    expect(gate.pending).toBe(0);
    expect(gate.active).toBe(1);
  });

  test('rejects immediately with an already aborted signal', async () => {
    const gate = new PermitGate(1);
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(gate.acquire(controller.signal)).rejects.toThrow('too late');
    expect(gate.active).toBe(0);
  });

  test('throws when releasing without a held permit', () => {
    const gate = new PermitGate(1);

    expect(() => gate.release()).toThrow(
      'PermitGate.release() called without a held permit',
    );
  });

  test('rejects invalid capacities', () => {
    expect(() => new PermitGate(0)).toThrow(RangeError);
    expect(() => new PermitGate(1.5)).toThrow(RangeError);
    expect(() => new PermitGate(2).resize(-1)).toThrow(RangeError);
  });
});
