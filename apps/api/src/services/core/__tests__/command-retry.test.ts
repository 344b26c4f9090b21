import { jest, describe, it, expect } from '@jest/globals';
import { err, ok } from '@agri-telemetry/domain';
import type { CommandReceipt, SafetyViolation, TelemetryCorePort } from '@agri-telemetry/domain';

import { sendCommandWhenReady } from '../command-retry.js';
import { TelemetryCore } from '../telemetry-core.js';
import { mockLogger } from '../../../__tests__/support.js';

const RECEIPT: CommandReceipt = { command: { name: 'horn' }, acceptedAt: new Date(0) };

function limited(retryAfterMs: number): SafetyViolation {
  return { reason: 'RATE_LIMITED', command: 'horn', message: `rate limited: wait ${retryAfterMs}ms`, retryAfterMs };
}

const UNSAFE: SafetyViolation = { reason: 'UNSAFE_MODE', command: 'horn', message: 'horn is not allowed in safe mode' };

function fakeCore() {
  return { sendCommand: jest.fn<TelemetryCorePort['sendCommand']>() };
}

describe('sendCommandWhenReady', () => {
  it('returns an immediate success', async () => {
    const core = fakeCore();
    core.sendCommand.mockReturnValue(ok(RECEIPT));
    const sleep = jest.fn(async (_ms: number) => undefined);

    await expect(sendCommandWhenReady(core, { name: 'horn' }, { sleep })).resolves.toEqual(ok(RECEIPT));
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits out a rate limit and retries', async () => {
    const core = fakeCore();
    core.sendCommand.mockReturnValueOnce(err(limited(40))).mockReturnValueOnce(ok(RECEIPT));
    const sleep = jest.fn(async (_ms: number) => undefined);

    const result = await sendCommandWhenReady(core, { name: 'horn' }, { sleep });
    expect(result.ok).toBe(true);
    expect(sleep).toHaveBeenCalledWith(40);
    expect(core.sendCommand).toHaveBeenCalledTimes(2);
  });

  it('gives up when the wait would exceed the budget', async () => {
    const core = fakeCore();
    core.sendCommand.mockReturnValue(err(limited(80)));
    const sleep = jest.fn(async (_ms: number) => undefined);

    const result = await sendCommandWhenReady(core, { name: 'horn' }, { sleep, maxWaitMs: 200 });
    expect(result).toEqual(err(limited(80)));
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('returns other rejections without waiting', async () => {
    const core = fakeCore();
    core.sendCommand.mockReturnValue(err(UNSAFE));
    const sleep = jest.fn(async (_ms: number) => undefined);

    await expect(sendCommandWhenReady(core, { name: 'horn' }, { sleep })).resolves.toEqual(err(UNSAFE));
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps on timers by default', async () => {
    jest.useFakeTimers();
    try {
      const core = fakeCore();
      core.sendCommand.mockReturnValueOnce(err(limited(100))).mockReturnValueOnce(ok(RECEIPT));

      const pending = sendCommandWhenReady(core, { name: 'horn' });
      await jest.advanceTimersByTimeAsync(100);
      await expect(pending).resolves.toEqual(ok(RECEIPT));
    } finally {
      jest.useRealTimers();
    }
  });

  it('paces commands against a live core', async () => {
    let now = 0;
    const core = new TelemetryCore({ autoTick: false, seed: 1 }, { logger: mockLogger(), clock: () => now });
    core.connect({ type: 'SIMULATION' });
    const sleep = async (ms: number) => {
      now += ms;
    };

    expect(core.sendCommand({ name: 'horn' }).ok).toBe(true);
    const result = await sendCommandWhenReady(core, { name: 'horn' }, { sleep });
    expect(result.ok).toBe(true);
    expect(now).toBe(100);
  });
});
