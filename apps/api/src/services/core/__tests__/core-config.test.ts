import { describe, it, expect } from '@jest/globals';

import { parseCoreConfig } from '../core-config.js';
import { ConfigurationError } from '../../../errors.js';

describe('parseCoreConfig', () => {
  it('fills in defaults', () => {
    expect(parseCoreConfig()).toEqual({
      tickIntervalMs: 100,
      historyCapacity: 1000,
      maxCommandRate: 10,
      safeMode: true,
      safetyChecksEnabled: true,
      safeModeCommands: ['get_status', 'get_data', 'set_lights', 'horn', 'start_engine', 'stop_engine'],
      autoTick: true,
    });
  });

  it('keeps explicit values', () => {
    const config = parseCoreConfig({ tickIntervalMs: 250, safeMode: false, seed: 11, autoTick: false });
    expect(config.tickIntervalMs).toBe(250);
    expect(config.safeMode).toBe(false);
    expect(config.seed).toBe(11);
    expect(config.autoTick).toBe(false);
  });

  it('rejects invalid values with a ConfigurationError', () => {
    expect(() => parseCoreConfig({ tickIntervalMs: 0 })).toThrow(ConfigurationError);
    expect(() => parseCoreConfig({ historyCapacity: 1.5 })).toThrow(/historyCapacity/);
    expect(() => parseCoreConfig({ maxCommandRate: -1 })).toThrow(/^invalid telemetry core config: maxCommandRate/);
  });
});
