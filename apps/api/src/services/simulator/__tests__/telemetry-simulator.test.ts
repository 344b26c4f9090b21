import { describe, it, expect } from '@jest/globals';
import { SeededRng, SimulationDataSource } from '@agri-telemetry/adapters';

import { TelemetrySimulator } from '../telemetry-simulator.js';
import { ConfigurationError, UnknownChannelError } from '../../../errors.js';
import { ScriptedSource, constantChannel, mockLogger } from '../../../__tests__/support.js';

const EPOCH = Date.UTC(2025, 2, 1, 8, 0, 0);

function tractorSimulator(historyCapacity = 1000, seed = 2025) {
  const source = new SimulationDataSource({ rng: new SeededRng(seed), logger: mockLogger() });
  source.connect({ type: 'SIMULATION' });
  let now = EPOCH;
  const simulator = new TelemetrySimulator({ source, historyCapacity, clock: () => now });
  const step = (ms = 100) => {
    now += ms;
    return simulator.tick(now);
  };
  return { simulator, step };
}

describe('TelemetrySimulator', () => {
  it('starts every channel at its seed value', () => {
    const { simulator } = tractorSimulator();
    const snapshot = simulator.snapshot();
    expect(snapshot['engine_rpm']?.value).toBe(1500);
    expect(snapshot['fuel_level']).toEqual({ value: 75, unit: '%', timestamp: new Date(EPOCH) });
    expect(Object.keys(snapshot)).toHaveLength(11);
  });

  it('updates channels in dependency order', () => {
    const { simulator } = tractorSimulator();
    expect(simulator.channels.indexOf('engine_load')).toBeLessThan(simulator.channels.indexOf('engine_temp'));
  });

  it('keeps bounded channels within their bounds on every tick', () => {
    const { simulator, step } = tractorSimulator(1000, 7);
    const bounded = simulator.parameters().filter((p) => p.minValue !== undefined && p.maxValue !== undefined);
    expect(bounded.length).toBe(9);

    for (let i = 0; i < 500; i++) {
      const { snapshot } = step();
      for (const p of bounded) {
        const value = snapshot[p.name]?.value ?? Number.NaN;
        expect(value).toBeGreaterThanOrEqual(p.minValue ?? -Infinity);
        expect(value).toBeLessThanOrEqual(p.maxValue ?? Infinity);
      }
    }
  });

  it('never increases fuel level until reset', () => {
    const { simulator, step } = tractorSimulator();
    let previous = simulator.snapshot()['fuel_level']?.value ?? 0;
    for (let i = 0; i < 300; i++) {
      const current = step().snapshot['fuel_level']?.value ?? Infinity;
      expect(current).toBeLessThanOrEqual(previous);
      previous = current;
    }
    expect(previous).toBeLessThan(75);

    simulator.reset();
    expect(simulator.snapshot()['fuel_level']?.value).toBe(75);
  });

  it('bounds history at its capacity, oldest first', () => {
    const { simulator, step } = tractorSimulator(50);
    for (let i = 0; i < 120; i++) step();

    const history = simulator.history('engine_rpm', 120);
    expect(history).toHaveLength(50);
    const stamps = history.map((e) => e.timestamp.getTime());
    expect(stamps).toEqual([...stamps].sort((a, b) => a - b));
    expect(stamps[49]).toBe(EPOCH + 120 * 100);
    expect(stamps[0]).toBe(EPOCH + 71 * 100);
  });

  it('history(channel, n) returns the newest n entries', () => {
    const { simulator, step } = tractorSimulator();
    const frames = [step(), step(), step()];
    const history = simulator.history('engine_rpm', 2);
    expect(history.map((e) => e.value)).toEqual(frames.slice(1).map((f) => f.snapshot['engine_rpm']?.value));
  });

  it('throws for an unknown channel', () => {
    const { simulator } = tractorSimulator();
    expect(() => simulator.history('boost', 10)).toThrow(UnknownChannelError);
    expect(() => simulator.inject('boost', 1)).toThrow('unknown channel: boost');
  });

  it('passes seconds since the first tick as t', () => {
    const source = new ScriptedSource();
    const simulator = new TelemetrySimulator({ source, clock: () => 0 });
    simulator.tick(1_000);
    simulator.tick(1_100);
    simulator.tick(1_300);
    expect(source.sampled.map((s) => s.t)).toEqual([0, 0.1, 0.3]);
  });

  it('numbers frames and stamps them with the tick time', () => {
    const source = new ScriptedSource();
    const simulator = new TelemetrySimulator({ source, clock: () => 0 });
    simulator.tick(5_000);
    const frame = simulator.tick(5_100);
    expect(frame.tick).toBe(2);
    expect(frame.timestamp).toEqual(new Date(5_100));
    expect(frame.snapshot['level']).toEqual({ value: 50, unit: 'u', timestamp: new Date(5_100) });
    expect(simulator.ticks).toBe(2);
  });

  it('clamps scripted values to the channel bounds', () => {
    const source = new ScriptedSource();
    const simulator = new TelemetrySimulator({ source, clock: () => 0 });
    source.next.set('level', 140);
    expect(simulator.tick(1).snapshot['level']?.value).toBe(100);
    source.next.set('level', -3);
    expect(simulator.tick(2).snapshot['level']?.value).toBe(0);
  });

  it('leaves state untouched when sampling fails', () => {
    const source = new ScriptedSource([constantChannel('a', 1), constantChannel('b', 2)]);
    const simulator = new TelemetrySimulator({ source, clock: () => 0 });
    source.next.set('a', 10);
    source.next.set('b', Number.NaN);

    expect(() => simulator.tick(1)).toThrow('b produced a non-finite value (NaN)');
    expect(simulator.snapshot()['a']?.value).toBe(1);
    expect(simulator.history('a')).toEqual([]);
    expect(simulator.ticks).toBe(0);
  });

  it('rejects an invalid catalog up front', () => {
    const source = new ScriptedSource([constantChannel('a', 500, { minValue: 0, maxValue: 100 })]);
    expect(() => new TelemetrySimulator({ source })).toThrow(ConfigurationError);
  });

  describe('threshold alerts', () => {
    it('reports an injected critical value once per crossing', () => {
      const { simulator, step } = tractorSimulator();
      const tempAlerts = () => step().alerts.filter((a) => a.channel === 'engine_temp');

      simulator.inject('engine_temp', 119);
      const first = tempAlerts();
      expect(first).toHaveLength(1);
      expect(first[0]?.severity).toBe('CRITICAL');
      expect(first[0]?.value).toBe(119);

      // cools by ~5% of the gap per tick, still above the warning threshold
      expect(tempAlerts()).toEqual([]);
      expect(tempAlerts()).toEqual([]);

      simulator.inject('engine_temp', 90);
      expect(tempAlerts()).toEqual([]);

      simulator.inject('engine_temp', 118);
      expect(tempAlerts().map((a) => a.severity)).toEqual(['CRITICAL']);
    });

    it('clamps an injected value before evaluating it', () => {
      const { simulator, step } = tractorSimulator();
      simulator.inject('engine_temp', 500);
      const alert = step().alerts.find((a) => a.channel === 'engine_temp');
      expect(alert?.value).toBe(120);
    });

    it('applies an injection to one tick only', () => {
      const source = new ScriptedSource();
      const simulator = new TelemetrySimulator({ source, clock: () => 0 });
      simulator.inject('level', 80);
      expect(simulator.tick(1).snapshot['level']?.value).toBe(80);
      source.next.set('level', 60);
      expect(simulator.tick(2).snapshot['level']?.value).toBe(60);
    });

    it('raises a low fuel alert', () => {
      const { simulator, step } = tractorSimulator();
      simulator.inject('fuel_level', 15);
      const alert = step().alerts.find((a) => a.channel === 'fuel_level');
      expect(alert?.severity).toBe('WARNING');
      expect(alert?.message).toBe('Warning: Fuel Level is 15.0 %');
    });
  });

  it('reset() restores seeds and clears history', () => {
    const { simulator, step } = tractorSimulator();
    for (let i = 0; i < 10; i++) step();
    simulator.reset();
    expect(simulator.snapshot()['engine_rpm']?.value).toBe(1500);
    expect(simulator.history('engine_rpm')).toEqual([]);
    expect(simulator.ticks).toBe(0);
  });

  it('returns copies from snapshot() and parameters()', () => {
    const { simulator } = tractorSimulator();
    simulator.snapshot()['engine_rpm']?.timestamp.setTime(0);
    simulator.parameters()[0]?.timestamp.setTime(0);
    expect(simulator.snapshot()['engine_rpm']?.timestamp.getTime()).toBe(EPOCH);
  });
});
