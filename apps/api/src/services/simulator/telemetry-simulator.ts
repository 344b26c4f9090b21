import { clamp, wallClockNow } from '@agri-telemetry/adapters';
import type {
  ChannelDefinition,
  DataSourcePort,
  HistoryEntry,
  TelemetryAlert,
  TelemetryFrame,
  TelemetryParameter,
  TelemetrySnapshot,
} from '@agri-telemetry/domain';
import { HistoryBuffer } from '../history/history-buffer.js';
import { ThresholdMonitor } from './threshold-monitor.js';
import { orderChannels, validateChannel } from './channel-order.js';
import { UnknownChannelError } from '../../errors.js';

export const DEFAULT_HISTORY_CAPACITY = 1000;

export interface TelemetrySimulatorOptions {
  readonly source: DataSourcePort;
  readonly historyCapacity?: number;
  /** Epoch milliseconds. */
  readonly clock?: () => number;
  readonly monitor?: ThresholdMonitor;
}

interface ChannelState {
  value: number;
  timestamp: Date;
}

/**
 * Advances every channel of a data source once per tick, keeps a bounded
 * history per channel and reports threshold crossings. Performs no I/O.
 */
export class TelemetrySimulator {
  private readonly source: DataSourcePort;
  private readonly clock: () => number;
  private readonly monitor: ThresholdMonitor;
  private readonly order: readonly ChannelDefinition[];
  private readonly states = new Map<string, ChannelState>();
  private readonly histories = new Map<string, HistoryBuffer>();
  private readonly injected = new Map<string, number>();
  private startedAtMs: number | null = null;
  private tickCount = 0;

  constructor(options: TelemetrySimulatorOptions) {
    this.source = options.source;
    this.clock = options.clock ?? wallClockNow;
    this.monitor = options.monitor ?? new ThresholdMonitor();

    const definitions = options.source.channels();
    definitions.forEach(validateChannel);
    this.order = orderChannels(definitions);

    const capacity = options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY;
    for (const definition of this.order) {
      this.histories.set(definition.name, new HistoryBuffer(capacity));
    }
    this.reset();
  }

  /** Channel names in update order. */
  get channels(): string[] {
    return this.order.map((d) => d.name);
  }

  get ticks(): number {
    return this.tickCount;
  }

  definition(channel: string): ChannelDefinition | undefined {
    return this.order.find((d) => d.name === channel);
  }

  /**
   * Samples every channel in dependency order, then commits values,
   * history and alerts together. A sampling failure leaves the previous
   * tick's state untouched.
   */
  tick(nowMs: number = this.clock()): TelemetryFrame {
    if (this.startedAtMs === null) this.startedAtMs = nowMs;
    const t = (nowMs - this.startedAtMs) / 1000;
    const timestamp = new Date(nowMs);

    const staged = new Map<string, number>();
    for (const definition of this.order) {
      const previous = this.stateOf(definition.name).value;
      const sampled = this.injected.get(definition.name)
        ?? this.source.sample(definition.name, t, previous, staged);
      if (!Number.isFinite(sampled)) {
        throw new Error(`${definition.name} produced a non-finite value (${sampled})`);
      }
      staged.set(definition.name, clamp(sampled, definition.minValue, definition.maxValue));
    }
    this.injected.clear();

    const alerts: TelemetryAlert[] = [];
    for (const definition of this.order) {
      const value = staged.get(definition.name) ?? this.stateOf(definition.name).value;
      this.states.set(definition.name, { value, timestamp });
      this.historyOf(definition.name).append(timestamp, value);

      const alert = this.monitor.evaluate(definition, value, timestamp);
      if (alert) alerts.push(alert);
    }

    this.tickCount++;
    return { tick: this.tickCount, timestamp, snapshot: this.snapshot(), alerts };
  }

  /**
   * Replaces the sampled value of a channel on the next tick only. Used for
   * fault drills; the value is still clamped to the channel bounds.
   */
  inject(channel: string, value: number): void {
    if (!this.states.has(channel)) throw new UnknownChannelError(channel);
    this.injected.set(channel, value);
  }

  /** Restores seed values and clears history and alert latches. */
  reset(): void {
    const now = new Date(this.clock());
    for (const definition of this.order) {
      this.states.set(definition.name, { value: definition.seedValue, timestamp: now });
      this.historyOf(definition.name).clear();
    }
    this.monitor.reset();
    this.injected.clear();
    this.startedAtMs = null;
    this.tickCount = 0;
  }

  snapshot(): TelemetrySnapshot {
    const out: Record<string, { value: number; unit: string; timestamp: Date }> = {};
    for (const definition of this.order) {
      const state = this.stateOf(definition.name);
      out[definition.name] = {
        value: state.value,
        unit: definition.unit,
        timestamp: new Date(state.timestamp.getTime()),
      };
    }
    return out;
  }

  parameters(): TelemetryParameter[] {
    return this.order.map((definition) => {
      const state = this.stateOf(definition.name);
      return {
        name: definition.name,
        label: definition.label,
        value: state.value,
        unit: definition.unit,
        minValue: definition.minValue,
        maxValue: definition.maxValue,
        warningThreshold: definition.warningThreshold,
        criticalThreshold: definition.criticalThreshold,
        alertDirection: definition.alertDirection,
        timestamp: new Date(state.timestamp.getTime()),
        description: definition.description,
      };
    });
  }

  /** Most recent `count` entries for a channel, oldest first. */
  history(channel: string, count?: number): HistoryEntry[] {
    return this.historyOf(channel).recent(count);
  }

  private stateOf(channel: string): ChannelState {
    const state = this.states.get(channel);
    if (!state) throw new UnknownChannelError(channel);
    return state;
  }

  private historyOf(channel: string): HistoryBuffer {
    const buffer = this.histories.get(channel);
    if (!buffer) throw new UnknownChannelError(channel);
    return buffer;
  }
}
