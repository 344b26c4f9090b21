import type { ChannelDefinition, ChannelReadings } from '../../entities/telemetry-parameter.js';
import type { Command } from '../../entities/command.js';
import type {
  AvailableInterface,
  ConnectionDescriptor,
  ConnectionType,
} from '../../entities/connection.js';
import type { TractorInfo } from '../../entities/tractor-info.js';

/**
 * Capability interface every telemetry backend implements: the signal
 * generator for simulation, and protocol adapters for real equipment.
 * The core dispatches through this interface only.
 */
export interface DataSourcePort {
  readonly type: ConnectionType;

  /** Entry shown by an interface scan. */
  describe(): AvailableInterface;

  /** Opens the session. Throws when the backend cannot be reached. */
  connect(descriptor: ConnectionDescriptor): TractorInfo;
  disconnect(): void;

  /** Channel catalog served by this source, in any order. */
  channels(): readonly ChannelDefinition[];

  /**
   * Next value for `channel` at `t` simulated seconds. `readings` holds the
   * values already produced earlier in the same tick.
   */
  sample(channel: string, t: number, previous: number, readings: ChannelReadings): number;

  /** Applies a command that already passed the safety gate. */
  execute(command: Command): void;
}

export type DataSourceFactory = (descriptor: ConnectionDescriptor) => DataSourcePort | null;
