import { jest } from '@jest/globals';
import type {
  AvailableInterface,
  ChannelDefinition,
  ChannelReadings,
  Command,
  ConnectionDescriptor,
  ConnectionType,
  DataSourcePort,
  LoggerPort,
  TractorInfo,
} from '@agri-telemetry/domain';

/** LoggerPort whose methods are jest mocks; children share the parent. */
export function mockLogger(): LoggerPort {
  const logger: LoggerPort = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: () => logger,
  };
  return logger;
}

export function constantChannel(
  name: string,
  seedValue: number,
  overrides: Partial<ChannelDefinition> = {},
): ChannelDefinition {
  return {
    name,
    label: name,
    unit: 'u',
    seedValue,
    description: `${name} test channel`,
    profile: { kind: 'random-walk', sigma: 0 },
    ...overrides,
  };
}

export const SCRIPTED_TRACTOR: TractorInfo = {
  manufacturer: 'Test Works',
  model: 'Scripted 100',
  year: '2024',
  serialNumber: 'TEST-001',
  engineType: 'None',
  operatingHours: 0,
};

/**
 * DataSourcePort that repeats each channel's previous value unless a
 * value is scripted, and can be told to fail at any step.
 */
export class ScriptedSource implements DataSourcePort {
  readonly type: ConnectionType = 'SIMULATION';
  readonly executed: Command[] = [];
  readonly sampled: { channel: string; t: number }[] = [];
  readonly next = new Map<string, number>();
  connectError: Error | null = null;
  sampleError: Error | null = null;
  executeError: Error | null = null;
  connects = 0;
  disconnects = 0;

  constructor(private readonly catalog: readonly ChannelDefinition[] = [constantChannel('level', 50, { minValue: 0, maxValue: 100 })]) {}

  describe(): AvailableInterface {
    return {
      type: 'SIMULATION',
      name: 'Scripted',
      description: 'scripted test source',
      port: 'memory',
      available: true,
      recommended: false,
    };
  }

  connect(_descriptor: ConnectionDescriptor): TractorInfo {
    if (this.connectError) throw this.connectError;
    this.connects++;
    return SCRIPTED_TRACTOR;
  }

  disconnect(): void {
    this.disconnects++;
  }

  channels(): readonly ChannelDefinition[] {
    return this.catalog;
  }

  sample(channel: string, t: number, previous: number, _readings: ChannelReadings): number {
    if (this.sampleError) throw this.sampleError;
    this.sampled.push({ channel, t });
    return this.next.get(channel) ?? previous;
  }

  execute(command: Command): void {
    if (this.executeError) throw this.executeError;
    this.executed.push(command);
  }
}
