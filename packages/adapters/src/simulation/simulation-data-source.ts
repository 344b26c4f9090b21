import type {
  AvailableInterface,
  ChannelDefinition,
  ChannelReadings,
  Command,
  ConnectionDescriptor,
  ConnectionType,
  DataSourcePort,
  LoggerPort,
  RandomSource,
  TractorInfo,
} from '@agri-telemetry/domain';
import { SignalGenerator } from './signal-generator.js';
import { TRACTOR_CHANNELS } from './tractor-channels.js';

export interface SimulationDataSourceOptions {
  readonly rng: RandomSource;
  readonly logger: LoggerPort;
  readonly channels?: readonly ChannelDefinition[];
}

const SIMULATED_TRACTOR: TractorInfo = {
  manufacturer: 'Educational Tractors Inc.',
  model: 'EduDemo 2025',
  year: '2025',
  serialNumber: 'EDU-SIM-001',
  engineType: 'Simulated Diesel',
  horsepower: 120,
  operatingHours: 1250.5,
  lastMaintenance: new Date(Date.UTC(2025, 5, 1)),
};

/** Synthetic tractor driven by the signal generator. Always available. */
export class SimulationDataSource implements DataSourcePort {
  readonly type: ConnectionType = 'SIMULATION';

  protected readonly logger: LoggerPort;
  private readonly generator: SignalGenerator;
  private readonly catalog: readonly ChannelDefinition[];
  private readonly definitions = new Map<string, ChannelDefinition>();
  private connected = false;

  constructor(options: SimulationDataSourceOptions) {
    this.logger = options.logger;
    this.generator = new SignalGenerator(options.rng);
    this.catalog = options.channels ?? TRACTOR_CHANNELS;
    this.loadCatalog();
  }

  describe(): AvailableInterface {
    return {
      type: 'SIMULATION',
      name: 'Educational Simulator',
      description: 'Safe simulation environment for learning',
      port: 'virtual',
      available: true,
      recommended: true,
    };
  }

  connect(descriptor: ConnectionDescriptor): TractorInfo {
    this.loadCatalog();
    this.connected = true;
    this.logger.info(`session opened (${descriptor.name ?? this.describe().name})`);
    return this.tractorInfo();
  }

  disconnect(): void {
    if (!this.connected) return;
    this.connected = false;
    this.logger.info('session closed');
  }

  channels(): readonly ChannelDefinition[] {
    return [...this.definitions.values()];
  }

  sample(channel: string, t: number, previous: number, readings: ChannelReadings): number {
    const definition = this.definitions.get(channel);
    if (!definition) throw new Error(`unknown channel: ${channel}`);
    return this.generator.next(previous, t, definition, readings);
  }

  execute(command: Command): void {
    switch (command.name) {
      case 'set_engine_rpm':
        if (typeof command.value === 'number') this.retargetPeriodic('engine_rpm', command.value);
        break;
      case 'set_vehicle_speed':
        if (typeof command.value === 'number') this.retargetPeriodic('vehicle_speed', command.value);
        break;
      default:
        this.logger.info(`command ${command.name} acknowledged`, command.value);
    }
  }

  protected tractorInfo(): TractorInfo {
    return SIMULATED_TRACTOR;
  }

  /** Moves the centre of a periodic channel; the swing and noise stay. */
  private retargetPeriodic(channel: string, base: number): void {
    const definition = this.definitions.get(channel);
    if (!definition || definition.profile.kind !== 'periodic') return;
    this.definitions.set(channel, { ...definition, profile: { ...definition.profile, base } });
    this.logger.info(`${channel} baseline set to ${base}`);
  }

  private loadCatalog(): void {
    this.definitions.clear();
    for (const definition of this.catalog) {
      this.definitions.set(definition.name, definition);
    }
  }
}
