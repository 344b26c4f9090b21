import type {
  AvailableInterface,
  ConnectionType,
  TractorInfo,
} from '@agri-telemetry/domain';
import { SimulationDataSource } from '../simulation/simulation-data-source.js';
import type { SimulationDataSourceOptions } from '../simulation/simulation-data-source.js';

type ProtocolType = Exclude<ConnectionType, 'SIMULATION'>;

interface ProtocolProfile {
  readonly entry: AvailableInterface;
  readonly tractor: TractorInfo;
}

const PROFILES: Record<ProtocolType, ProtocolProfile> = {
  CAN_BUS: {
    entry: {
      type: 'CAN_BUS',
      name: 'CAN Bus Interface',
      description: 'Direct CAN bus communication (simulated)',
      port: 'can0',
      available: true,
      recommended: false,
    },
    tractor: {
      manufacturer: 'CAN Tractor Co.',
      model: 'CAN-Enabled 300',
      year: '2023',
      serialNumber: 'Unknown',
      engineType: 'Tier 4 Diesel',
      operatingHours: 0,
    },
  },
  OBD_II: {
    entry: {
      type: 'OBD_II',
      name: 'OBD-II Adapter',
      description: 'OBD-II diagnostic adapter (simulated)',
      port: '/dev/ttyUSB0',
      available: true,
      recommended: false,
    },
    tractor: {
      manufacturer: 'OBD Tractors',
      model: 'OBD-Compatible 250',
      year: '2022',
      serialNumber: 'Unknown',
      engineType: 'Electronic Diesel',
      operatingHours: 0,
    },
  },
};

/**
 * Stand-in for a CAN or OBD-II backend. Reports the identity of the
 * protocol's machine but samples through the signal generator; frame
 * decoding is out of scope.
 */
export class ProtocolDataSource extends SimulationDataSource {
  readonly type: ConnectionType;
  private readonly profile: ProtocolProfile;

  constructor(protocol: ProtocolType, options: SimulationDataSourceOptions) {
    super(options);
    this.type = protocol;
    this.profile = PROFILES[protocol];
  }

  describe(): AvailableInterface {
    return this.profile.entry;
  }

  protected tractorInfo(): TractorInfo {
    return this.profile.tractor;
  }
}
