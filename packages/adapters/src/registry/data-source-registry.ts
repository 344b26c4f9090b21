import type {
  ConnectionDescriptor,
  DataSourceFactory,
  DataSourcePort,
  LoggerPort,
  RandomSource,
} from '@agri-telemetry/domain';
import { SimulationDataSource } from '../simulation/simulation-data-source.js';
import { ProtocolDataSource } from '../protocol/protocol-data-source.js';

export interface DataSourceDeps {
  readonly rng: RandomSource;
  readonly logger: LoggerPort;
}

/** Builds the backend for a connection descriptor, or null for unknown types. */
export function createDataSourceFactory(deps: DataSourceDeps): DataSourceFactory {
  return (descriptor: ConnectionDescriptor): DataSourcePort | null => {
    switch (descriptor.type) {
      case 'SIMULATION':
        return new SimulationDataSource({ rng: deps.rng, logger: deps.logger.child('simulation') });
      case 'CAN_BUS':
        return new ProtocolDataSource('CAN_BUS', { rng: deps.rng, logger: deps.logger.child('can') });
      case 'OBD_II':
        return new ProtocolDataSource('OBD_II', { rng: deps.rng, logger: deps.logger.child('obd') });
      default:
        return null;
    }
  };
}
