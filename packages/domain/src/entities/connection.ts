import type { TractorInfo } from './tractor-info.js';

export type ConnectionState = 'DISCONNECTED' | 'CONNECTED' | 'ERROR' | 'EMERGENCY_STOP';

export type ConnectionEvent =
  | 'connect'
  | 'disconnect'
  | 'emergency_stop'
  | 'clear_emergency_stop'
  | 'fault';

export type ConnectionType = 'SIMULATION' | 'CAN_BUS' | 'OBD_II';

export interface ConnectionDescriptor {
  readonly type: ConnectionType;
  readonly name?: string;
  readonly port?: string;
}

/** Entry returned by an interface scan. */
export interface AvailableInterface {
  readonly type: ConnectionType;
  readonly name: string;
  readonly description: string;
  readonly port: string;
  readonly available: boolean;
  readonly recommended: boolean;
}

export interface StatusChange {
  readonly previous: ConnectionState;
  readonly current: ConnectionState;
  readonly timestamp: Date;
  readonly fault?: string;
}

export interface ConnectionInfo {
  readonly connectionType?: ConnectionType;
  readonly status: ConnectionState;
  readonly connected: boolean;
  readonly lastCommunication?: Date;
  readonly emergencyStopActive: boolean;
  readonly safeMode: boolean;
  readonly tractorInfo: TractorInfo;
}
