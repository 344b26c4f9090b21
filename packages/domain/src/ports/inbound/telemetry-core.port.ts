import type { HistoryEntry } from '../../entities/history-entry.js';
import type { TelemetryAlert } from '../../entities/alert.js';
import type { TelemetryFrame } from '../../entities/telemetry-frame.js';
import type { TelemetrySnapshot } from '../../entities/telemetry-parameter.js';
import type { TractorInfo } from '../../entities/tractor-info.js';
import type { Result } from '../../entities/result.js';
import type {
  Command,
  CommandReceipt,
  SafetyViolation,
} from '../../entities/command.js';
import type {
  AvailableInterface,
  ConnectionDescriptor,
  ConnectionInfo,
  ConnectionState,
  StatusChange,
} from '../../entities/connection.js';

export type ConnectionFailureReason =
  | 'ALREADY_CONNECTED'
  | 'SESSION_FAULTED'
  | 'UNSUPPORTED_SOURCE'
  | 'COMMUNICATION_FAILED';

export interface ConnectionFailure {
  readonly reason: ConnectionFailureReason;
  readonly message: string;
}

export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export type DataListener = (frame: TelemetryFrame) => void;
export type StatusListener = (change: StatusChange) => void;
export type AlertListener = (alert: TelemetryAlert) => void;

/** Contract exposed to GUI, CLI and HTTP layers. */
export interface TelemetryCorePort {
  readonly state: ConnectionState;

  scanInterfaces(): AvailableInterface[];
  connect(descriptor: ConnectionDescriptor): Result<TractorInfo, ConnectionFailure>;
  disconnect(): void;

  sendCommand(command: Command): Result<CommandReceipt, SafetyViolation>;
  clearEmergencyStop(): boolean;
  setSafeMode(enabled: boolean): void;

  snapshot(): TelemetrySnapshot;
  history(channel: string, count?: number): HistoryEntry[];
  connectionInfo(): ConnectionInfo;

  subscribeData(listener: DataListener): Subscription;
  subscribeStatus(listener: StatusListener): Subscription;
  subscribeAlert(listener: AlertListener): Subscription;
}
