import type { ConnectionEvent, ConnectionState } from '@agri-telemetry/domain';

export type TelemetryErrorCode =
  | 'NOT_CONNECTED'
  | 'CONNECTION_ERROR'
  | 'SIMULATION_FAULT'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN_CHANNEL'
  | 'ILLEGAL_TRANSITION';

/** Base class for faults raised by the telemetry core. `status` is used by the HTTP layer. */
export class TelemetryError extends Error {
  constructor(
    message: string,
    readonly code: TelemetryErrorCode,
    readonly status: number = 500,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotConnectedError extends TelemetryError {
  constructor(message = 'not connected to a tractor') {
    super(message, 'NOT_CONNECTED', 409);
  }
}

export class SimulationFault extends TelemetryError {
  constructor(message: string, readonly origin?: unknown) {
    super(message, 'SIMULATION_FAULT', 500);
  }
}

export class ConfigurationError extends TelemetryError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
  }
}

export class UnknownChannelError extends TelemetryError {
  constructor(readonly channel: string) {
    super(`unknown channel: ${channel}`, 'UNKNOWN_CHANNEL', 404);
  }
}

export class IllegalTransitionError extends TelemetryError {
  constructor(
    readonly from: ConnectionState,
    readonly event: ConnectionEvent,
  ) {
    super(`cannot apply ${event} in state ${from}`, 'ILLEGAL_TRANSITION', 409);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
