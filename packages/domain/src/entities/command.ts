export type CommandValue = number | string | boolean;

export interface Command {
  readonly name: string;
  readonly value?: CommandValue;
}

/** Commands handled by the core itself rather than the data source. */
export const EMERGENCY_STOP_COMMAND = 'emergency_stop';
export const CLEAR_EMERGENCY_STOP_COMMAND = 'clear_emergency_stop';

export const DEFAULT_SAFE_MODE_COMMANDS: readonly string[] = [
  'get_status',
  'get_data',
  'set_lights',
  'horn',
  'start_engine',
  'stop_engine',
];

export type SafetyRejectionReason =
  | 'NOT_CONNECTED'
  | 'EMERGENCY_ACTIVE'
  | 'UNSAFE_MODE'
  | 'OUT_OF_RANGE'
  | 'RATE_LIMITED';

export interface SafetyViolation {
  readonly reason: SafetyRejectionReason;
  readonly command: string;
  readonly message: string;
  /** Only set for RATE_LIMITED. */
  readonly retryAfterMs?: number;
}

export interface CommandReceipt {
  readonly command: Command;
  readonly acceptedAt: Date;
}
