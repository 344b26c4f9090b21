import {
  DEFAULT_SAFE_MODE_COMMANDS,
  EMERGENCY_STOP_COMMAND,
} from '@agri-telemetry/domain';
import type {
  Command,
  ConnectionState,
  LoggerPort,
  SafetyRejectionReason,
  SafetyViolation,
} from '@agri-telemetry/domain';
import { RateLimiter } from './rate-limiter.js';

export interface ChannelBounds {
  readonly minValue?: number;
  readonly maxValue?: number;
}

/** Commands whose value must lie within a channel's physical range. */
export const DEFAULT_RANGE_RULES: Readonly<Record<string, string>> = {
  set_engine_rpm: 'engine_rpm',
  set_vehicle_speed: 'vehicle_speed',
  set_hydraulic_pressure: 'hydraulic_pressure',
  set_pto_speed: 'pto_speed',
};

export interface SafetyGateOptions {
  readonly logger: LoggerPort;
  readonly maxCommandRate: number;
  readonly safeMode?: boolean;
  readonly safetyChecksEnabled?: boolean;
  readonly safeModeCommands?: readonly string[];
  readonly rangeRules?: Readonly<Record<string, string>>;
  readonly clock?: () => number;
}

export interface GateContext {
  readonly state: ConnectionState;
  bounds(channel: string): ChannelBounds | undefined;
}

/**
 * Layered command validation, short-circuiting on the first failure:
 * connection, emergency latch, safe-mode allow-list, value range, rate.
 *
 * Expected rejections are returned as values, never thrown. The latch and
 * the limiter are only touched from synchronous methods, so commands and
 * ticks on the event loop observe them consistently.
 */
export class SafetyGate {
  private readonly logger: LoggerPort;
  private readonly limiter: RateLimiter;
  private readonly allowList: ReadonlySet<string>;
  private readonly rangeRules: Readonly<Record<string, string>>;
  private readonly safetyChecksEnabled: boolean;
  private readonly clock: () => number;
  private safeModeEnabled: boolean;
  private emergencyLatched = false;

  constructor(options: SafetyGateOptions) {
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.limiter = new RateLimiter(options.maxCommandRate, this.clock);
    this.allowList = new Set(options.safeModeCommands ?? DEFAULT_SAFE_MODE_COMMANDS);
    this.rangeRules = options.rangeRules ?? DEFAULT_RANGE_RULES;
    this.safetyChecksEnabled = options.safetyChecksEnabled ?? true;
    this.safeModeEnabled = options.safeMode ?? true;
  }

  get emergencyActive(): boolean {
    return this.emergencyLatched;
  }

  get safeMode(): boolean {
    return this.safeModeEnabled;
  }

  setSafeMode(enabled: boolean): void {
    this.safeModeEnabled = enabled;
  }

  /**
   * Validates a command and, when it passes, records it against the rate
   * limit. An accepted emergency stop sets the latch.
   */
  admit(command: Command, context: GateContext, nowMs: number = this.clock()): SafetyViolation | null {
    const violation = this.check(command, context, nowMs);
    if (violation) {
      this.logger.warn(`rejected ${command.name}: ${violation.message}`);
      return violation;
    }

    this.limiter.mark(nowMs);
    if (command.name === EMERGENCY_STOP_COMMAND) this.emergencyLatched = true;
    return null;
  }

  /** Runs every check without recording anything. */
  check(command: Command, context: GateContext, nowMs: number = this.clock()): SafetyViolation | null {
    if (command.name === EMERGENCY_STOP_COMMAND) {
      // allowed in any open session, ahead of every other rule
      return context.state === 'DISCONNECTED'
        ? violation('NOT_CONNECTED', command, 'not connected to a tractor')
        : null;
    }

    if (context.state === 'DISCONNECTED' || context.state === 'ERROR') {
      return violation(
        'NOT_CONNECTED',
        command,
        context.state === 'ERROR' ? 'session faulted; disconnect and reconnect' : 'not connected to a tractor',
      );
    }

    if (this.emergencyLatched) {
      return violation('EMERGENCY_ACTIVE', command, 'emergency stop active; clear it before sending commands');
    }

    if (this.safetyChecksEnabled) {
      if (this.safeModeEnabled && !this.allowList.has(command.name)) {
        return violation('UNSAFE_MODE', command, `${command.name} is not allowed in safe mode`);
      }

      const outOfRange = this.rangeProblem(command, context);
      if (outOfRange) return violation('OUT_OF_RANGE', command, outOfRange);
    }

    const waitMs = this.limiter.remainingMs(nowMs);
    if (waitMs > 0) {
      const retryAfterMs = Math.ceil(waitMs);
      return { ...violation('RATE_LIMITED', command, `rate limited: wait ${retryAfterMs}ms`), retryAfterMs };
    }

    return null;
  }

  clearEmergency(): boolean {
    const was = this.emergencyLatched;
    this.emergencyLatched = false;
    return was;
  }

  /** Forgets the latch and the last command time; used when a session ends. */
  reset(): void {
    this.emergencyLatched = false;
    this.limiter.reset();
  }

  private rangeProblem(command: Command, context: GateContext): string | null {
    const channel = this.rangeRules[command.name];
    if (channel === undefined || command.value === undefined) return null;

    const { value } = command;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return `${command.name} needs a numeric value`;
    }

    const bounds = context.bounds(channel);
    if (!bounds) return null;
    if ((bounds.minValue !== undefined && value < bounds.minValue)
      || (bounds.maxValue !== undefined && value > bounds.maxValue)) {
      return `${command.name} value ${value} outside [${bounds.minValue ?? '-∞'}, ${bounds.maxValue ?? '∞'}]`;
    }
    return null;
  }
}

function violation(reason: SafetyRejectionReason, command: Command, message: string): SafetyViolation {
  return { reason, command: command.name, message };
}
