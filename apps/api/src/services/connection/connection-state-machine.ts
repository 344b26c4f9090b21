import type {
  ConnectionEvent,
  ConnectionState,
  StatusChange,
} from '@agri-telemetry/domain';
import { IllegalTransitionError } from '../../errors.js';

const TRANSITIONS: Record<ConnectionState, Partial<Record<ConnectionEvent, ConnectionState>>> = {
  DISCONNECTED: { connect: 'CONNECTED', fault: 'ERROR' },
  CONNECTED: { disconnect: 'DISCONNECTED', emergency_stop: 'EMERGENCY_STOP', fault: 'ERROR' },
  // disconnecting is itself a safe reset
  EMERGENCY_STOP: { clear_emergency_stop: 'CONNECTED', disconnect: 'DISCONNECTED', fault: 'ERROR' },
  ERROR: { disconnect: 'DISCONNECTED', fault: 'ERROR' },
};

export type TransitionListener = (change: StatusChange) => void;

/**
 * DISCONNECTED → CONNECTED → EMERGENCY_STOP, with ERROR reachable from
 * anywhere and left only through `disconnect`. `apply` is the only way
 * to change the state.
 */
export class ConnectionStateMachine {
  private current: ConnectionState = 'DISCONNECTED';

  constructor(
    private readonly onTransition: TransitionListener = () => undefined,
    private readonly clock: () => number = Date.now,
  ) {}

  get state(): ConnectionState {
    return this.current;
  }

  /** True while a session is open, including EMERGENCY_STOP and ERROR. */
  get sessionOpen(): boolean {
    return this.current !== 'DISCONNECTED';
  }

  can(event: ConnectionEvent): boolean {
    return TRANSITIONS[this.current][event] !== undefined;
  }

  /** Applies an event; throws on an illegal one. Self-transitions emit nothing. */
  apply(event: ConnectionEvent, fault?: string): StatusChange | null {
    const next = TRANSITIONS[this.current][event];
    if (next === undefined) throw new IllegalTransitionError(this.current, event);
    if (next === this.current) return null;

    const change: StatusChange = {
      previous: this.current,
      current: next,
      timestamp: new Date(this.clock()),
      ...(fault !== undefined ? { fault } : {}),
    };
    this.current = next;
    this.onTransition(change);
    return change;
  }
}
