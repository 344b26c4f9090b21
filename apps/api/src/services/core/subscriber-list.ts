import { v4 as uuidv4 } from 'uuid';
import type { LoggerPort, Subscription } from '@agri-telemetry/domain';

export interface EmitOptions<T> {
  /** Checked before each listener; delivery stops once it returns false. */
  readonly active?: () => boolean;
  /** Gives each listener its own copy of the payload. */
  readonly copy?: (payload: T) => T;
}

/**
 * Observer list with per-listener isolation: a listener that throws is
 * logged and skipped, the rest still run.
 */
export class SubscriberList<T> {
  private readonly listeners = new Map<string, (payload: T) => void>();

  constructor(
    private readonly kind: string,
    private readonly logger: LoggerPort,
  ) {}

  add(listener: (payload: T) => void): Subscription {
    const id = uuidv4();
    this.listeners.set(id, listener);
    return {
      id,
      unsubscribe: () => {
        this.listeners.delete(id);
      },
    };
  }

  emit(payload: T, options: EmitOptions<T> = {}): void {
    const { active, copy } = options;
    // snapshot so listeners may unsubscribe while being notified
    for (const [id, listener] of [...this.listeners]) {
      if (active && !active()) return;
      try {
        listener(copy ? copy(payload) : payload);
      } catch (err) {
        this.logger.error(`${this.kind} subscriber ${id} failed`, err);
      }
    }
  }
}
