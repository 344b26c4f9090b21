import type { TelemetrySnapshot } from './telemetry-parameter.js';
import type { TelemetryAlert } from './alert.js';

/** Output of one simulator tick. */
export interface TelemetryFrame {
  readonly tick: number;
  readonly timestamp: Date;
  readonly snapshot: TelemetrySnapshot;
  readonly alerts: readonly TelemetryAlert[];
}
