import type { TelemetryFrame } from '../../entities/telemetry-frame.js';
import type { TelemetryAlert } from '../../entities/alert.js';
import type { StatusChange } from '../../entities/connection.js';

export interface StreamPublisherPort {
  publishTelemetry(frame: TelemetryFrame): Promise<void>;
  publishAlert(alert: TelemetryAlert): Promise<void>;
  publishStatus(change: StatusChange): Promise<void>;
}
