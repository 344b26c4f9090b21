export type AlertSeverity = 'WARNING' | 'CRITICAL';

export interface TelemetryAlert {
  readonly id: string;
  readonly channel: string;
  readonly severity: AlertSeverity;
  readonly message: string;
  readonly value: number;
  readonly threshold: number;
  readonly unit: string;
  readonly timestamp: Date;
}
