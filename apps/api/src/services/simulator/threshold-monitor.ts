import { v4 as uuidv4 } from 'uuid';
import type {
  AlertDirection,
  AlertSeverity,
  ChannelDefinition,
  TelemetryAlert,
} from '@agri-telemetry/domain';

type ThresholdSpec = Pick<
  ChannelDefinition,
  'name' | 'label' | 'unit' | 'warningThreshold' | 'criticalThreshold' | 'alertDirection'
>;

/** 0 = clear, 1 = warning, 2 = critical */
type Level = 0 | 1 | 2;

const SEVERITY: Record<1 | 2, AlertSeverity> = { 1: 'WARNING', 2: 'CRITICAL' };

export function directionOf(spec: ThresholdSpec): AlertDirection {
  if (spec.alertDirection) return spec.alertDirection;
  const { warningThreshold: warning, criticalThreshold: critical } = spec;
  if (warning !== undefined && critical !== undefined && warning > critical) return 'low';
  return 'high';
}

/**
 * Edge-triggered threshold evaluation.
 *
 * Each channel latches the highest severity it has reported. A reading only
 * produces an alert when it is above the latched level, and the latch is
 * released once the value falls back past the warning threshold (or the
 * only threshold the channel has). A channel sitting above its critical
 * threshold therefore alerts once, not on every tick.
 */
export class ThresholdMonitor {
  private readonly latched = new Map<string, Level>();

  constructor(private readonly newId: () => string = uuidv4) {}

  evaluate(spec: ThresholdSpec, value: number, timestamp: Date): TelemetryAlert | null {
    const level = this.levelOf(spec, value);
    const held = this.latched.get(spec.name) ?? 0;

    if (level === 0) {
      if (held !== 0) this.latched.delete(spec.name);
      return null;
    }
    if (level <= held) return null;

    this.latched.set(spec.name, level);
    const severity = SEVERITY[level];
    const threshold = level === 2 ? spec.criticalThreshold : spec.warningThreshold;

    return {
      id: this.newId(),
      channel: spec.name,
      severity,
      message: `${severity === 'CRITICAL' ? 'CRITICAL' : 'Warning'}: ${spec.label} is ${value.toFixed(1)} ${spec.unit}`,
      value,
      threshold: threshold ?? value,
      unit: spec.unit,
      timestamp: new Date(timestamp.getTime()),
    };
  }

  reset(): void {
    this.latched.clear();
  }

  private levelOf(spec: ThresholdSpec, value: number): Level {
    const crossed = directionOf(spec) === 'high'
      ? (threshold: number) => value >= threshold
      : (threshold: number) => value <= threshold;

    if (spec.criticalThreshold !== undefined && crossed(spec.criticalThreshold)) return 2;
    if (spec.warningThreshold !== undefined && crossed(spec.warningThreshold)) return 1;
    return 0;
  }
}
