// Telemetry channel metadata and live readings

export type ChannelName =
  | 'engine_rpm'
  | 'engine_temp'
  | 'engine_load'
  | 'vehicle_speed'
  | 'fuel_level'
  | 'hydraulic_pressure'
  | 'pto_speed'
  | 'coolant_temp'
  | 'transmission_temp'
  | 'latitude'
  | 'longitude';

/** `high`: larger values are worse (`>=`). `low`: smaller values are worse (`<=`). */
export type AlertDirection = 'high' | 'low';

export type MotionProfile =
  | {
      readonly kind: 'periodic';
      readonly base: number;
      readonly amplitude: number;
      readonly frequency: number; // rad per simulated second
      readonly sigma: number;
    }
  | {
      readonly kind: 'exponential';
      readonly driver: string; // channel the target is computed from
      readonly targetBase: number;
      readonly targetGain: number;
      readonly driverScale: number;
      readonly rate: number;
      readonly sigma: number;
    }
  | {
      readonly kind: 'decay';
      readonly maxDrainPerTick: number;
    }
  | {
      readonly kind: 'bursty';
      readonly activeProbability: number;
      readonly nominal: number;
      readonly sigma: number;
    }
  | {
      readonly kind: 'random-walk';
      readonly sigma: number;
    };

export type MotionProfileKind = MotionProfile['kind'];

/** Static description of one channel; the seed value is restored on every (re)connect. */
export interface ChannelDefinition {
  readonly name: string;
  readonly label: string;
  readonly unit: string;
  readonly seedValue: number;
  readonly minValue?: number;
  readonly maxValue?: number;
  readonly warningThreshold?: number;
  readonly criticalThreshold?: number;
  readonly alertDirection?: AlertDirection;
  readonly description: string;
  readonly profile: MotionProfile;
  /** Channels that must be updated earlier in the same tick. */
  readonly dependsOn?: readonly string[];
}

/** Live parameter model held by the simulator. */
export interface TelemetryParameter {
  readonly name: string;
  readonly label: string;
  readonly value: number;
  readonly unit: string;
  readonly minValue?: number;
  readonly maxValue?: number;
  readonly warningThreshold?: number;
  readonly criticalThreshold?: number;
  readonly alertDirection?: AlertDirection;
  readonly timestamp: Date;
  readonly description: string;
}

/** Consumer-facing view of a parameter. */
export interface ParameterReading {
  readonly value: number;
  readonly unit: string;
  readonly timestamp: Date;
}

export type TelemetrySnapshot = Readonly<Record<string, ParameterReading>>;

/** Values already computed in the current tick, keyed by channel name. */
export type ChannelReadings = ReadonlyMap<string, number>;
