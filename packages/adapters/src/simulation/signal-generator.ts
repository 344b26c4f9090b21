import type {
  ChannelDefinition,
  ChannelReadings,
  MotionProfile,
  RandomSource,
} from '@agri-telemetry/domain';

const NO_READINGS: ChannelReadings = new Map();

export function clamp(value: number, min?: number, max?: number): number {
  let out = value;
  if (min !== undefined) out = Math.max(min, out);
  if (max !== undefined) out = Math.min(max, out);
  return out;
}

/**
 * Produces the next value of a channel from its motion profile.
 * Pure apart from the injected random source.
 */
export class SignalGenerator {
  constructor(private readonly rng: RandomSource) {}

  next(
    previous: number,
    t: number,
    channel: ChannelDefinition,
    readings: ChannelReadings = NO_READINGS,
  ): number {
    const raw = this.raw(previous, t, channel.profile, readings, channel.name);
    return clamp(raw, channel.minValue, channel.maxValue);
  }

  private raw(
    previous: number,
    t: number,
    profile: MotionProfile,
    readings: ChannelReadings,
    channel: string,
  ): number {
    switch (profile.kind) {
      case 'periodic':
        return (
          profile.base +
          profile.amplitude * Math.sin(t * profile.frequency) +
          this.rng.gaussian(0, profile.sigma)
        );

      case 'exponential': {
        const driver = readings.get(profile.driver);
        if (driver === undefined) {
          throw new Error(
            `channel ${channel} needs ${profile.driver} to be sampled earlier in the tick`,
          );
        }
        const target = profile.targetBase + (driver / profile.driverScale) * profile.targetGain;
        return previous + (target - previous) * profile.rate + this.rng.gaussian(0, profile.sigma);
      }

      case 'decay':
        // never refills; only a reset restores the seed value
        return Math.max(0, previous - this.rng.nextFloat(0, profile.maxDrainPerTick));

      case 'bursty':
        if (this.rng.next() < profile.activeProbability) {
          return profile.nominal + this.rng.gaussian(0, profile.sigma);
        }
        return 0;

      case 'random-walk':
        return previous + this.rng.gaussian(0, profile.sigma);
    }
  }
}
