import { z } from 'zod';
import { DEFAULT_SAFE_MODE_COMMANDS } from '@agri-telemetry/domain';
import { ConfigurationError } from '../../errors.js';

export const telemetryCoreConfigSchema = z.object({
  tickIntervalMs: z.number().int().positive().default(100),
  historyCapacity: z.number().int().positive().default(1000),
  maxCommandRate: z.number().positive().default(10),
  safeMode: z.boolean().default(true),
  safetyChecksEnabled: z.boolean().default(true),
  safeModeCommands: z.array(z.string().min(1)).default([...DEFAULT_SAFE_MODE_COMMANDS]),
  seed: z.number().int().optional(),
  /** When false the caller drives `tick()` itself. */
  autoTick: z.boolean().default(true),
});

export type TelemetryCoreConfig = z.infer<typeof telemetryCoreConfigSchema>;
export type TelemetryCoreConfigInput = z.input<typeof telemetryCoreConfigSchema>;

export function parseCoreConfig(input: TelemetryCoreConfigInput = {}): TelemetryCoreConfig {
  const parsed = telemetryCoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid telemetry core config: ${detail}`);
  }
  return parsed.data;
}
