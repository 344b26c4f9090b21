import { z } from 'zod';
import { parseLogLevel } from '@agri-telemetry/adapters';
import type { LogLevel } from '@agri-telemetry/domain';
import { parseCoreConfig } from '../services/core/core-config.js';
import type { TelemetryCoreConfig } from '../services/core/core-config.js';
import { ConfigurationError } from '../errors.js';

/**
 * Environment variables (see .env.example):
 *   PORT                   HTTP port (default: 3001)
 *   CORS_ORIGIN            allowed origin (default: *)
 *   LOG_LEVEL              debug | info | warn | error (default: info)
 *   TICK_INTERVAL_MS       tick period (default: 100)
 *   HISTORY_CAPACITY       samples kept per channel (default: 1000)
 *   MAX_COMMAND_RATE       commands per second (default: 10)
 *   SAFE_MODE              restrict commands to the allow-list (default: true)
 *   SAFETY_CHECKS_ENABLED  allow-list and range checks (default: true)
 *   SIM_SEED               integer seed for reproducible noise
 */

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((raw) => raw === 'true' || raw === '1' || raw === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z.string().optional(),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  HISTORY_CAPACITY: z.coerce.number().int().positive().optional(),
  MAX_COMMAND_RATE: z.coerce.number().positive().optional(),
  SAFE_MODE: flag.optional(),
  SAFETY_CHECKS_ENABLED: flag.optional(),
  SIM_SEED: z.coerce.number().int().optional(),
});

export interface AppConfig {
  readonly port: number;
  readonly corsOrigin: string;
  readonly logLevel: LogLevel;
  readonly core: TelemetryCoreConfig;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`invalid environment: ${detail}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    logLevel: parseLogLevel(vars.LOG_LEVEL),
    core: parseCoreConfig({
      tickIntervalMs: vars.TICK_INTERVAL_MS,
      historyCapacity: vars.HISTORY_CAPACITY,
      maxCommandRate: vars.MAX_COMMAND_RATE,
      safeMode: vars.SAFE_MODE,
      safetyChecksEnabled: vars.SAFETY_CHECKS_ENABLED,
      seed: vars.SIM_SEED,
    }),
  };
}
