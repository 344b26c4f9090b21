import type {
  Command,
  CommandReceipt,
  Result,
  SafetyViolation,
  TelemetryCorePort,
} from '@agri-telemetry/domain';

export interface WhenReadyOptions {
  /** Total time the caller is willing to wait for the rate limit. */
  readonly maxWaitMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_WAIT_MS = 1_000;

function sleepFor(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Convenience wrapper above the core: retries a command for as long as it
 * is only rate limited, within `maxWaitMs`. Every other rejection is
 * returned immediately.
 */
export async function sendCommandWhenReady(
  core: Pick<TelemetryCorePort, 'sendCommand'>,
  command: Command,
  options: WhenReadyOptions = {},
): Promise<Result<CommandReceipt, SafetyViolation>> {
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
  const sleep = options.sleep ?? sleepFor;
  let waitedMs = 0;

  for (;;) {
    const result = core.sendCommand(command);
    if (result.ok || result.error.reason !== 'RATE_LIMITED') return result;

    const delayMs = Math.max(1, result.error.retryAfterMs ?? 1);
    if (waitedMs + delayMs > maxWaitMs) return result;
    await sleep(delayMs);
    waitedMs += delayMs;
  }
}
