/** Wall-clock implementation for live sessions, epoch milliseconds. */
export function wallClockNow(): number {
  return Date.now();
}
