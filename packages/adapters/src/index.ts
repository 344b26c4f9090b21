// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { SeededRng, createRng } from './clock/seeded-rng.js';
export { wallClockNow } from './clock/wall-clock.js';

// ─── Simulation ───────────────────────────────────────────────────────────────
export { SignalGenerator, clamp } from './simulation/signal-generator.js';
export { TRACTOR_CHANNELS } from './simulation/tractor-channels.js';
export { SimulationDataSource } from './simulation/simulation-data-source.js';
export type { SimulationDataSourceOptions } from './simulation/simulation-data-source.js';

// ─── Protocol backends ────────────────────────────────────────────────────────
export { ProtocolDataSource } from './protocol/protocol-data-source.js';
export { createDataSourceFactory } from './registry/data-source-registry.js';
export type { DataSourceDeps } from './registry/data-source-registry.js';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { ConsoleLogger, parseLogLevel } from './logging/console-logger.js';
export type { LogSink } from './logging/console-logger.js';
