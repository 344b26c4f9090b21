// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-parameter.js';
export * from './entities/history-entry.js';
export * from './entities/alert.js';
export * from './entities/command.js';
export * from './entities/connection.js';
export * from './entities/tractor-info.js';
export * from './entities/telemetry-frame.js';
export * from './entities/result.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-core.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/data-source.port.js';
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/logger.port.js';
export * from './ports/outbound/stream-publisher.port.js';
