// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/session-state.js';
export * from './entities/thermal-state.js';
export * from './entities/anomaly.js';
export * from './entities/protocol-unit.js';
export * from './entities/attack-scenario.js';
export * from './entities/session-statistics.js';
export * from './entities/session-summary.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/charging-session.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/bus-adapter.port.js';
export * from './ports/outbound/control-adapter.port.js';
export * from './ports/outbound/session-adapter.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/logger.port.js';
export * from './ports/outbound/session-event-publisher.port.js';
