// ─── Clock & randomness ───────────────────────────────────────────────────────
export * from './clock/deterministic-clock.js';

// ─── Simulated protocol adapters ──────────────────────────────────────────────
export * from './protocols/virtual-bus.adapter.js';
export * from './protocols/charge-point-control.adapter.js';
export * from './protocols/vehicle-session.adapter.js';

// ─── Logging ──────────────────────────────────────────────────────────────────
export * from './logging/console-logger.js';
