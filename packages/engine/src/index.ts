// ─── Configuration ────────────────────────────────────────────────────────────
export * from './config/session-config.js';

// ─── Physics ──────────────────────────────────────────────────────────────────
export * from './thermal/thermal-model.js';
export * from './metering/energy-audit.js';

// ─── Anomalies & scenarios ────────────────────────────────────────────────────
export * from './anomalies/anomaly-injector.js';
export { ANOMALY_TRANSFORMS } from './anomalies/transforms.js';
export type { AnomalyTransform, TransformContext, TransformResult } from './anomalies/transforms.js';
export * from './scenarios/attack-scenario.js';
export * from './scenarios/catalog.js';

// ─── Session ──────────────────────────────────────────────────────────────────
export * from './session/current-limiter.js';
export * from './session/statistics-recorder.js';
export * from './session/statistics-report.js';
export * from './session/session-orchestrator.js';
export * from './session/session-factory.js';
