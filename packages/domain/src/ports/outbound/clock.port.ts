/** Simulated time source shared by the orchestrator and scenario execution. */
export interface ClockPort {
  nowMs(): number;
  advance(ms: number): void;
  /** Resolves once the clock has reached `atMs`. */
  waitUntil(atMs: number): Promise<void>;
  /** Resolves every parked waiter now. Used when time will not move again. */
  releaseWaiters(): void;
}
