// ═══════════════════════════════════════════════════════════════════════════════
// CLOCK — Injectable Time Source
// Provisioning Resilience Engine — Core Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Milliseconds since the epoch. Defaults to Date.now; tests pass a fake.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Manually advanced clock for deterministic tests and simulations.
 */
export class ManualClock {
  constructor(private current: number = 0) {}

  readonly now: Clock = () => this.current;

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
