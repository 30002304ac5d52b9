/**
 * Shared, advisory view of the remaining request quota per limit class.
 *
 * Every worker writes here after each response and reads before each
 * request. Each update swaps in a whole frozen snapshot, so a reader always
 * sees a consistent (remaining, reset) pair. Concurrent writers race and the
 * last one wins; the 403 status stays the authoritative exhaustion signal.
 */

import { LimitClass, RateBudgetSnapshot } from './types';

export class RateBudget {
  private snapshots: Map<LimitClass, Readonly<RateBudgetSnapshot>> = new Map();

  record(limitClass: LimitClass, remaining: number, resetAt: number | null, observedAt: number = Date.now()): void {
    this.snapshots.set(limitClass, Object.freeze({ remaining, resetAt, observedAt }));
  }

  get(limitClass: LimitClass): Readonly<RateBudgetSnapshot> | undefined {
    return this.snapshots.get(limitClass);
  }

  /**
   * True when the last observation says the quota is spent and its reset
   * time has not passed yet.
   */
  isDepleted(limitClass: LimitClass, nowMs: number): boolean {
    const snapshot = this.snapshots.get(limitClass);
    if (!snapshot || snapshot.remaining > 0 || snapshot.resetAt === null) {
      return false;
    }
    return snapshot.resetAt * 1000 > nowMs;
  }
}
