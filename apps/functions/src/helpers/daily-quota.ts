import type { DailyCounters, Decision } from '@govbid/core';

/**
 * Single owner of the run-level counters. Workers never read-then-write the
 * counters themselves: `decide` hands the gate a snapshot and applies the
 * reservation in the same synchronous step, so two workers cannot both see
 * the last free slot.
 */
export class DailyQuota {
  private counters: DailyCounters;
  private reserved = 0;

  constructor(initial: DailyCounters) {
    this.counters = { ...initial };
  }

  snapshot(): Readonly<DailyCounters> {
    return { ...this.counters };
  }

  /** Runs the gate against the current counters and reserves a slot on `submit`. Must stay synchronous. */
  decide(gate: (counters: Readonly<DailyCounters>) => Decision): Decision {
    const decision = gate(this.snapshot());
    this.counters.opportunitiesToday += 1;
    if (decision.kind === 'submit') {
      this.counters.submissionsToday += 1;
      this.reserved += 1;
    }
    return decision;
  }

  /** The reserved submission went through. */
  confirm(): void {
    if (this.reserved > 0) this.reserved -= 1;
  }

  /** The reserved submission did not happen; give the slot back. */
  release(): void {
    if (this.reserved === 0) return;
    this.reserved -= 1;
    this.counters.submissionsToday -= 1;
  }
}
