/**
 * Tracks per-pass quality deltas and raises early-stop signals.
 *
 * Plateau: the two most recent deltas are both below the convergence
 * threshold. Diminishing returns: the latest delta is less than half the
 * one before it. Both flags are sticky once raised. The tracker only ever
 * shortens a loop; it never asks for more passes.
 *
 * @module enhancement/convergence-tracker
 */

import type { ConvergenceState } from '../types/quality.js';

/** Latest delta below this fraction of the previous one counts as diminishing. */
export const DIMINISHING_RATIO = 0.5;

/** Extrapolation gives up beyond this many passes ahead. */
const MAX_PREDICTION_HORIZON = 50;

export class ConvergenceTracker {
  private readonly deltas: number[] = [];
  private plateauDetected = false;
  private diminishingReturnsDetected = false;
  private convergencePass: number | null = null;

  constructor(private readonly threshold: number) {
    if (!(threshold > 0)) {
      throw new RangeError(`Convergence threshold must be positive, got ${threshold}`);
    }
  }

  /**
   * Append the delta of the pass just executed and re-evaluate the flags.
   */
  record(delta: number): ConvergenceState {
    this.deltas.push(delta);
    const pass = this.deltas.length;
    const latest = this.deltas[pass - 1];
    const previous = this.deltas[pass - 2];

    if (latest !== undefined && previous !== undefined) {
      if (latest < this.threshold && previous < this.threshold) {
        this.plateauDetected = true;
      }
      if (latest < previous * DIMINISHING_RATIO) {
        this.diminishingReturnsDetected = true;
      }
    }

    if (this.convergencePass === null && this.shouldStop()) {
      this.convergencePass = pass;
    }
    return this.state();
  }

  shouldStop(): boolean {
    return this.plateauDetected || this.diminishingReturnsDetected;
  }

  state(): ConvergenceState {
    return {
      deltas: [...this.deltas],
      plateauDetected: this.plateauDetected,
      diminishingReturnsDetected: this.diminishingReturnsDetected,
      convergencePass: this.convergencePass,
      predictedConvergencePass: this.predictConvergencePass(),
    };
  }

  /**
   * Extrapolate the decay of the last two deltas to the first pass whose
   * delta falls under the threshold. Null unless deltas are positive and
   * shrinking.
   */
  private predictConvergencePass(): number | null {
    const pass = this.deltas.length;
    const latest = this.deltas[pass - 1];
    const previous = this.deltas[pass - 2];
    if (latest === undefined || previous === undefined) return null;
    if (latest < this.threshold) return pass;
    if (!(latest > 0 && previous > latest)) return null;

    const ratio = latest / previous;
    let projected = latest;
    for (let ahead = 1; ahead <= MAX_PREDICTION_HORIZON; ahead++) {
      projected *= ratio;
      if (projected < this.threshold) return pass + ahead;
    }
    return null;
  }
}
