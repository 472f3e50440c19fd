import { mean } from 'simple-statistics';

export interface DriftCheck {
  drifted: boolean;
  rmse: number;
  /** Mean RMSE of the preceding fits, null until one exists. */
  baseline: number | null;
}

/**
 * Flags a fit whose held-out RMSE exceeds the rolling mean of the previous
 * `window` fits by more than `tolerance` (relative).
 */
export class DriftDetector {
  private readonly history: number[] = [];

  constructor(private readonly window: number, private readonly tolerance: number) {}

  record(rmse: number): DriftCheck {
    const baseline = this.history.length ? mean(this.history) : null;
    const drifted = baseline !== null && rmse > baseline * (1 + this.tolerance);
    this.history.push(rmse);
    if (this.history.length > this.window) {
      this.history.shift();
    }
    return { drifted, rmse, baseline };
  }
}
