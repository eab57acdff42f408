/**
 * Tracks per-question weights for one job and derives overall progress.
 *
 * Overall progress is floor(Σ weight / N). Weights only ever rise, so the
 * overall value never falls. Values published while the job is still running
 * are capped at 99; only finalization reports 100.
 */
export class ProgressAggregator {
  private readonly weights: number[];
  private sum = 0;

  constructor(readonly total: number) {
    this.weights = new Array<number>(total).fill(0);
  }

  update(index: number, weight: number): number {
    const current = this.weights[index];
    if (current === undefined) throw new RangeError(`Question index ${index} out of range 0..${this.total - 1}`);
    const next = Math.max(current, Math.min(100, weight));
    this.sum += next - current;
    this.weights[index] = next;
    return this.overall();
  }

  overall(): number {
    return this.total === 0 ? 0 : Math.floor(this.sum / this.total);
  }

  /** Overall progress as published before the Result exists. */
  inFlight(): number {
    return Math.min(99, this.overall());
  }
}
