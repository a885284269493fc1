/** Wall-clock stopwatch for one stage execution. */
export class StageTimer {
  private readonly startedAt = process.hrtime.bigint();

  elapsedMs(): number {
    return Number((process.hrtime.bigint() - this.startedAt) / 1_000_000n);
  }
}
