/**
 * Coalesces bursts of edits into one save. Every `schedule()` restarts the
 * same timer; there is never more than one save pending, and saves run one
 * at a time in the order they were started.
 */
export class SaveScheduler {
  private readonly delayMs: number;
  private readonly save: () => Promise<void>;
  private readonly onError: (error: unknown) => void;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Settles when the last started save does; never rejects. */
  private inFlight: Promise<void> | null = null;

  constructor(
    delayMs: number,
    save: () => Promise<void>,
    onError: (error: unknown) => void,
  ) {
    this.delayMs = delayMs;
    this.save = save;
    this.onError = onError;
  }

  get pending(): boolean {
    return this.timer !== null;
  }

  schedule() {
    if (this.timer !== null) {
      clearTimeout(this.timer);
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.runSave().catch(this.onError);
    }, this.delayMs);
  }

  private runSave(): Promise<void> {
    const next = this.inFlight
      ? this.inFlight.then(() => this.save())
      : this.save();
    // Failures reach whoever started the save; the queue only orders them.
    const settle = () => {
      if (this.inFlight === settled) {
        this.inFlight = null;
      }
    };
    const settled = next.then(settle, settle);
    this.inFlight = settled;
    return next;
  }

  /**
   * Runs the pending save now, after any save already in progress. Rejects
   * when that save fails.
   */
  async flush(): Promise<void> {
    if (this.timer === null) {
      if (this.inFlight) {
        await this.inFlight;
      }
      return;
    }

    clearTimeout(this.timer);
    this.timer = null;
    await this.runSave();
  }

  cancel() {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
