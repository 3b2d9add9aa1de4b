export interface ScanSchedulerOptions {
  intervalMs: number;
  initialDelayMs: number;
  runScan: () => Promise<unknown>;
}

/**
 * Periodic scan loop. A tick that arrives while the previous scan is still
 * running is skipped.
 */
export class ScanScheduler {
  private startTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;

  constructor(private readonly options: ScanSchedulerOptions) {}

  start(): void {
    if (this.running || this.options.intervalMs <= 0) {
      return;
    }

    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      void this.tick();
      this.intervalTimer = setInterval(() => {
        void this.tick();
      }, this.options.intervalMs);
    }, this.options.initialDelayMs);

    console.log(
      `[scheduler] started (interval ${this.options.intervalMs}ms, first run in ${this.options.initialDelayMs}ms)`,
    );
  }

  stop(): void {
    if (!this.running) return;

    if (this.startTimer !== null) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.intervalTimer !== null) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    console.log("[scheduler] stopped");
  }

  get running(): boolean {
    return this.startTimer !== null || this.intervalTimer !== null;
  }

  async tick(): Promise<void> {
    if (this.inFlight) {
      console.warn("[scheduler] previous scan still running, skipping tick");
      return;
    }

    this.inFlight = true;
    try {
      await this.options.runScan();
    } catch (error) {
      console.error("[scheduler] scan failed:", error);
    } finally {
      this.inFlight = false;
    }
  }
}
