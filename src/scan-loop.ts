export type ScanCycle = (isCancelled: () => boolean) => Promise<void>;

/**
 * Drives one scan cycle per interval. The next cycle is scheduled only after
 * the previous one settles, so cycles never overlap.
 */
export class ScanLoop {
  private timer?: NodeJS.Timeout;
  private generation = 0;
  private running = false;
  private ticks = 0;

  constructor(
    private intervalMs: number,
    private cycle: ScanCycle,
    private onError?: (err: unknown) => void,
  ) {}

  get isRunning() {
    return this.running;
  }

  get tickCount() {
    return this.ticks;
  }

  start() {
    this.stop();
    this.running = true;
    const gen = this.generation;
    this.timer = setTimeout(() => void this.tick(gen), this.intervalMs);
  }

  stop() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.running = false;
    this.generation += 1;
  }

  private async tick(gen: number) {
    this.timer = undefined;
    this.ticks += 1;
    try {
      await this.cycle(() => gen !== this.generation);
    } catch (err) {
      this.onError?.(err);
    }
    if (gen !== this.generation) return;
    this.timer = setTimeout(() => void this.tick(gen), this.intervalMs);
  }
}
