import { setTimeout as sleep } from "node:timers/promises";

export type TickOutcome = "continue" | "stop";

export interface LoopCallbacks {
  update: (tick: number) => TickOutcome;
  render: (tick: number) => void;
}

export interface TickPacer {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export const realtimePacer: TickPacer = {
  now: () => performance.now(),
  sleep: async (ms) => {
    await sleep(ms);
  }
};

export class GameLoop {
  private readonly stepMs: number;
  private readonly callbacks: LoopCallbacks;
  private readonly pacer: TickPacer;
  private running = false;
  private tick = 0;

  constructor(callbacks: LoopCallbacks, tickRate = 20, pacer: TickPacer = realtimePacer) {
    if (!Number.isFinite(tickRate) || tickRate <= 0) {
      throw new RangeError(`tick rate must be a positive number, got ${tickRate}`);
    }
    this.callbacks = callbacks;
    this.stepMs = 1000 / tickRate;
    this.pacer = pacer;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get ticks(): number {
    return this.tick;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    let nextTickAtMs = this.pacer.now();

    while (this.running) {
      this.tick += 1;
      if (this.callbacks.update(this.tick) === "stop") {
        this.running = false;
        break;
      }
      this.callbacks.render(this.tick);

      nextTickAtMs += this.stepMs;
      const nowMs = this.pacer.now();
      if (nextTickAtMs < nowMs) {
        nextTickAtMs = nowMs;
      }
      await this.pacer.sleep(nextTickAtMs - nowMs);
    }
  }

  stop(): void {
    this.running = false;
  }
}
