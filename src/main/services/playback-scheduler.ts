import { SCHEDULER_INTERVAL_MS } from "../../shared/constants.js";
import { errorMessage } from "../../shared/errors.js";
import { createLogger, type Logger } from "../logger.js";

export interface AdvanceTarget {
  advanceIfFinished(): Promise<boolean>;
}

/**
 * Polls the controller on a fixed interval and advances the playlist when the
 * active track has finished. Runs until stop() is called; stop() resolves once
 * the loop has exited.
 */
export class PlaybackScheduler {
  private readonly target: AdvanceTarget;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private stopRequested = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  public constructor(target: AdvanceTarget, intervalMs = SCHEDULER_INTERVAL_MS) {
    this.target = target;
    this.intervalMs = intervalMs;
    this.log = createLogger({ component: "scheduler" });
  }

  public isRunning(): boolean {
    return this.loop !== null;
  }

  public start(): void {
    if (this.loop) {
      return;
    }

    this.stopRequested = false;
    this.loop = this.run();
  }

  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }

    this.stopRequested = true;
    this.wake?.();
    await loop;
    this.loop = null;
  }

  /**
   * One check-and-act pass. Failures are logged and left for the next tick.
   */
  public async tick(): Promise<boolean> {
    try {
      return await this.target.advanceIfFinished();
    } catch (error) {
      this.log.debug({ error: errorMessage(error) }, "Scheduler tick failed, retrying next tick");
      return false;
    }
  }

  private async run(): Promise<void> {
    this.log.debug({ intervalMs: this.intervalMs }, "Scheduler started");

    while (!this.stopRequested) {
      await this.tick();
      if (this.stopRequested) {
        break;
      }
      await this.sleep();
    }

    this.log.debug("Scheduler stopped");
  }

  private sleep(): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, this.intervalMs);

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
