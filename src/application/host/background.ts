/**
 * spanline - Background Services
 *
 * Long-running loops owned by the pipeline host (the collector's flush loop
 * is one).
 */

import { ILogger } from './logger';

/**
 * Background service interface
 * Services that run in the background alongside the application
 */
export interface IBackgroundService {
  /** Service name */
  readonly name: string;

  /** Start the service */
  start(): Promise<void>;

  /** Stop the service and wait for its loop to exit */
  stop(): Promise<void>;

  /** Check if service is running */
  isRunning(): boolean;
}

/**
 * Abstract base class for background services
 *
 * @remarks
 * The loop runs in `executeAsync` until its abort signal fires. Waits made
 * through {@link BackgroundServiceBase.delay} end early on abort or on
 * {@link BackgroundServiceBase.wake}, so `stop()` never waits out a timer.
 */
export abstract class BackgroundServiceBase implements IBackgroundService {
  abstract readonly name: string;
  protected running = false;
  protected abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private pendingWake: (() => void) | null = null;

  constructor(protected readonly logger: ILogger) {}

  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    const controller = new AbortController();
    this.abortController = controller;

    this.loop = this.executeAsync(controller.signal)
      .catch((error: unknown) => {
        this.logger.error(`Service ${this.name} stopped on error`, { error });
      })
      .finally(() => {
        this.running = false;
      });
  }

  async stop(): Promise<void> {
    this.abortController?.abort();
    this.abortController = null;

    const loop = this.loop;
    this.loop = null;
    await loop;
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Implement this method to run the background task
   */
  protected abstract executeAsync(signal: AbortSignal): Promise<void>;

  /**
   * Wait up to `ms`. Resolves early on abort or `wake()`; never rejects.
   * The timer is unref'd so an idle service does not hold the process open.
   */
  protected delay(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }

      const finish = (): void => {
        clearTimeout(timeout);
        signal.removeEventListener('abort', finish);
        if (this.pendingWake === finish) {
          this.pendingWake = null;
        }
        resolve();
      };

      const timeout = setTimeout(finish, ms);
      timeout.unref();
      signal.addEventListener('abort', finish, { once: true });
      this.pendingWake = finish;
    });
  }

  /**
   * End the current `delay()` now, if one is pending.
   */
  protected wake(): void {
    this.pendingWake?.();
  }
}
