import type { LogEntry } from './types.js';

export type ShutdownTask = () => Promise<void> | void;

/**
 * Runs registered cleanup tasks once, newest first, and aborts `signal` so
 * long-running loops can notice the stop between engine commands.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private stopping = false;
  private shutdownPromise?: Promise<void>;
  private stopReason?: string;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public get reason(): string | undefined {
    return this.stopReason;
  }

  public isStopping(): boolean {
    return this.stopping;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { reason?: string; logger?: (entry: LogEntry) => void } = {}): Promise<void> {
    if (this.shutdownPromise !== undefined) {
      await this.shutdownPromise;
      return;
    }
    this.shutdownPromise = this.performShutdown(opts);
    await this.shutdownPromise;
  }

  private async performShutdown(opts: { reason?: string; logger?: (entry: LogEntry) => void }): Promise<void> {
    this.stopping = true;
    this.stopReason = opts.reason;
    this.abortController.abort(opts.reason);
    const logger = opts.logger;
    const entries = Array.from(this.tasks.entries()).reverse();
    this.tasks.clear();
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    for (const [name, task] of entries) {
      try {
        await task();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger?.({
          timestamp: Date.now(),
          severity: 'WRN',
          direction: 'response',
          type: 'cli',
          remoteIdentifier: 'shutdown',
          fatal: false,
          message: `shutdown task '${name}' failed: ${message}`,
        });
      }
    }
  }
}
