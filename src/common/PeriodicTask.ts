import { EventEmitter } from 'eventemitter3';
import { FrameworkLogger, createLogger } from './logger';
import { toError } from './errors';

export interface PeriodicTaskConfig {
  interval: number;          // Sleep between successful cycles (ms)
  backoffInterval: number;   // Sleep after a failed cycle (ms)
  runImmediately: boolean;   // Run the first cycle right after start()
}

export interface CycleSummary {
  /** Units of work examined this cycle */
  processed: number;
  /** Units of work that produced a committed write */
  applied: number;
  /** Units of work that failed individually */
  failed: number;
  durationMs: number;
}

export interface PeriodicTaskStats {
  cyclesCompleted: number;
  cyclesFailed: number;
  consecutiveFailures: number;
  lastCycleAt?: number;
  lastError?: Error;
}

export interface PeriodicTaskEvents {
  'started': [];
  'stopped': [];
  'cycle-completed': [summary: CycleSummary];
  'cycle-failed': [error: Error];
  'node-error': [nodeId: number, error: Error];
}

/**
 * A long-running polling loop owned by whoever constructs it.
 *
 * Each cycle runs to completion before the next one is scheduled, so cycles
 * never overlap. A failed cycle is reported and followed by the longer
 * backoff sleep; nothing thrown by a cycle escapes the loop. `stop()` cancels
 * the pending sleep and waits for an in-flight cycle to drain.
 */
export abstract class PeriodicTask extends EventEmitter<PeriodicTaskEvents> {
  protected config: PeriodicTaskConfig;
  protected logger: FrameworkLogger;
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private running = false;
  private stats: PeriodicTaskStats = { cyclesCompleted: 0, cyclesFailed: 0, consecutiveFailures: 0 };

  constructor(readonly name: string, config: PeriodicTaskConfig, logger?: FrameworkLogger) {
    super();
    this.config = { ...config };
    this.logger = logger ?? createLogger();
  }

  /**
   * One pass over the current work set
   */
  protected abstract executeCycle(): Promise<CycleSummary>;

  start(): void {
    if (this.running) return;

    this.running = true;
    // A cycle still draining from stop() reschedules itself once it sees running again
    if (!this.inFlight) {
      this.scheduleNext(this.config.runImmediately ? 0 : this.config.interval);
    }
    this.emit('started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    // start() during the drain resumed the loop
    if (!this.running) {
      this.emit('stopped');
    }
  }

  /**
   * Whether the loop is accepting new cycles
   */
  isAlive(): boolean {
    return this.running;
  }

  getConfig(): PeriodicTaskConfig {
    return { ...this.config };
  }

  getStats(): PeriodicTaskStats {
    return { ...this.stats };
  }

  /**
   * Run a single cycle outside the timer loop. Errors propagate to the caller.
   */
  async runCycle(): Promise<CycleSummary> {
    const startedAt = Date.now();
    const summary = await this.executeCycle();
    return { ...summary, durationMs: Date.now() - startedAt };
  }

  protected reportNodeError(nodeId: number, error: unknown): void {
    const err = toError(error);
    this.logger.error(`[${this.name}] Node ${nodeId} failed: ${err.message}`);
    this.emit('node-error', nodeId, err);
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.tick()
        .catch(error => {
          // Only a throwing listener can land here
          this.logger.error(`[${this.name}] Listener error: ${toError(error).message}`);
          if (this.running) this.scheduleNext(this.config.backoffInterval);
        })
        .finally(() => {
          this.inFlight = undefined;
        });
    }, delayMs);

    // Prevent timer from keeping process alive
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    let nextDelay = this.config.interval;

    try {
      const summary = await this.runCycle();
      this.stats.cyclesCompleted++;
      this.stats.consecutiveFailures = 0;
      this.stats.lastCycleAt = Date.now();
      this.emit('cycle-completed', summary);
    } catch (error) {
      const err = toError(error);
      this.stats.cyclesFailed++;
      this.stats.consecutiveFailures++;
      this.stats.lastError = err;
      this.logger.error(`[${this.name}] Cycle failed, backing off ${this.config.backoffInterval}ms: ${err.message}`);
      this.emit('cycle-failed', err);
      nextDelay = this.config.backoffInterval;
    }

    if (this.running) {
      this.scheduleNext(nextDelay);
    }
  }
}
