import { EventEmitter } from 'events';
import { ResolutionResult } from './ConsensusResolver';
import { MempoolSyncResult } from './MempoolSynchronizer';

export const DEFAULT_SYNC_INTERVAL_MS = 5000;

export type SyncPhase = 'consensus' | 'mempool' | 'cycle';

export interface SyncErrorEvent {
  phase: SyncPhase;
  error: unknown;
}

export interface SyncCycleResult {
  consensus?: ResolutionResult;
  mempool?: MempoolSyncResult;
}

export interface SyncTargets {
  resolve(): Promise<ResolutionResult>;
  sync(): Promise<MempoolSyncResult>;
}

/**
 * Background loop: consensus, then mempool sync, then wait.
 *
 * The next cycle is scheduled only once the previous one has finished, and
 * cycles are serialized, so they never overlap even across a stop and restart. Failures are emitted as `sync:error` and the loop
 * keeps going.
 */
export class SyncScheduler extends EventEmitter {
  private targets: SyncTargets;
  private intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private running: boolean = false;
  private inFlight: Promise<SyncCycleResult> | null = null;
  private cycles: number = 0;
  private generation: number = 0;

  constructor(targets: SyncTargets, intervalMs: number = DEFAULT_SYNC_INTERVAL_MS) {
    super();
    this.targets = targets;
    this.intervalMs = intervalMs;
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.generation++;
    this.scheduleNext(this.generation);
    this.emit('scheduler:started', this.intervalMs);
  }

  /**
   * Stop scheduling new cycles and wait for the current one, if any.
   */
  public async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.emit('scheduler:stopped');
  }

  /**
   * Run one cycle now, after any cycle already in flight.
   */
  public async runCycle(): Promise<SyncCycleResult> {
    const previous = this.inFlight;
    const cycle = previous
      ? previous.then(() => this.executeCycle(), () => this.executeCycle())
      : this.executeCycle();
    this.inFlight = cycle;
    try {
      return await cycle;
    } finally {
      if (this.inFlight === cycle) {
        this.inFlight = null;
      }
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getCycleCount(): number {
    return this.cycles;
  }

  private scheduleNext(generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runCycle()
        .catch((error: unknown) => this.reportError('cycle', error))
        .finally(() => {
          // A restart while this cycle ran owns the loop now.
          if (this.running && generation === this.generation) {
            this.scheduleNext(generation);
          }
        });
    }, this.intervalMs);
    this.timer.unref();
  }

  private async executeCycle(): Promise<SyncCycleResult> {
    const result: SyncCycleResult = {};

    try {
      result.consensus = await this.targets.resolve();
    } catch (error) {
      this.reportError('consensus', error);
    }

    try {
      result.mempool = await this.targets.sync();
    } catch (error) {
      this.reportError('mempool', error);
    }

    this.cycles++;
    this.emit('sync:cycle', result);
    return result;
  }

  private reportError(phase: SyncPhase, error: unknown): void {
    const event: SyncErrorEvent = { phase, error };
    this.emit('sync:error', event);
  }
}
