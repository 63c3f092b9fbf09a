import { InvalidOperationError } from './errors';
import { logger } from './logger';
import type { GameState } from '../store/types';

export interface Tickable {
  readonly gameState: GameState;
  tick(): unknown;
}

export interface GameSchedulerOptions {
  intervalMs?: number;          // wall-clock ms between ticks
  onError?: (error: unknown) => void;
}

const DEFAULT_INTERVAL_MS = 1000;

/**
 * Calls tick() on a wall-clock cadence. Intervals that find the game paused
 * are skipped; a completed game stops the scheduler.
 */
export class GameScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly intervalMs: number;
  private readonly onError?: (error: unknown) => void;

  constructor(private readonly target: Tickable, options: GameSchedulerOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    if (!(this.intervalMs > 0)) {
      throw new InvalidOperationError(`Scheduler interval must be positive, got ${this.intervalMs}`);
    }
    this.onError = options.onError;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer !== null) {
      throw new InvalidOperationError('Scheduler is already running');
    }
    this.timer = setInterval(this.handleInterval, this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private handleInterval = (): void => {
    const state = this.target.gameState;
    if (state === 'COMPLETED') {
      this.stop();
      return;
    }
    if (state !== 'RUNNING') return;

    try {
      this.target.tick();
    } catch (error) {
      logger.error('[GameScheduler] Tick failed:', error);
      if (this.target.gameState === 'COMPLETED') this.stop();
      this.onError?.(error);
    }
  };
}
