import { assertTimeRate } from '../config/SimulationConfig';
import { TimeLimitReachedError } from './errors';

/**
 * Read-only view of simulation time. Everything except the orchestrator gets this.
 */
export interface ClockView {
  readonly tick: number;
  readonly startTime: number;
  /** epoch ms */
  readonly gameTime: number;
  readonly timeRateSeconds: number;
  /** Game seconds spanned by a number of ticks at the current rate */
  secondsFor(ticks: number): number;
}

export interface GameClockOptions {
  startTime: number;
  timeRateSeconds: number;
  endTime?: number | null;
}

export class GameClock implements ClockView {
  private _tick = 0;
  private _gameTime: number;
  private _timeRateSeconds: number;
  private readonly _view: ClockView;

  readonly startTime: number;
  readonly endTime: number | null;

  constructor(options: GameClockOptions) {
    assertTimeRate(options.timeRateSeconds);
    this.startTime = options.startTime;
    this.endTime = options.endTime ?? null;
    this._gameTime = options.startTime;
    this._timeRateSeconds = options.timeRateSeconds;

    const clock = this;
    this._view = Object.freeze({
      get tick() { return clock.tick; },
      get startTime() { return clock.startTime; },
      get gameTime() { return clock.gameTime; },
      get timeRateSeconds() { return clock.timeRateSeconds; },
      secondsFor: (ticks: number) => clock.secondsFor(ticks)
    });
  }

  get tick(): number {
    return this._tick;
  }

  get gameTime(): number {
    return this._gameTime;
  }

  get timeRateSeconds(): number {
    return this._timeRateSeconds;
  }

  secondsFor(ticks: number): number {
    return ticks * this._timeRateSeconds;
  }

  /**
   * A view object with no route back to the mutators
   */
  view(): ClockView {
    return this._view;
  }

  setTimeRate(seconds: number): void {
    assertTimeRate(seconds);
    this._timeRateSeconds = seconds;
  }

  /**
   * Advances one tick. Throws (without advancing) once the end time would be passed.
   */
  advance(): number {
    const next = this._gameTime + this._timeRateSeconds * 1000;
    if (this.endTime !== null && next > this.endTime) {
      throw new TimeLimitReachedError(this.endTime);
    }
    this._gameTime = next;
    this._tick += 1;
    return this._tick;
  }
}
