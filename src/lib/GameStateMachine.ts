import { InvalidOperationError } from './errors';
import type { GameState } from '../store/types';

/**
 * Lifecycle of a game: INITIALIZING -> RUNNING <-> PAUSED -> COMPLETED
 */
export class GameStateMachine {
  private state: GameState = 'INITIALIZING';

  get current(): GameState {
    return this.state;
  }

  get isPaused(): boolean {
    return this.state === 'PAUSED';
  }

  get canProcessTick(): boolean {
    return this.state === 'RUNNING';
  }

  start(): void {
    if (this.state !== 'INITIALIZING') {
      throw new InvalidOperationError(`Game can only be started from INITIALIZING (currently ${this.state})`);
    }
    this.state = 'RUNNING';
  }

  // Pausing anything but a running game is a no-op
  pause(): void {
    if (this.state === 'RUNNING') {
      this.state = 'PAUSED';
    }
  }

  unpause(): void {
    if (this.state !== 'PAUSED') {
      throw new InvalidOperationError(`Game is not paused (currently ${this.state})`);
    }
    this.state = 'RUNNING';
  }

  complete(): void {
    this.state = 'COMPLETED';
  }
}
