import { computeMovementStep } from '../../services/MovementEngine';
import type { Position } from '../../store/types';
import { UnitModule } from './UnitModule';

export interface MovementOutcome {
  position: Position;
  distanceNm: number;
  arrived: boolean;
  fuelExhausted: boolean;
}

export class MovementModule extends UnitModule<'movement'> {
  readonly slot = 'movement';

  /**
   * Steams toward the destination for `elapsedTicks` ticks of game time.
   * Returns null without touching the unit when it is gated, has no
   * destination or speed, or no time elapsed.
   */
  update(elapsedTicks: number): MovementOutcome | null {
    if (!this.active || elapsedTicks <= 0) return null;

    const unit = this.unit;
    const destination = unit.destination;
    if (!destination || unit.speed <= 0) return null;

    const step = computeMovementStep({
      position: unit.position,
      destination,
      speed: unit.speed,
      elapsedSeconds: this.context.clock.secondsFor(elapsedTicks),
      arrivalEpsilonNm: this.context.config.arrivalEpsilonNm,
      fuel: unit.fuel
    });
    if (!step) return null;

    unit.heading = step.heading;
    unit.position = step.position;
    if (unit.fuel && step.fuelRemaining !== null) {
      unit.fuel = { ...unit.fuel, current: step.fuelRemaining };
    }

    if (step.arrived) {
      unit.arrive();
    } else if (step.fuelExhausted) {
      unit.stop();
    }

    return {
      position: { ...unit.position },
      distanceNm: step.distanceNm,
      arrived: step.arrived,
      fuelExhausted: step.fuelExhausted
    };
  }
}
