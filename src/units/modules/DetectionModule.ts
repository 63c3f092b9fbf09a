import { detectUnits } from '../../services/DetectionEngine';
import type { ReadonlyUnit } from '../Unit';
import { UnitModule } from './UnitModule';

export class DetectionModule extends UnitModule<'detection'> {
  readonly slot = 'detection';

  /**
   * Ids of the other units inside this unit's detection range.
   * Empty when the unit itself is gated.
   */
  detect(otherUnits: Iterable<ReadonlyUnit>): Set<string> {
    if (!this.active) return new Set();
    const { distanceModel, detectionMode } = this.context.config;
    return detectUnits(this.unit, otherUnits, {
      distanceModel,
      mode: detectionMode,
      rng: this.context.rng
    });
  }
}
