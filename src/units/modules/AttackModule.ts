import { InvalidOperationError } from '../../lib/errors';
import {
  chooseTarget,
  findLegitimateTargets,
  resolveAttack,
  type AttackOutcome
} from '../../services/AttackEngine';
import type { ReadonlyUnit, Unit } from '../Unit';
import { UnitModule } from './UnitModule';

export class AttackModule extends UnitModule<'attack'> {
  readonly slot = 'attack';

  /**
   * Units this unit may fire on, drawn from what it detected this tick.
   */
  legitimateTargets(): ReadonlyUnit[] {
    if (!this.active) return [];
    const { units, config } = this.context;
    return findLegitimateTargets(
      this.unit,
      units.detectionsOf(this.unit.id),
      (id) => units.get(id),
      config.distanceModel
    );
  }

  selectTarget(targets: readonly ReadonlyUnit[] = this.legitimateTargets()): ReadonlyUnit | null {
    return chooseTarget(this.unit, targets, this.context.config.distanceModel);
  }

  /**
   * Resolves one attack by this unit on the target. Only the unit manager
   * holds the mutable target.
   */
  resolve(target: Unit): AttackOutcome {
    if (this.disposed) {
      throw new InvalidOperationError(`Attack module of ${this.unit.id} has been disposed`);
    }
    return resolveAttack(this.unit, target, {
      distanceModel: this.context.config.distanceModel,
      rng: this.context.rng
    });
  }
}
