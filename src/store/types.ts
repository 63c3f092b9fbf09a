export interface Position {
  lat: number;
  lon: number;
}

export type UnitState = 'IDLE' | 'MOVING' | 'ENGAGING' | 'SINKING' | 'REMOVED';

export type UnitClass =
  | 'DESTROYER'
  | 'CRUISER'
  | 'BATTLESHIP'
  | 'CARRIER'
  | 'SUBMARINE'
  | 'TRANSPORT'
  | 'BASE';

export type ModuleSlot = 'movement' | 'detection' | 'attack';

export type GameState = 'INITIALIZING' | 'RUNNING' | 'PAUSED' | 'COMPLETED';

export type DistanceModel = 'PLANAR' | 'GREAT_CIRCLE' | 'VINCENTY';

export type DetectionMode = 'DETERMINISTIC' | 'PROBABILISTIC';

export interface WeaponSpec {
  range: number; // NM
  damage: number;
  hitChance: number; // 0..1, 1 = always hits
}

export interface FuelState {
  current: number;
  max: number;
  perNm: number;
}

export interface UnitSummary {
  id: string;
  name: string;
  faction: string;
  unitClass: UnitClass;
  position: Position;
  heading: number;
  speed: number;
  health: number;
  maxHealth: number;
  state: UnitState;
  destination: Position | null;
}

export interface SimulationSnapshot {
  tick: number;
  gameTime: string;
  timeRateSeconds: number;
  gameState: GameState;
  units: readonly UnitSummary[];
}

// Telemetry emitted by the core. Presentation is left to consumers.
export type SimulationEvent =
  | { type: 'DETECTION'; tick: number; observerId: string; detectedIds: string[] }
  | {
      type: 'ATTACK';
      tick: number;
      attackerId: string;
      targetId: string;
      hit: boolean;
      damage: number;
      remainingHealth: number;
    }
  | { type: 'ENGAGING'; tick: number; unitId: string; targetIds: string[] }
  | { type: 'DISENGAGED'; tick: number; unitId: string }
  | { type: 'ARRIVED'; tick: number; unitId: string; position: Position }
  | { type: 'FUEL_EXHAUSTED'; tick: number; unitId: string; position: Position }
  | { type: 'SINKING'; tick: number; unitId: string }
  | { type: 'REMOVED'; tick: number; unitId: string }
  | { type: 'MODULE_FAILURE'; tick: number; unitId: string; module: ModuleSlot; message: string };

