import type { UnitClass, WeaponSpec } from '../store/types';

export interface UnitClassTemplate {
    unitClass: UnitClass;
    hullPrefix: string;        // DD, CA, BB ...

    // 1. Kinematics
    maxSpeed: number;          // knots (0 = stationary)

    // 2. Survivability
    maxHealth: number;
    armor: number;             // flat reduction per hit
    resistance: number;        // fraction of the remainder absorbed, 0..1

    // 3. Sensors
    detectionRange: number;    // NM
    detectionProbability: number; // per sweep, probabilistic mode only

    // 4. Armament (null = unarmed)
    weapon: WeaponSpec | null;

    // 5. Endurance
    maxFuel: number;
    fuelPerNm: number;         // 0 = unlimited
}

export const UNIT_CLASSES: Record<UnitClass, UnitClassTemplate> = {
    DESTROYER: {
        unitClass: 'DESTROYER',
        hullPrefix: 'DD',
        maxSpeed: 35,
        maxHealth: 100,
        armor: 0,
        resistance: 0,
        detectionRange: 6,
        detectionProbability: 0.8,
        weapon: { range: 5, damage: 20, hitChance: 1 },
        maxFuel: 1000,
        fuelPerNm: 1
    },
    CRUISER: {
        unitClass: 'CRUISER',
        hullPrefix: 'CA',
        maxSpeed: 33,
        maxHealth: 150,
        armor: 5,
        resistance: 0.1,
        detectionRange: 8,
        detectionProbability: 0.8,
        weapon: { range: 8, damage: 35, hitChance: 1 },
        maxFuel: 1200,
        fuelPerNm: 1
    },
    BATTLESHIP: {
        unitClass: 'BATTLESHIP',
        hullPrefix: 'BB',
        maxSpeed: 28,
        maxHealth: 250,
        armor: 15,
        resistance: 0.2,
        detectionRange: 10,
        detectionProbability: 0.75,
        weapon: { range: 12, damage: 60, hitChance: 1 },
        maxFuel: 1500,
        fuelPerNm: 1
    },
    CARRIER: {
        unitClass: 'CARRIER',
        hullPrefix: 'CV',
        maxSpeed: 33,
        maxHealth: 175,
        armor: 5,
        resistance: 0.1,
        detectionRange: 12,
        detectionProbability: 0.9,
        weapon: { range: 3, damage: 10, hitChance: 1 },
        maxFuel: 2000,
        fuelPerNm: 1
    },
    SUBMARINE: {
        unitClass: 'SUBMARINE',
        hullPrefix: 'SS',
        maxSpeed: 20,
        maxHealth: 60,
        armor: 0,
        resistance: 0,
        detectionRange: 5,
        detectionProbability: 0.6,
        weapon: { range: 4, damage: 45, hitChance: 1 },
        maxFuel: 800,
        fuelPerNm: 1
    },
    TRANSPORT: {
        unitClass: 'TRANSPORT',
        hullPrefix: 'AP',
        maxSpeed: 16,
        maxHealth: 80,
        armor: 0,
        resistance: 0,
        detectionRange: 5,
        detectionProbability: 0.7,
        weapon: null,
        maxFuel: 1800,
        fuelPerNm: 1
    },
    BASE: {
        unitClass: 'BASE',
        hullPrefix: 'NB',
        maxSpeed: 0,
        maxHealth: 500,
        armor: 20,
        resistance: 0.25,
        detectionRange: 15,
        detectionProbability: 0.9,
        weapon: { range: 10, damage: 40, hitChance: 1 },
        maxFuel: 5000,
        fuelPerNm: 0
    }
};

export const UNIT_CLASS_IDS = Object.keys(UNIT_CLASSES);

export const isUnitClass = (value: string): value is UnitClass => value in UNIT_CLASSES;
