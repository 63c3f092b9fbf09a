export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateUnitError extends SimulationError {
  constructor(public readonly unitId: string) {
    super(`Unit ${unitId} is already registered`);
  }
}

export class UnitNotFoundError extends SimulationError {
  constructor(public readonly unitId: string) {
    super(`Unit ${unitId} not found`);
  }
}

export class InvalidOperationError extends SimulationError {}

export class TimeLimitReachedError extends SimulationError {
  constructor(public readonly endTime: number) {
    super(`Game time limit reached (${new Date(endTime).toISOString()})`);
  }
}

export interface ScenarioViolation {
  path: string;
  message: string;
}

export class InvalidScenarioError extends SimulationError {
  constructor(public readonly violations: ScenarioViolation[]) {
    super(
      `Invalid scenario (${violations.length} violation${violations.length === 1 ? '' : 's'}):\n` +
        violations.map((v) => `  - ${v.path}: ${v.message}`).join('\n')
    );
  }
}
