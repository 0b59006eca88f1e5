import type { EnergySource, Position } from '../types/controls.js';
import { EnergySourceSchema } from '../types/controls.js';
import { RobotError } from './errors.js';

export const ENERGY_CAPACITY = 100;

export type RobotIdentity = {
  id: string | number;
  name: string;
  energySource: EnergySource;
};

export type RobotState = {
  position: Position;
  orientation: number;
  active: boolean;
  energy: number;
};

export type RobotStateInit = {
  position?: Position | undefined;
  orientation?: number | undefined;
  energy?: number | undefined;
  active?: boolean | undefined;
};

export function createRobotState(init: RobotStateInit = {}): RobotState {
  const position = init.position ?? { x: 0, y: 0 };
  const orientation = init.orientation ?? 0;
  const energy = init.energy ?? ENERGY_CAPACITY;
  if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
    throw new RobotError('InvalidPose', 'Position coordinates must be finite numbers.');
  }
  if (!Number.isFinite(orientation)) {
    throw new RobotError('InvalidPose', 'Orientation must be a finite number of radians.');
  }
  if (!Number.isFinite(energy) || energy < 0 || energy > ENERGY_CAPACITY) {
    throw new RobotError('InvalidPose', `Energy must be between 0 and ${ENERGY_CAPACITY}.`);
  }
  return {
    position: { x: position.x, y: position.y },
    orientation,
    active: init.active ?? false,
    energy,
  };
}

export function validateIdentity(identity: {
  id: string | number;
  name: string;
  energySource: string;
}): RobotIdentity {
  if (identity.name.trim().length === 0) {
    throw new RobotError('InvalidIdentity', 'Robot name must not be empty.');
  }
  const source = EnergySourceSchema.safeParse(identity.energySource.toLowerCase());
  if (!source.success) {
    throw new RobotError(
      'InvalidEnergySource',
      `Energy source must be one of: ${EnergySourceSchema.options.join(', ')}.`,
    );
  }
  return { id: identity.id, name: identity.name, energySource: source.data };
}

export function drain(energy: number, cost: number): number {
  return Math.max(0, energy - cost);
}
