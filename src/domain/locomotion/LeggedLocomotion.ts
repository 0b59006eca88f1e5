import type { Direction, EnergySource, Position } from '../../types/controls.js';
import { RobotError } from '../errors.js';
import type { Locomotion, RechargePlan, StopProfile } from './Locomotion.js';

// Non-monotonic on purpose: 8 legs are heavier than 6.
const SPEED_FACTORS: ReadonlyMap<number, number> = new Map([
  [2, 0.8],
  [4, 1.0],
  [6, 1.2],
  [8, 1.1],
]);
const FALLBACK_SPEED_FACTOR = 0.7;

export function validateLegCount(legCount: number): number {
  if (!Number.isInteger(legCount) || legCount < 2 || legCount % 2 !== 0) {
    throw new RobotError(
      'InvalidLegCount',
      `Leg count must be an even integer >= 2 (got ${legCount}).`,
    );
  }
  return legCount;
}

export function speedFactor(legCount: number): number {
  return SPEED_FACTORS.get(legCount) ?? FALLBACK_SPEED_FACTOR;
}

/** Cost is charged on the requested distance, not the speed-adjusted displacement. */
export function energyCost(distance: number, legCount: number): number {
  return distance * 0.1 * (1 + legCount * 0.05);
}

/**
 * Forward/backward follow (cos θ, sin θ); left/right follow the perpendicular
 * (-sin θ, cos θ), with left as the positive side.
 */
export function updatePosition(
  position: Position,
  orientation: number,
  direction: Direction,
  distance: number,
  factor: number,
): Position {
  const step = distance * factor;
  const cos = Math.cos(orientation);
  const sin = Math.sin(orientation);
  switch (direction) {
    case 'forward':
      return { x: position.x + step * cos, y: position.y + step * sin };
    case 'backward':
      return { x: position.x - step * cos, y: position.y - step * sin };
    case 'left':
      return { x: position.x - step * sin, y: position.y + step * cos };
    case 'right':
      return { x: position.x + step * sin, y: position.y - step * cos };
  }
}

export class LeggedLocomotion implements Locomotion {
  readonly kind = 'legged' as const;
  private readonly _legCount: number;

  constructor(legCount: number) {
    this._legCount = validateLegCount(legCount);
  }

  get legCount(): number {
    return this._legCount;
  }

  speedFactor(): number {
    return speedFactor(this._legCount);
  }

  energyCost(distance: number): number {
    return energyCost(distance, this._legCount);
  }

  updatePosition(
    position: Position,
    orientation: number,
    direction: Direction,
    distance: number,
  ): Position {
    return updatePosition(position, orientation, direction, distance, this.speedFactor());
  }

  rotationCost(angle: number): number {
    const stability = Math.min(1, this._legCount / 6);
    return Math.abs(angle) * (10 / stability);
  }

  stopProfile(): StopProfile {
    const efficiency = Math.min(1, this._legCount / 4);
    return { stopTimeSeconds: 2 / efficiency, energyCost: 5 / efficiency };
  }

  rechargePlan(source: EnergySource): RechargePlan {
    switch (source) {
      case 'solar':
        return { rate: 15 + this._legCount * 2, estimate: '6-8 hours' };
      case 'electric':
        return { rate: 25 + this._legCount, estimate: '2-3 hours' };
      case 'fossil_fuel':
        return { rate: 35, estimate: '30 minutes' };
    }
  }

  describe(): string {
    return `${this._legCount}-legged robot`;
  }

  mobility(): string {
    switch (this._legCount) {
      case 2:
        return 'Bipedal (human-like)';
      case 4:
        return 'Quadrupedal (animal-like)';
      case 6:
        return 'Hexapedal (insect-like)';
      default:
        return `Multi-legged (${this._legCount} legs)`;
    }
  }
}
