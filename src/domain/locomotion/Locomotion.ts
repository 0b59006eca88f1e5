import type { Direction, EnergySource, Position } from '../../types/controls.js';

export type StopProfile = {
  stopTimeSeconds: number;
  energyCost: number;
};

export type RechargePlan = {
  rate: number;
  estimate: string;
};

/**
 * Capability-specific movement model. A robot owns its state and delegates every
 * kind-dependent computation here; implementations are pure.
 */
export interface Locomotion {
  readonly kind: 'legged';
  speedFactor(): number;
  energyCost(distance: number): number;
  updatePosition(
    position: Position,
    orientation: number,
    direction: Direction,
    distance: number,
  ): Position;
  rotationCost(angle: number): number;
  stopProfile(): StopProfile;
  rechargePlan(source: EnergySource): RechargePlan;
  /** Short label, e.g. "4-legged robot". */
  describe(): string;
  mobility(): string;
}
