import type { Logger } from 'pino';
import { scoped } from '../logging.js';
import { DirectionSchema, type Direction, type Position } from '../types/controls.js';
import { RobotError } from './errors.js';
import { LeggedLocomotion } from './locomotion/LeggedLocomotion.js';
import type { Locomotion } from './locomotion/Locomotion.js';
import {
  ENERGY_CAPACITY,
  createRobotState,
  drain,
  validateIdentity,
  type RobotIdentity,
  type RobotState,
  type RobotStateInit,
} from './RobotState.js';

const TWO_PI = 2 * Math.PI;
const LOW_ENERGY_TURN_THRESHOLD = 10;
const LOW_BATTERY_THRESHOLD = 20;

export type MoveOutcome =
  | { status: 'inactive' }
  | {
      status: 'moved';
      direction: Direction;
      distance: number;
      position: Position;
      energyCost: number;
      energy: number;
    };

export type RotateOutcome =
  | { status: 'inactive' }
  | { status: 'rotated'; angle: number; orientation: number; energyCost: number; energy: number };

export type StopOutcome =
  | { status: 'inactive' }
  | { status: 'stopped'; stopTimeSeconds: number; energyCost: number; energy: number };

export type RechargeOutcome =
  | { status: 'full'; energy: number }
  | {
      status: 'recharged';
      before: number;
      energy: number;
      estimate: string;
      full: boolean;
    };

export type RobotSnapshot = RobotIdentity & RobotState & { kind: Locomotion['kind'] };

function normalizeAngle(angle: number): number {
  const r = angle % TWO_PI;
  return r < 0 ? r + TWO_PI : r;
}

function parseDirection(direction: string): Direction {
  const parsed = DirectionSchema.safeParse(direction);
  if (!parsed.success) {
    throw new RobotError(
      'InvalidDirection',
      `Direction must be one of ${DirectionSchema.options.join(', ')} (got '${direction}').`,
    );
  }
  return parsed.data;
}

/**
 * A robot is its mutable state plus a locomotion strategy. Every operation validates
 * and computes before writing, so a thrown RobotError leaves the state untouched.
 */
export class Robot<L extends Locomotion = Locomotion> {
  private readonly state: RobotState;
  private readonly log: Logger;

  constructor(
    private readonly identity: RobotIdentity,
    readonly locomotion: L,
    init: RobotStateInit = {},
    log?: Logger,
  ) {
    this.state = createRobotState(init);
    this.log = log ?? scoped('robot', { robot: identity.name, robotId: identity.id });
  }

  get id(): string | number {
    return this.identity.id;
  }

  get name(): string {
    return this.identity.name;
  }

  get energySource(): RobotIdentity['energySource'] {
    return this.identity.energySource;
  }

  get position(): Position {
    return { ...this.state.position };
  }

  get orientation(): number {
    return this.state.orientation;
  }

  get isActive(): boolean {
    return this.state.active;
  }

  get energy(): number {
    return this.state.energy;
  }

  activate(): void {
    this.state.active = true;
    this.log.info(`${this.name} is active.`);
  }

  deactivate(): void {
    this.state.active = false;
    this.log.info(`${this.name} is shut down.`);
  }

  move(direction: string, distance: number): MoveOutcome {
    if (!this.state.active) {
      this.log.warn({ direction, distance }, `${this.name} is not active and cannot move.`);
      return { status: 'inactive' };
    }
    const dir = parseDirection(direction);
    if (!Number.isFinite(distance) || distance < 0) {
      throw new RobotError(
        'InvalidDistance',
        `Distance must be a finite non-negative number (got ${distance}).`,
      );
    }

    const position = this.locomotion.updatePosition(
      this.state.position,
      this.state.orientation,
      dir,
      distance,
    );
    // A finite distance can still overflow once scaled by the speed factor.
    if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
      throw new RobotError(
        'InvalidDistance',
        `Distance ${distance} moves the robot outside the representable plane.`,
      );
    }
    const energyCost = this.locomotion.energyCost(distance);
    const energy = drain(this.state.energy, energyCost);
    const exhausted = energy === 0 && this.state.energy > 0;

    this.state.position = position;
    this.state.energy = energy;
    this.log.info(
      { direction: dir, distance, position, energyCost, energy },
      `${this.name} is moving ${dir} by ${distance} units (${this.locomotion.describe()}).`,
    );
    if (exhausted) {
      this.log.warn(`${this.name} has run out of energy.`);
    }
    return {
      status: 'moved',
      direction: dir,
      distance,
      position: { ...position },
      energyCost,
      energy,
    };
  }

  /** Turns by `angle` radians; negative is a left turn. */
  rotate(angle: number): RotateOutcome {
    if (!this.state.active) {
      this.log.warn({ angle }, `${this.name} is inactive and cannot rotate.`);
      return { status: 'inactive' };
    }
    if (!Number.isFinite(angle)) {
      throw new RobotError(
        'InvalidAngle',
        `Angle must be a finite number of radians (got ${angle}).`,
      );
    }

    const orientation = normalizeAngle(this.state.orientation + angle);
    const energyCost = this.locomotion.rotationCost(angle);
    const energy = drain(this.state.energy, energyCost);

    this.state.orientation = orientation;
    this.state.energy = energy;
    const side = angle < 0 ? 'left' : 'right';
    this.log.info(
      { angle, orientation, energyCost, energy },
      `${this.name} rotated ${side} by ${Math.abs(angle)} radians.`,
    );
    if (energy <= LOW_ENERGY_TURN_THRESHOLD) {
      this.log.warn({ energy }, `Warning: robot ${this.name} has low energy!`);
    }
    return { status: 'rotated', angle, orientation, energyCost, energy };
  }

  stop(): StopOutcome {
    if (!this.state.active) {
      this.log.warn(`Robot ${this.name} is already inactive.`);
      return { status: 'inactive' };
    }
    const { stopTimeSeconds, energyCost } = this.locomotion.stopProfile();
    const energy = drain(this.state.energy, energyCost);
    this.state.energy = energy;
    this.log.info(
      { stopTimeSeconds, energyCost, energy },
      `Robot ${this.name} has stopped (${this.locomotion.describe()}).`,
    );
    return { status: 'stopped', stopTimeSeconds, energyCost, energy };
  }

  recharge(): RechargeOutcome {
    const before = this.state.energy;
    if (before >= ENERGY_CAPACITY) {
      this.log.info(`Robot ${this.name} is already fully charged.`);
      return { status: 'full', energy: before };
    }
    const { rate, estimate } = this.locomotion.rechargePlan(this.identity.energySource);
    const energy = Math.min(ENERGY_CAPACITY, before + rate);
    this.state.energy = energy;
    this.log.info(
      { source: this.identity.energySource, before, energy, estimate },
      `Recharging ${this.name}: ${before}% -> ${energy}%`,
    );
    return { status: 'recharged', before, energy, estimate, full: energy >= ENERGY_CAPACITY };
  }

  status(): string {
    const { position, orientation, energy, active } = this.state;
    const lines = [
      `=== ${this.name} Status ===`,
      `Type: ${this.locomotion.describe()}`,
      `ID: ${this.id}`,
      `Position: (${position.x.toFixed(2)}, ${position.y.toFixed(2)})`,
      `Orientation: ${((orientation * 180) / Math.PI).toFixed(2)}°`,
      `Energy Source: ${this.energySource}`,
      `Battery Level: ${energy.toFixed(2)}%`,
      `Active: ${active ? 'Yes' : 'No'}`,
      `Mobility: ${this.locomotion.mobility()}`,
    ];
    if (energy <= LOW_BATTERY_THRESHOLD) {
      lines.push('WARNING: Low battery!');
    }
    return lines.join('\n');
  }

  snapshot(): RobotSnapshot {
    return {
      ...this.identity,
      kind: this.locomotion.kind,
      position: { ...this.state.position },
      orientation: this.state.orientation,
      active: this.state.active,
      energy: this.state.energy,
    };
  }

  toString(): string {
    const { x, y } = this.state.position;
    return (
      `Robot(ID: ${this.id}, Name: ${this.name}, Type: ${this.locomotion.describe()}, ` +
      `Position: (${x}, ${y}), Orientation: ${this.state.orientation}, ` +
      `Energy Source: ${this.energySource}, Active: ${this.state.active})`
    );
  }
}

export type LeggedRobot = Robot<LeggedLocomotion>;

export type LeggedRobotOptions = {
  id: string | number;
  name: string;
  energySource: string;
  legCount: number;
  /** Defaults to a `robot` scoped child of the root logger. */
  log?: Logger | undefined;
} & RobotStateInit;

export function createLeggedRobot(options: LeggedRobotOptions): LeggedRobot {
  const identity = validateIdentity(options);
  const locomotion = new LeggedLocomotion(options.legCount);
  return new Robot(
    identity,
    locomotion,
    {
      position: options.position,
      orientation: options.orientation,
      energy: options.energy,
      active: options.active,
    },
    options.log,
  );
}
