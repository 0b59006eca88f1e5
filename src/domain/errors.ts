export type RobotErrorKind =
  | 'InvalidDirection'
  | 'InvalidDistance'
  | 'InvalidLegCount'
  | 'InvalidAngle'
  | 'InvalidEnergySource'
  | 'InvalidPose'
  | 'InvalidIdentity';

/** Validation failure raised by the robot model; the caller must correct the input. */
export class RobotError extends Error {
  constructor(
    public readonly kind: RobotErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'RobotError';
  }
}

export function isRobotError(e: unknown): e is RobotError {
  return e instanceof RobotError;
}
