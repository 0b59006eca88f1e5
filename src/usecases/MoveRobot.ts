import { z } from 'zod';
import type { MoveOutcome, Robot } from '../domain/Robot.js';

// Direction stays a free string here; the robot owns the enumeration and raises InvalidDirection.
export const MoveRobotInput = {
  direction: z.string(),
  distance: z.number(),
} as const;
export const MoveRobotSchema = z.object(MoveRobotInput);
export type MoveRobotArgs = z.infer<typeof MoveRobotSchema>;

export class MoveRobot {
  constructor(private readonly robot: Robot) {}

  execute(args: MoveRobotArgs): MoveOutcome {
    const { direction, distance } = MoveRobotSchema.parse(args);
    return this.robot.move(direction, distance);
  }
}
