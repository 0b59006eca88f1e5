import { z } from 'zod';
import type { RotateOutcome, Robot } from '../domain/Robot.js';

export const RotateRobotInput = {
  degrees: z.number().optional(),
  radians: z.number().optional(),
} as const;
export const RotateRobotSchema = z
  .object(RotateRobotInput)
  .refine((v) => v.degrees !== undefined || v.radians !== undefined, {
    message: 'either degrees or radians is required',
  });
export type RotateRobotArgs = z.infer<typeof RotateRobotSchema>;

export class RotateRobot {
  constructor(private readonly robot: Robot) {}

  /** Radians win when both units are given. */
  execute(args: RotateRobotArgs): RotateOutcome {
    const { degrees, radians } = RotateRobotSchema.parse(args);
    const angle = radians ?? ((degrees ?? 0) * Math.PI) / 180;
    return this.robot.rotate(angle);
  }
}
