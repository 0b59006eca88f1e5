import { MoveRobotInput } from '../usecases/MoveRobot.js';
import { RotateRobotInput } from '../usecases/RotateRobot.js';

// Single place to declare MCP tool contracts (inputs). Keep code as the source of truth.

export const ToolContracts = {
  activate: { description: 'Activate the robot so it accepts motion commands.' },
  deactivate: { description: 'Deactivate the robot.' },
  move: {
    description: 'Move by direction (forward/backward/left/right) and distance.',
    inputSchema: MoveRobotInput,
  },
  rotate: {
    description: 'Rotate by degrees or radians (negative = left).',
    inputSchema: RotateRobotInput,
  },
  stop: { description: 'Emergency stop; stabilizes the legs.' },
  recharge: { description: 'Recharge from the energy source.' },
  get_status: { description: 'Status report.' },
  get_pose: { description: 'Current position and orientation.' },
} as const;

export type ToolName = keyof typeof ToolContracts;
