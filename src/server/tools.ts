import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolContracts } from '../tools/contracts.js';
import { MoveRobot, type MoveRobotArgs } from '../usecases/MoveRobot.js';
import { RotateRobot, type RotateRobotArgs } from '../usecases/RotateRobot.js';
import { logged } from './logged.js';
import type { AppContext } from './context.js';

function text(message: string, structured?: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: message }],
    ...(structured ? { structuredContent: structured } : {}),
  };
}

function fmt(n: number): string {
  return Number(n.toFixed(4)).toString();
}

export function registerTools(server: McpServer, ctx: AppContext): void {
  const { robot } = ctx;
  const moveRobot = new MoveRobot(robot);
  const rotateRobot = new RotateRobot(robot);

  server.registerTool(
    'activate',
    ToolContracts.activate,
    logged('activate', () => {
      robot.activate();
      return text('active', { active: true });
    }),
  );

  server.registerTool(
    'deactivate',
    ToolContracts.deactivate,
    logged('deactivate', () => {
      robot.deactivate();
      return text('inactive', { active: false });
    }),
  );

  server.registerTool(
    'move',
    ToolContracts.move,
    logged('move', (args: MoveRobotArgs) => {
      const out = moveRobot.execute(args);
      if (out.status === 'inactive') return text('inactive: robot must be activated first', out);
      return text(
        `moved to (${fmt(out.position.x)}, ${fmt(out.position.y)}); energy ${fmt(out.energy)}`,
        out,
      );
    }),
  );

  server.registerTool(
    'rotate',
    ToolContracts.rotate,
    logged('rotate', (args: RotateRobotArgs) => {
      const out = rotateRobot.execute(args);
      if (out.status === 'inactive') return text('inactive: robot must be activated first', out);
      return text(`orientation ${fmt(out.orientation)} rad; energy ${fmt(out.energy)}`, out);
    }),
  );

  server.registerTool(
    'stop',
    ToolContracts.stop,
    logged('stop', () => {
      const out = robot.stop();
      if (out.status === 'inactive') return text('already inactive', out);
      return text(`stopped in ${fmt(out.stopTimeSeconds)}s; energy ${fmt(out.energy)}`, out);
    }),
  );

  server.registerTool(
    'recharge',
    ToolContracts.recharge,
    logged('recharge', () => {
      const out = robot.recharge();
      if (out.status === 'full') return text('already fully charged', out);
      return text(`recharged ${fmt(out.before)}% -> ${fmt(out.energy)}% (${out.estimate})`, out);
    }),
  );

  server.registerTool(
    'get_status',
    ToolContracts.get_status,
    logged('get_status', () =>
      text(robot.status(), { ...robot.snapshot(), legCount: robot.locomotion.legCount }),
    ),
  );

  server.registerTool(
    'get_pose',
    ToolContracts.get_pose,
    logged('get_pose', () => {
      const pose = { ...robot.position, orientation: robot.orientation };
      return text(JSON.stringify(pose), pose);
    }),
  );
}
