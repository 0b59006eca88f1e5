import pino, { type Logger } from 'pino';
import { z } from 'zod';

const LevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .catch('info');

const level = LevelSchema.parse(process.env['LOG_LEVEL']?.toLowerCase() ?? 'info');

// stdout carries the MCP stdio transport; logs go to stderr.
const destination = pino.destination({ dest: 2, sync: false });

export const logger: Logger = pino(
  {
    level,
    base: { app: 'legbot-mcp' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  destination,
);

/** Child logger tagged with `scope`, plus any bindings such as the robot's id. */
export function scoped(scope: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ scope, ...bindings });
}
