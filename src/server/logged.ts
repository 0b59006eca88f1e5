import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isRobotError } from '../domain/errors.js';
import { scoped } from '../logging.js';
import { ToolContracts, type ToolName } from '../tools/contracts.js';

const log = scoped('tool');

/**
 * Wraps a tool handler to log every call with its duration. Robot validation errors
 * become `isError` results; anything else propagates to the SDK.
 */
export function logged<A extends unknown[]>(
  name: ToolName,
  handler: (...args: A) => CallToolResult | Promise<CallToolResult>,
): (...args: A) => Promise<CallToolResult> {
  // Tools without an input schema receive only the request extra; don't log it.
  const hasInput = 'inputSchema' in ToolContracts[name];
  return async (...args: A): Promise<CallToolResult> => {
    const t0 = Date.now();
    const input = hasInput ? args[0] : undefined;
    try {
      const res = await handler(...args);
      log.info({ name, args: input, ok: true, ms: Date.now() - t0 }, 'tool call');
      return res;
    } catch (e) {
      if (isRobotError(e)) {
        log.warn({ name, args: input, ok: false, kind: e.kind, ms: Date.now() - t0 }, e.message);
        return { isError: true, content: [{ type: 'text', text: `${e.kind}: ${e.message}` }] };
      }
      log.error({ name, args: input, err: e, ms: Date.now() - t0 }, 'tool call failed');
      throw e;
    }
  };
}
