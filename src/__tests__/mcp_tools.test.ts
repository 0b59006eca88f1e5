import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServer } from '../server/app.js';
import { createLeggedRobot } from '../domain/Robot.js';
import type { AppContext } from '../server/context.js';

const McpResult = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
  structuredContent: z.record(z.unknown()).optional(),
});

const Moved = z.object({
  status: z.literal('moved'),
  position: z.object({ x: z.number(), y: z.number() }),
  energy: z.number(),
});

describe('MCP tool surface', () => {
  let open: Array<{ client: Client; server: McpServer }> = [];

  afterEach(async () => {
    for (const { client, server } of open) {
      await client.close();
      await server.close();
    }
    open = [];
  });

  async function connect(): Promise<{ client: Client; ctx: AppContext }> {
    const ctx: AppContext = {
      robot: createLeggedRobot({
        id: 'mcp-1',
        name: 'Tester',
        energySource: 'electric',
        legCount: 4,
      }),
    };
    const server = createServer(ctx);
    const client = new Client({ name: 'legbot-test', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    open.push({ client, server });
    return { client, ctx };
  }

  async function call(client: Client, name: string, args: Record<string, unknown> = {}) {
    const res = (await client.callTool({ name, arguments: args })) as unknown;
    return McpResult.parse(res);
  }

  it('lists every robot tool', async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'activate',
      'deactivate',
      'get_pose',
      'get_status',
      'move',
      'recharge',
      'rotate',
      'stop',
    ]);
  });

  it('reports inactive moves, then moves after activate', async () => {
    const { client, ctx } = await connect();
    const idle = await call(client, 'move', { direction: 'forward', distance: 5 });
    expect(idle.isError).not.toBe(true);
    expect(idle.content[0]?.text).toBe('inactive: robot must be activated first');
    expect(idle.structuredContent).toEqual({ status: 'inactive' });

    await call(client, 'activate');
    const moved = await call(client, 'move', { direction: 'forward', distance: 5 });
    expect(moved.content[0]?.text).toBe('moved to (5, 0); energy 99.4');
    const out = Moved.parse(moved.structuredContent);
    expect(out.position.x).toBeCloseTo(5);
    expect(out.energy).toBeCloseTo(99.4);
    expect(ctx.robot.energy).toBeCloseTo(99.4);
  });

  it('returns robot validation errors as tool errors', async () => {
    const { client, ctx } = await connect();
    await call(client, 'activate');
    const badDirection = await call(client, 'move', { direction: 'up', distance: 1 });
    expect(badDirection.isError).toBe(true);
    expect(badDirection.content[0]?.text).toMatch(/^InvalidDirection: /);
    const shouted = await call(client, 'move', { direction: 'FORWARD', distance: 1 });
    expect(shouted.isError).toBe(true);
    expect(shouted.content[0]?.text).toMatch(/^InvalidDirection: /);
    const badDistance = await call(client, 'move', { direction: 'forward', distance: -1 });
    expect(badDistance.isError).toBe(true);
    expect(badDistance.content[0]?.text).toMatch(/^InvalidDistance: /);
    expect(ctx.robot.position).toEqual({ x: 0, y: 0 });
    expect(ctx.robot.energy).toBe(100);
  });

  it('rotates, stops and recharges', async () => {
    const { client, ctx } = await connect();
    await call(client, 'activate');
    const turned = await call(client, 'rotate', { degrees: 90 });
    expect(turned.isError).not.toBe(true);
    expect(ctx.robot.orientation).toBeCloseTo(Math.PI / 2);

    const stopped = await call(client, 'stop');
    expect(stopped.structuredContent).toMatchObject({
      status: 'stopped',
      stopTimeSeconds: 2,
      energyCost: 5,
    });

    const recharged = await call(client, 'recharge');
    expect(recharged.structuredContent).toMatchObject({
      status: 'recharged',
      estimate: '2-3 hours',
    });
    expect(ctx.robot.energy).toBe(100);

    const full = await call(client, 'recharge');
    expect(full.content[0]?.text).toBe('already fully charged');
  });

  it('exposes status and pose', async () => {
    const { client } = await connect();
    const status = await call(client, 'get_status');
    expect(status.content[0]?.text.split('\n')[0]).toBe('=== Tester Status ===');
    expect(status.structuredContent).toMatchObject({ legCount: 4, kind: 'legged', active: false });

    const pose = await call(client, 'get_pose');
    expect(pose.structuredContent).toEqual({ x: 0, y: 0, orientation: 0 });
    expect(pose.content[0]?.text).toBe('{"x":0,"y":0,"orientation":0}');
  });

  it('deactivates the robot', async () => {
    const { client, ctx } = await connect();
    await call(client, 'activate');
    expect(ctx.robot.isActive).toBe(true);
    await call(client, 'deactivate');
    expect(ctx.robot.isActive).toBe(false);
  });
});
