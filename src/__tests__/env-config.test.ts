import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadAppConfigFromEnv } from '../server/config.js';
import { createAppContext, createAppContextOrExit } from '../server/context.js';
import { ZodError } from 'zod';
import { RobotError } from '../domain/errors.js';

const OLD_ENV = { ...process.env };

describe('loadAppConfigFromEnv', () => {
  beforeEach(() => {
    process.env = { ...OLD_ENV };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('LEGBOT_')) delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = { ...OLD_ENV };
  });

  it('returns defaults when env is not set', () => {
    expect(loadAppConfigFromEnv()).toEqual({
      robot: { id: 'legbot-1', name: 'Legbot', energySource: 'electric' },
      locomotion: { legCount: 4 },
      initial: { x: 0, y: 0, orientation: 0, energy: 100, autoActivate: false },
    });
  });

  it('parses valid env values', () => {
    process.env['LEGBOT_ID'] = 'hex-9';
    process.env['LEGBOT_NAME'] = 'Hexa';
    process.env['LEGBOT_ENERGY_SOURCE'] = 'SOLAR';
    process.env['LEGBOT_LEG_COUNT'] = '6';
    process.env['LEGBOT_POSITION_X'] = '1.5';
    process.env['LEGBOT_POSITION_Y'] = '-2';
    process.env['LEGBOT_ORIENTATION'] = '0.25';
    process.env['LEGBOT_ENERGY'] = '55';
    process.env['LEGBOT_AUTO_ACTIVATE'] = 'true';
    const cfg = loadAppConfigFromEnv();
    expect(cfg.robot).toEqual({ id: 'hex-9', name: 'Hexa', energySource: 'solar' });
    expect(cfg.locomotion.legCount).toBe(6);
    expect(cfg.initial).toEqual({
      x: 1.5,
      y: -2,
      orientation: 0.25,
      energy: 55,
      autoActivate: true,
    });
  });

  it('throws on malformed values', () => {
    process.env['LEGBOT_LEG_COUNT'] = 'abc';
    expect(() => loadAppConfigFromEnv()).toThrow();
    process.env['LEGBOT_LEG_COUNT'] = '4';
    process.env['LEGBOT_ENERGY'] = '150';
    expect(() => loadAppConfigFromEnv()).toThrow();
    process.env['LEGBOT_ENERGY'] = '50';
    process.env['LEGBOT_ENERGY_SOURCE'] = 'nuclear';
    expect(() => loadAppConfigFromEnv()).toThrow();
  });

  it('accepts only true/false/1/0 for the auto-activate flag', () => {
    process.env['LEGBOT_AUTO_ACTIVATE'] = '0';
    expect(loadAppConfigFromEnv().initial.autoActivate).toBe(false);
    process.env['LEGBOT_AUTO_ACTIVATE'] = 'TRUE';
    expect(loadAppConfigFromEnv().initial.autoActivate).toBe(true);
    process.env['LEGBOT_AUTO_ACTIVATE'] = 'yes';
    expect(() => loadAppConfigFromEnv()).toThrow(ZodError);
  });

  it('builds a context whose robot follows the config', () => {
    process.env['LEGBOT_LEG_COUNT'] = '8';
    process.env['LEGBOT_AUTO_ACTIVATE'] = 'true';
    const { robot } = createAppContext();
    expect(robot.locomotion.legCount).toBe(8);
    expect(robot.isActive).toBe(true);
    expect(robot.name).toBe('Legbot');
  });

  it('surfaces an odd leg count as a robot error', () => {
    process.env['LEGBOT_LEG_COUNT'] = '3';
    expect(() => createAppContext()).toThrow(RobotError);
  });

  it('exits with code 1 when the configuration is rejected', () => {
    process.env['LEGBOT_AUTO_ACTIVATE'] = 'yes';
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit ${code}`);
    });
    expect(() => createAppContextOrExit(createAppContext, exit)).toThrow('exit 1');
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('returns the context when the configuration is valid', () => {
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit ${code}`);
    });
    expect(createAppContextOrExit(createAppContext, exit).robot.name).toBe('Legbot');
    expect(exit).not.toHaveBeenCalled();
  });
});
