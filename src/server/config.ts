import { z } from 'zod';
import {
  InitialStateConfigSchema,
  LocomotionConfigSchema,
  RobotIdentityConfigSchema,
} from '../types/config.js';

/**
 * Aggregated application configuration. Parse at the boundary (process.env).
 * Keeps per-feature schemas reusable while centralizing env inputs.
 */
export const AppConfigSchema = z.object({
  robot: RobotIdentityConfigSchema,
  locomotion: LocomotionConfigSchema,
  initial: InitialStateConfigSchema,
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

function num(name: string): number | undefined {
  const v = process.env[name];
  return v === undefined || v === '' ? undefined : Number(v);
}

const FlagSchema = z.enum(['true', 'false', '1', '0']);

function flag(name: string): boolean | undefined {
  const v = process.env[name];
  if (v === undefined || v === '') return undefined;
  const parsed = FlagSchema.parse(v.toLowerCase());
  return parsed === 'true' || parsed === '1';
}

export function loadAppConfigFromEnv(): AppConfig {
  // Map env -> config fields; rely on sub-schemas for defaults and validation.
  const raw = {
    robot: {
      id: process.env['LEGBOT_ID'],
      name: process.env['LEGBOT_NAME'],
      energySource: process.env['LEGBOT_ENERGY_SOURCE']?.toLowerCase(),
    },
    locomotion: {
      legCount: num('LEGBOT_LEG_COUNT'),
    },
    initial: {
      x: num('LEGBOT_POSITION_X'),
      y: num('LEGBOT_POSITION_Y'),
      orientation: num('LEGBOT_ORIENTATION'),
      energy: num('LEGBOT_ENERGY'),
      autoActivate: flag('LEGBOT_AUTO_ACTIVATE'),
    },
  } as const;
  return AppConfigSchema.parse(raw);
}
