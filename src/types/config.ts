import { z } from 'zod';
import { EnergySourceSchema } from './controls.js';

// Centralized config schemas (code-as-contracts). Keep logic separate.

export const RobotIdentityConfigSchema = z.object({
  id: z.string().min(1).default('legbot-1'),
  name: z.string().min(1).default('Legbot'),
  energySource: EnergySourceSchema.default('electric'),
});
export type RobotIdentityConfig = z.infer<typeof RobotIdentityConfigSchema>;

// Even/minimum checks live in the domain so they surface as InvalidLegCount.
export const LocomotionConfigSchema = z.object({
  legCount: z.number().int().default(4),
});
export type LocomotionConfig = z.infer<typeof LocomotionConfigSchema>;

export const InitialStateConfigSchema = z.object({
  x: z.number().finite().default(0),
  y: z.number().finite().default(0),
  orientation: z.number().finite().default(0),
  energy: z.number().min(0).max(100).default(100),
  autoActivate: z.boolean().default(false),
});
export type InitialStateConfig = z.infer<typeof InitialStateConfigSchema>;
