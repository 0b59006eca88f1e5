import { z } from 'zod';

export const DIRECTIONS = ['forward', 'backward', 'left', 'right'] as const;
export const DirectionSchema = z.enum(DIRECTIONS);
export type Direction = z.infer<typeof DirectionSchema>;

export const ENERGY_SOURCES = ['solar', 'electric', 'fossil_fuel'] as const;
export const EnergySourceSchema = z.enum(ENERGY_SOURCES);
export type EnergySource = z.infer<typeof EnergySourceSchema>;

export type Position = {
  x: number;
  y: number;
};
