import { createLeggedRobot, type LeggedRobot } from '../domain/Robot.js';
import { scoped } from '../logging.js';
import { loadAppConfigFromEnv, type AppConfig } from './config.js';

export type AppContext = {
  robot: LeggedRobot;
};

export function createAppContext(appConfig: AppConfig = loadAppConfigFromEnv()): AppContext {
  const log = scoped('bootstrap');
  const robot = createLeggedRobot({
    id: appConfig.robot.id,
    name: appConfig.robot.name,
    energySource: appConfig.robot.energySource,
    legCount: appConfig.locomotion.legCount,
    position: { x: appConfig.initial.x, y: appConfig.initial.y },
    orientation: appConfig.initial.orientation,
    energy: appConfig.initial.energy,
  });
  if (appConfig.initial.autoActivate) robot.activate();
  log.info({ robot: robot.snapshot(), legCount: robot.locomotion.legCount }, 'robot ready');
  return { robot };
}

/** Startup guard: a bad configuration is logged and ends the process with code 1. */
export function createAppContextOrExit(
  create: () => AppContext = createAppContext,
  exit: (code: number) => never = (code) => process.exit(code),
): AppContext {
  try {
    return create();
  } catch (err) {
    scoped('bootstrap').error({ err }, 'Invalid robot configuration');
    return exit(1);
  }
}
