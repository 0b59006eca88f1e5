import 'dotenv/config';
import { createLeggedRobot } from '../domain/Robot.js';
import { isRobotError } from '../domain/errors.js';

// Walks a quadruped through the reference scenario and prints its state after each step.
function main(): void {
  const robot = createLeggedRobot({
    id: 1,
    name: 'Scout-1',
    energySource: 'solar',
    legCount: 4,
    position: { x: 0, y: 0 },
    orientation: 0,
    energy: 100,
  });
  console.log(robot.status());

  const steps: Array<[string, () => unknown]> = [
    ['move forward 5 (inactive)', () => robot.move('forward', 5)],
    ['activate', () => robot.activate()],
    ['move forward 5', () => robot.move('forward', 5)],
    ['move right 2', () => robot.move('right', 2)],
    ['move up 1', () => robot.move('up', 1)],
    ['rotate +90deg', () => robot.rotate(Math.PI / 2)],
    ['move forward 3', () => robot.move('forward', 3)],
    ['stop', () => robot.stop()],
    ['recharge', () => robot.recharge()],
  ];

  for (const [label, run] of steps) {
    try {
      const out = run();
      console.log(`${label}: ${JSON.stringify(out ?? 'ok')}`);
    } catch (e) {
      if (!isRobotError(e)) throw e;
      console.log(`${label}: ${e.kind} (${e.message})`);
    }
  }

  console.log(robot.status());
  console.log(String(robot));
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
