import type { BattleConfig } from "./simulationConfig";
import type { AgentState } from "./types";
import {
  add,
  angleOf,
  distance,
  fromAngle,
  normalizeAngle,
  scale,
  wrapAngle,
  type Vector2,
} from "./vectorMath";

export const ROTATION_BOOST = 4;
export const TURNING_THRESHOLD = 25;
export const MIN_SPEED_FRACTION = 0.25;
export const LOW_AGILITY_THRESHOLD = 0.3;
export const LOW_AGILITY_TURN_ANGLE = 60;
export const LOW_AGILITY_SPEED_FRACTION = 0.15;
export const REVERSE_TURN_ANGLE = 120;

export const ARENA_EDGE_PADDING = 40;
export const WALL_MARGIN = 50;
export const WALL_BUFFER = 25;
export const WALL_ESCAPE_DURATION = 0.5;
export const SEPARATION_FACTOR = 2.2;

export const WALL_SIDES = ["left", "right", "top", "bottom"] as const;
export type WallSide = (typeof WALL_SIDES)[number];

const WALL_NORMALS: Record<WallSide, Vector2> = {
  left: { x: 1, y: 0 },
  right: { x: -1, y: 0 },
  top: { x: 0, y: 1 },
  bottom: { x: 0, y: -1 },
};

export interface SteeringCommand {
  direction: number;
  speed: number;
}

export interface MovementWorld {
  config: BattleConfig;
  dt: number;
  time: number;
  agents: readonly AgentState[];
}

export function effectiveSpeedMultiplier(angleDiff: number, speedMultiplier: number, agility: number): number {
  const absDiff = Math.abs(angleDiff);
  const penalty = Math.min(1, absDiff / 90);
  let effective = speedMultiplier * (1 - penalty * (1 - agility));
  effective = Math.max(effective, speedMultiplier * MIN_SPEED_FRACTION);

  if (agility < LOW_AGILITY_THRESHOLD && absDiff > LOW_AGILITY_TURN_ANGLE) {
    effective = speedMultiplier * LOW_AGILITY_SPEED_FRACTION;
  }

  if (absDiff > REVERSE_TURN_ANGLE) {
    effective = speedMultiplier * Math.max(0.2, agility * 0.5);
  }

  return effective;
}

export function rotateChassisTowards(agent: AgentState, targetAngle: number, dt: number, turnMultiplier = 1): void {
  const diff = wrapAngle(targetAngle - agent.orientation);
  const maxRotation = (agent.rotationSpeed + ROTATION_BOOST) * dt * turnMultiplier;

  if (Math.abs(diff) <= maxRotation) {
    agent.orientation = normalizeAngle(targetAngle);
    return;
  }

  agent.orientation = normalizeAngle(agent.orientation + Math.sign(diff) * maxRotation);
}

export function detectWalls(position: Vector2, config: BattleConfig): WallSide[] {
  const threshold = WALL_MARGIN + WALL_BUFFER;
  const walls: WallSide[] = [];

  if (position.x <= threshold) {
    walls.push("left");
  }

  if (position.x >= config.arenaWidth - threshold) {
    walls.push("right");
  }

  if (position.y <= threshold) {
    walls.push("top");
  }

  if (position.y >= config.arenaHeight - threshold) {
    walls.push("bottom");
  }

  return walls;
}

export function wallEscapeAngle(walls: readonly WallSide[]): number | null {
  if (!walls.length) {
    return null;
  }

  const sum = walls.reduce((acc, wall) => add(acc, WALL_NORMALS[wall]), { x: 0, y: 0 });
  if (sum.x === 0 && sum.y === 0) {
    return null;
  }

  return angleOf(sum);
}

export function isHeadingIntoWall(heading: number, walls: readonly WallSide[]): boolean {
  const direction = fromAngle(heading);
  return walls.some((wall) => {
    const normal = WALL_NORMALS[wall];
    return direction.x * normal.x + direction.y * normal.y < -0.1;
  });
}

export function applyMovement(agent: AgentState, delta: Vector2, world: MovementWorld): boolean {
  const { config } = world;
  const minX = config.botRadius + ARENA_EDGE_PADDING;
  const minY = config.botRadius + ARENA_EDGE_PADDING;
  const maxX = config.arenaWidth - config.botRadius - ARENA_EDGE_PADDING;
  const maxY = config.arenaHeight - config.botRadius - ARENA_EDGE_PADDING;

  const desired = add(agent.position, delta);
  const next = {
    x: Math.min(maxX, Math.max(minX, desired.x)),
    y: Math.min(maxY, Math.max(minY, desired.y)),
  };

  if (next.x !== desired.x || next.y !== desired.y) {
    agent.wallEscapeTimer = WALL_ESCAPE_DURATION;
    agent.lastWallContact = world.time;
  }

  const minSeparation = config.botRadius * SEPARATION_FACTOR;
  for (const other of world.agents) {
    if (other === agent || !other.alive) {
      continue;
    }

    const nextDistance = distance(next, other.position);
    if (nextDistance >= minSeparation) {
      continue;
    }

    const currentDistance = distance(agent.position, other.position);
    if (currentDistance >= minSeparation || nextDistance <= currentDistance) {
      agent.velocity = { x: 0, y: 0 };
      return false;
    }
  }

  const moved = { x: next.x - agent.position.x, y: next.y - agent.position.y };
  agent.velocity = world.dt > 0 ? scale(moved, 1 / world.dt) : { x: 0, y: 0 };
  agent.position = next;
  return true;
}

export function steerAgent(agent: AgentState, command: SteeringCommand, world: MovementWorld): void {
  const heading = normalizeAngle(command.direction);
  const diff = wrapAngle(heading - agent.orientation);
  agent.targetOrientation = heading;
  agent.isTurning = Math.abs(diff) > TURNING_THRESHOLD;

  rotateChassisTowards(agent, heading, world.dt);

  if (command.speed <= 0 || agent.speed <= 0) {
    agent.velocity = { x: 0, y: 0 };
    return;
  }

  const effective = effectiveSpeedMultiplier(diff, command.speed, agent.agility);
  const delta = fromAngle(agent.orientation, agent.speed * effective * world.dt);
  applyMovement(agent, delta, world);
}
