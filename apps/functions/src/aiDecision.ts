import { isEnemy, preferredRange } from "./agents";
import { BEHAVIOR_STEERING } from "./behaviors";
import { detectWalls, steerAgent, wallEscapeAngle, type SteeringCommand } from "./movement";
import { nearestEnemy, weakestAlly } from "./targeting";
import type { AgentState, SimulationContext } from "./types";
import {
  add,
  angleOf,
  angleTo,
  distance,
  fromAngle,
  normalize,
  normalizeAngle,
  scale,
  sub,
  type Vector2,
} from "./vectorMath";

export const WALL_ESCAPE_SPEED = 0.85;
export const DISPERSAL_RADIUS = 300;
export const DISPERSAL_ENEMY_WEIGHT = 2;
export const DISPERSAL_BLEND = 0.7;
export const WANDER_SPEED = 0.5;
export const WANDER_CENTER_RADIUS = 50;

const PROTECTOR_ARRIVAL_RADIUS = 10;

function tickTimers(agent: AgentState, ctx: SimulationContext): void {
  agent.strafeTimer -= ctx.dt;
  if (agent.strafeTimer <= 0) {
    agent.strafeDirection = ctx.rng.sign();
    agent.strafeTimer = ctx.rng.uniform(1.5, 3.0);
  }

  agent.wanderTimer -= ctx.dt;
}

export function wanderSteering(agent: AgentState, ctx: SimulationContext): SteeringCommand {
  const center = { x: ctx.config.arenaWidth / 2, y: ctx.config.arenaHeight / 2 };
  if (agent.wanderTimer <= 0) {
    agent.wanderAngle = normalizeAngle(angleTo(agent.position, center) + ctx.rng.uniform(-45, 45));
    agent.wanderTimer = ctx.rng.uniform(1.0, 2.0);
  }

  const speed = distance(agent.position, center) < WANDER_CENTER_RADIUS ? 0 : WANDER_SPEED;
  return { direction: agent.wanderAngle, speed };
}

export function dispersalVector(agent: AgentState, agents: readonly AgentState[]): Vector2 | null {
  let totalWeight = 0;
  let weighted = { x: 0, y: 0 };

  for (const other of agents) {
    if (other === agent || !other.alive) {
      continue;
    }

    if (distance(agent.position, other.position) > DISPERSAL_RADIUS) {
      continue;
    }

    const weight = isEnemy(agent, other) ? DISPERSAL_ENEMY_WEIGHT : 1;
    weighted = add(weighted, scale(other.position, weight));
    totalWeight += weight;
  }

  if (totalWeight === 0) {
    return null;
  }

  const centroid = scale(weighted, 1 / totalWeight);
  const awayFromCrowd = normalize(sub(agent.position, centroid));
  if (awayFromCrowd.x === 0 && awayFromCrowd.y === 0) {
    return null;
  }

  return awayFromCrowd;
}

export function protectorSteering(agent: AgentState, ctx: SimulationContext): SteeringCommand {
  const ally = weakestAlly(agent, ctx.agents);
  if (!ally) {
    return wanderSteering(agent, ctx);
  }

  const enemy = nearestEnemy(agent, ctx.agents);
  const idealDistance = Math.min(55, Math.max(agent.minRange * 0.5, 40));
  const maxFollowDistance = Math.min(agent.maxRange * 0.4, 150);

  let standOff = ally.position;
  if (enemy) {
    const shield = normalize(sub(ally.position, enemy.position));
    if (shield.x !== 0 || shield.y !== 0) {
      standOff = add(ally.position, scale(shield, idealDistance));
    }
  } else {
    standOff = add(ally.position, fromAngle(ally.orientation + 180, idealDistance));
  }

  const toStandOff = distance(agent.position, standOff);
  if (toStandOff < PROTECTOR_ARRIVAL_RADIUS) {
    const facing = angleTo(agent.position, (enemy ?? ally).position);
    return { direction: normalizeAngle(facing + ctx.rng.uniform(-15, 15)), speed: 0.1 };
  }

  const allyDistance = distance(agent.position, ally.position);
  let speed = 0.5;
  if (allyDistance > maxFollowDistance) {
    speed = 1;
  } else if (allyDistance > idealDistance * 2) {
    speed = 0.95;
  } else if (toStandOff > idealDistance) {
    speed = 0.85;
  } else if (toStandOff > 30) {
    speed = 0.7;
  }

  return { direction: angleTo(agent.position, standOff), speed };
}

export function decideSteering(agent: AgentState, ctx: SimulationContext): SteeringCommand {
  tickTimers(agent, ctx);

  const walls = detectWalls(agent.position, ctx.config);
  const escape = agent.wallEscapeTimer > 0 ? wallEscapeAngle(walls) : null;

  if (ctx.stalemate.dispersalEngaged) {
    const awayFromCrowd = dispersalVector(agent, ctx.agents);
    if (awayFromCrowd) {
      const heading =
        escape === null
          ? awayFromCrowd
          : add(scale(awayFromCrowd, DISPERSAL_BLEND), fromAngle(escape, 1 - DISPERSAL_BLEND));
      return { direction: angleOf(heading), speed: 1 };
    }
  }

  if (escape !== null) {
    return { direction: escape, speed: WALL_ESCAPE_SPEED };
  }

  if (agent.isHealer || agent.behavior === "PROTECTOR") {
    return protectorSteering(agent, ctx);
  }

  const target = agent.targetId ? ctx.agentsById.get(agent.targetId) : undefined;
  if (!target || !target.alive) {
    return wanderSteering(agent, ctx);
  }

  const gap = distance(agent.position, target.position);
  const bearing = angleTo(agent.position, target.position);

  if (!agent.allowsPointBlank && gap < agent.minRange) {
    const urgency = 1 - gap / agent.minRange;
    return { direction: normalizeAngle(bearing + 180), speed: Math.min(1, 0.4 + 0.6 * urgency) };
  }

  if (gap > agent.maxRange) {
    return { direction: bearing, speed: 1 };
  }

  if (ctx.stalemate.stalemateEngaged) {
    return { direction: bearing, speed: agent.team === 1 ? 1 : 0 };
  }

  return BEHAVIOR_STEERING[agent.behavior]({
    agent,
    target,
    distance: gap,
    bearing,
    preferredRange: preferredRange(agent),
    walls,
    targetWalls: detectWalls(target.position, ctx.config),
    rng: ctx.rng,
  });
}

export function updateMovement(ctx: SimulationContext): void {
  for (const agent of ctx.agents) {
    if (!agent.alive) {
      continue;
    }

    agent.wallEscapeTimer = Math.max(0, agent.wallEscapeTimer - ctx.dt);
    const command = decideSteering(agent, ctx);
    steerAgent(agent, command, ctx);
  }
}
