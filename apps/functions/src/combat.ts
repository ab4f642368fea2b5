import { applyHeal, canShoot, isEnemy, takeDamage } from "./agents";
import { recordEnemyDamage } from "./stalemate";
import type { AgentState, Projectile, ProjectileType, SimulationContext } from "./types";
import {
  add,
  angleTo,
  distance,
  dot,
  fromAngle,
  normalizeAngle,
  scale,
  sub,
  wrapAngle,
} from "./vectorMath";

export const PROJECTILE_SPEED_MULTIPLIERS: Record<ProjectileType, number> = {
  laser: 2.0,
  cannon: 0.65,
  missile: 0.8,
  bullet: 1.0,
  heal: 1.8,
  shockwave: 2.5,
};

export const POINT_BLANK_SPLASH_TTL = 0.15;
export const LINE_OF_FIRE_RADIUS_FACTOR = 1.2;

export type FireReadiness =
  | "ready"
  | "cooldown"
  | "no_target"
  | "out_of_range"
  | "too_close"
  | "misaligned"
  | "blocked";

export function aimTolerance(agent: AgentState): number {
  return 10 + agent.intelligence * 3;
}

export function rotateTurretTowards(agent: AgentState, targetAngle: number, dt: number): void {
  const diff = wrapAngle(targetAngle - agent.weaponOrientation);
  const maxRotation = agent.turretRotationSpeed * dt;

  if (Math.abs(diff) <= maxRotation) {
    agent.weaponOrientation = normalizeAngle(targetAngle);
    return;
  }

  agent.weaponOrientation = normalizeAngle(agent.weaponOrientation + Math.sign(diff) * maxRotation);
}

export function updateTurrets(ctx: SimulationContext): void {
  for (const agent of ctx.agents) {
    if (!agent.alive) {
      continue;
    }

    const target = agent.targetId ? ctx.agentsById.get(agent.targetId) : undefined;
    const aim = target && target.alive ? angleTo(agent.position, target.position) : agent.orientation;
    rotateTurretTowards(agent, aim, ctx.dt);
  }
}

export function hasClearLineOfFire(
  shooter: AgentState,
  target: AgentState,
  agents: readonly AgentState[],
  botRadius: number
): boolean {
  const segment = sub(target.position, shooter.position);
  const lengthSquared = dot(segment, segment);
  if (lengthSquared === 0) {
    return true;
  }

  const targetDistance = Math.sqrt(lengthSquared);
  const blockingRadius = botRadius * LINE_OF_FIRE_RADIUS_FACTOR;

  for (const other of agents) {
    if (other === shooter || other === target || !other.alive || isEnemy(shooter, other)) {
      continue;
    }

    const t = Math.max(0, Math.min(1, dot(sub(other.position, shooter.position), segment) / lengthSquared));
    const closest = add(shooter.position, scale(segment, t));
    if (distance(other.position, closest) >= blockingRadius) {
      continue;
    }

    if (distance(shooter.position, other.position) < targetDistance) {
      return false;
    }
  }

  return true;
}

export function fireReadiness(
  agent: AgentState,
  target: AgentState | undefined,
  ctx: Pick<SimulationContext, "time" | "agents" | "config">
): FireReadiness {
  if (!canShoot(agent, ctx.time)) {
    return "cooldown";
  }

  if (!target || !target.alive) {
    return "no_target";
  }

  const gap = distance(agent.position, target.position);
  if (gap > agent.maxRange) {
    return "out_of_range";
  }

  if (!agent.allowsPointBlank && gap < agent.minRange) {
    return "too_close";
  }

  const aimError = wrapAngle(angleTo(agent.position, target.position) - agent.weaponOrientation);
  if (Math.abs(aimError) > aimTolerance(agent)) {
    return "misaligned";
  }

  if (!agent.isHealer && !hasClearLineOfFire(agent, target, ctx.agents, ctx.config.botRadius)) {
    return "blocked";
  }

  return "ready";
}

export function dealEnemyDamage(
  shooter: AgentState | undefined,
  shooterId: string,
  victim: AgentState,
  amount: number,
  ctx: SimulationContext
): number {
  const actual = takeDamage(victim, amount);
  if (shooter) {
    shooter.damageDealt += actual;
  }

  if (actual > 0) {
    recordEnemyDamage(ctx.stalemate, ctx.frame);
  }

  ctx.events.push({ type: "hit", shooterId, targetId: victim.id, damage: actual });

  if (!victim.alive && actual > 0) {
    if (shooter) {
      shooter.kills += 1;
    }

    ctx.events.push({ type: "kill", killerId: shooterId, victimId: victim.id });
  }

  return actual;
}

export function dealHealing(
  healer: AgentState | undefined,
  healerId: string,
  patient: AgentState,
  amount: number,
  ctx: SimulationContext
): number {
  const restored = applyHeal(patient, amount);
  if (healer) {
    healer.damageDealt += restored;
  }

  ctx.events.push({ type: "heal", shooterId: healerId, targetId: patient.id, amount: restored });
  return restored;
}

function spawnProjectile(agent: AgentState, target: AgentState, ctx: SimulationContext): Projectile {
  const direction = fromAngle(agent.weaponOrientation);
  const speed = ctx.config.projectileSpeed * PROJECTILE_SPEED_MULTIPLIERS[agent.projectileType];

  return {
    shooterId: agent.id,
    targetId: target.id,
    position: add(agent.position, scale(direction, agent.muzzleOffset)),
    velocity: scale(direction, speed),
    damage: agent.damagePerShot,
    isHeal: agent.isHealer,
    alive: true,
    projectileType: agent.projectileType,
    ttl: -1,
    cosmetic: false,
  };
}

function pointBlankSplash(agent: AgentState, target: AgentState): Projectile {
  return {
    shooterId: agent.id,
    targetId: target.id,
    position: { x: target.position.x, y: target.position.y },
    velocity: { x: 0, y: 0 },
    damage: 0,
    isHeal: agent.isHealer,
    alive: true,
    projectileType: agent.projectileType,
    ttl: POINT_BLANK_SPLASH_TTL,
    cosmetic: true,
  };
}

export function fireWeapon(agent: AgentState, target: AgentState, ctx: SimulationContext): void {
  agent.lastShotTime = ctx.time;

  const pointBlank = agent.allowsPointBlank && distance(agent.position, target.position) < agent.muzzleOffset;
  if (pointBlank) {
    if (agent.isHealer) {
      dealHealing(agent, agent.id, target, agent.damagePerShot, ctx);
    } else if (isEnemy(agent, target)) {
      dealEnemyDamage(agent, agent.id, target, agent.damagePerShot, ctx);
    }

    ctx.projectiles.push(pointBlankSplash(agent, target));
  } else {
    ctx.projectiles.push(spawnProjectile(agent, target, ctx));
  }

  ctx.events.push({ type: "shot", shooterId: agent.id, targetId: target.id, isHeal: agent.isHealer, pointBlank });
}

export function resolveFiring(ctx: SimulationContext): void {
  for (const agent of ctx.agents) {
    if (!agent.alive || !agent.targetId) {
      continue;
    }

    const target = ctx.agentsById.get(agent.targetId);
    if (!target || fireReadiness(agent, target, ctx) !== "ready") {
      continue;
    }

    fireWeapon(agent, target, ctx);
  }
}
