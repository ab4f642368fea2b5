import { isEnemy, takeDamage } from "./agents";
import { dealEnemyDamage, dealHealing } from "./combat";
import type { AgentState, Projectile, SimulationContext } from "./types";
import { add, distance, scale } from "./vectorMath";

export const FRIENDLY_FIRE_DIVISOR = 4;
export const MIN_RANGE_HIT_FACTOR = 0.95;

function insideDeadZone(shooter: AgentState | undefined, struck: AgentState): boolean {
  if (!shooter || shooter.allowsPointBlank) {
    return false;
  }

  return distance(shooter.position, struck.position) < shooter.minRange * MIN_RANGE_HIT_FACTOR;
}

function findStruckAgent(projectile: Projectile, ctx: SimulationContext): AgentState | null {
  const shooter = ctx.agentsById.get(projectile.shooterId);

  for (const agent of ctx.agents) {
    if (!agent.alive || agent.id === projectile.shooterId || insideDeadZone(shooter, agent)) {
      continue;
    }

    if (ctx.collision.hitTest(projectile.position, agent)) {
      return agent;
    }
  }

  return null;
}

function resolveContact(projectile: Projectile, struck: AgentState, ctx: SimulationContext): boolean {
  const shooter = ctx.agentsById.get(projectile.shooterId);
  const friendly = shooter ? !isEnemy(shooter, struck) : false;

  if (projectile.isHeal) {
    if (!friendly && struck.id !== projectile.targetId) {
      return false;
    }

    dealHealing(shooter, projectile.shooterId, struck, projectile.damage, ctx);
    return true;
  }

  if (friendly) {
    const reduced = Math.floor(projectile.damage / FRIENDLY_FIRE_DIVISOR);
    const actual = takeDamage(struck, reduced);
    ctx.events.push({
      type: "blocked",
      shooterId: projectile.shooterId,
      blockerId: struck.id,
      targetId: projectile.targetId,
      damage: actual,
    });
    return true;
  }

  dealEnemyDamage(shooter, projectile.shooterId, struck, projectile.damage, ctx);
  return true;
}

function isOutOfBounds(projectile: Projectile, ctx: SimulationContext): boolean {
  const { x, y } = projectile.position;
  return x < 0 || y < 0 || x > ctx.config.arenaWidth || y > ctx.config.arenaHeight;
}

export function advanceProjectiles(ctx: SimulationContext): void {
  for (const projectile of ctx.projectiles) {
    if (!projectile.alive) {
      continue;
    }

    if (projectile.ttl >= 0) {
      projectile.ttl -= ctx.dt;
      if (projectile.ttl <= 0) {
        projectile.alive = false;
        continue;
      }
    }

    projectile.position = add(projectile.position, scale(projectile.velocity, ctx.dt));

    if (!projectile.cosmetic) {
      const struck = findStruckAgent(projectile, ctx);
      if (struck && resolveContact(projectile, struck, ctx)) {
        projectile.alive = false;
        continue;
      }
    }

    if (isOutOfBounds(projectile, ctx)) {
      projectile.alive = false;
    }
  }

  ctx.projectiles = ctx.projectiles.filter((projectile) => projectile.alive);
}
