import type { SeededRNG } from "./seededRng";
import type { BattleConfig } from "./simulationConfig";
import type {
  AIBehavior,
  AgentSpawnDescriptor,
  AgentState,
  EngagementRange,
  SpawnPlacement,
} from "./types";
import { clamp, normalizeAngle } from "./vectorMath";

export const MIN_RANGE_RADIUS_FACTOR = 2.5;

const ENGAGEMENT_RANGE_FRACTIONS: Record<Exclude<EngagementRange, "AUTO">, number> = {
  CLOSE: 0.1,
  OPTIMAL: 0.5,
  MAX: 0.95,
};

const BEHAVIOR_RANGE_FRACTIONS: Record<Exclude<AIBehavior, "SNIPER">, number> = {
  AGGRESSIVE: 0.15,
  DEFENSIVE: 0.95,
  KITING: 0.775,
  FLANKER: 0.575,
  TACTICAL: 0.5,
  HOLD: 0.5,
  BERSERKER: 0.5,
  PROTECTOR: 0.5,
};

const SNIPER_MAX_RANGE_FRACTION = 0.96;

export function createAgentState(
  descriptor: AgentSpawnDescriptor,
  placement: SpawnPlacement,
  config: BattleConfig,
  rng: SeededRNG
): AgentState {
  const { stats } = descriptor;
  const maxHealth = Math.max(0, stats.maxHealth);
  const orientation = normalizeAngle(placement.orientation);

  return {
    id: descriptor.id,
    name: descriptor.name,
    team: descriptor.team,
    chassisId: descriptor.chassisId,
    platingId: descriptor.platingId,
    weaponId: descriptor.weaponId,

    maxHealth,
    speed: Math.max(0, stats.speed),
    rotationSpeed: Math.max(0, stats.rotationSpeed),
    turretRotationSpeed: Math.max(0, stats.turretRotationSpeed),
    intelligence: clamp(stats.intelligence, 0, 10),
    agility: clamp(stats.agility, 0, 1),
    damagePerShot: Math.abs(stats.damagePerShot),
    shotsPerSecond: stats.shotsPerSecond,
    minRange: Math.max(stats.minRange, config.botRadius * MIN_RANGE_RADIUS_FACTOR),
    maxRange: stats.maxRange,
    isHealer: stats.isHealer,
    allowsPointBlank: stats.allowsPointBlank,
    muzzleOffset: stats.muzzleOffset,
    projectileType: stats.projectileType,

    behavior: descriptor.tactics?.behavior ?? "TACTICAL",
    targetPriority: descriptor.tactics?.targetPriority ?? "CLOSEST",
    engagementRange: descriptor.tactics?.engagementRange ?? "AUTO",

    position: { x: placement.position.x, y: placement.position.y },
    velocity: { x: 0, y: 0 },
    orientation,
    weaponOrientation: orientation,
    targetOrientation: orientation,
    isTurning: false,

    health: maxHealth,
    alive: maxHealth > 0,
    lastShotTime: 0,
    targetId: null,
    lastTargetCheck: 0,

    strafeDirection: 1,
    strafeTimer: rng.uniform(0.5, 2.0),
    wanderAngle: orientation,
    wanderTimer: 0,
    wallEscapeTimer: 0,
    lastWallContact: -1,

    damageDealt: 0,
    damageTaken: 0,
    kills: 0,
  };
}

export function takeDamage(agent: AgentState, amount: number): number {
  if (!agent.alive || amount <= 0) {
    return 0;
  }

  const actual = Math.min(amount, agent.health);
  agent.health -= actual;
  agent.damageTaken += actual;

  if (agent.health <= 0) {
    agent.health = 0;
    agent.alive = false;
  }

  return actual;
}

export function applyHeal(agent: AgentState, amount: number): number {
  if (!agent.alive || amount <= 0) {
    return 0;
  }

  const actual = Math.min(amount, agent.maxHealth - agent.health);
  agent.health += actual;
  return actual;
}

export function canShoot(agent: AgentState, time: number): boolean {
  if (agent.shotsPerSecond <= 0) {
    return false;
  }

  return time - agent.lastShotTime >= 1 / agent.shotsPerSecond;
}

export function healthFraction(agent: AgentState): number {
  if (agent.maxHealth <= 0) {
    return 0;
  }

  return agent.health / agent.maxHealth;
}

export function isEnemy(a: AgentState, b: AgentState): boolean {
  return a.team !== b.team;
}

export function preferredRange(agent: AgentState): number {
  const span = Math.max(0, agent.maxRange - agent.minRange);

  if (agent.engagementRange !== "AUTO") {
    return agent.minRange + span * ENGAGEMENT_RANGE_FRACTIONS[agent.engagementRange];
  }

  if (agent.behavior === "SNIPER") {
    return agent.maxRange * SNIPER_MAX_RANGE_FRACTION;
  }

  return agent.minRange + span * BEHAVIOR_RANGE_FRACTIONS[agent.behavior];
}
