import type { CollisionProvider } from "./collision";
import type { SeededRNG } from "./seededRng";
import type { BattleConfig } from "./simulationConfig";
import type { StalemateState } from "./stalemate";
import type { Vector2 } from "./vectorMath";

export type TeamId = 1 | 2;

export const AI_BEHAVIORS = [
  "AGGRESSIVE",
  "DEFENSIVE",
  "TACTICAL",
  "KITING",
  "HOLD",
  "FLANKER",
  "SNIPER",
  "BERSERKER",
  "PROTECTOR",
] as const;
export type AIBehavior = (typeof AI_BEHAVIORS)[number];

export const TARGET_PRIORITIES = ["FOCUS_FIRE", "WEAKEST", "STRONGEST", "CLOSEST", "FURTHEST"] as const;
export type TargetPriority = (typeof TARGET_PRIORITIES)[number];

export const ENGAGEMENT_RANGES = ["AUTO", "CLOSE", "OPTIMAL", "MAX"] as const;
export type EngagementRange = (typeof ENGAGEMENT_RANGES)[number];

export const PROJECTILE_TYPES = ["bullet", "laser", "cannon", "missile", "heal", "shockwave"] as const;
export type ProjectileType = (typeof PROJECTILE_TYPES)[number];

export interface TacticalOrders {
  behavior: AIBehavior;
  targetPriority: TargetPriority;
  engagementRange: EngagementRange;
}

export interface AgentCombatStats {
  maxHealth: number;
  speed: number;
  rotationSpeed: number;
  turretRotationSpeed: number;
  intelligence: number;
  agility: number;
  damagePerShot: number;
  shotsPerSecond: number;
  minRange: number;
  maxRange: number;
  isHealer: boolean;
  allowsPointBlank: boolean;
  muzzleOffset: number;
  projectileType: ProjectileType;
}

export interface SpawnPlacement {
  position: Vector2;
  orientation: number;
}

export interface AgentSpawnDescriptor {
  id: string;
  name: string;
  team: TeamId;
  chassisId: string;
  platingId: string;
  weaponId: string;
  stats: AgentCombatStats;
  tactics?: Partial<TacticalOrders>;
  spawn?: SpawnPlacement;
}

export interface AgentState extends AgentCombatStats, TacticalOrders {
  id: string;
  name: string;
  team: TeamId;
  chassisId: string;
  platingId: string;
  weaponId: string;

  position: Vector2;
  velocity: Vector2;
  orientation: number;
  weaponOrientation: number;
  targetOrientation: number;
  isTurning: boolean;

  health: number;
  alive: boolean;
  lastShotTime: number;
  targetId: string | null;
  lastTargetCheck: number;

  strafeDirection: 1 | -1;
  strafeTimer: number;
  wanderAngle: number;
  wanderTimer: number;
  wallEscapeTimer: number;
  lastWallContact: number;

  damageDealt: number;
  damageTaken: number;
  kills: number;
}

export interface Projectile {
  shooterId: string;
  targetId: string;
  position: Vector2;
  velocity: Vector2;
  damage: number;
  isHeal: boolean;
  alive: boolean;
  projectileType: ProjectileType;
  /** Seconds left to live; -1 means the projectile lives until it hits something or leaves the arena. */
  ttl: number;
  /** Point-blank splash marker. Never collides. */
  cosmetic: boolean;
}

export type BattleEvent =
  | { type: "shot"; shooterId: string; targetId: string; isHeal: boolean; pointBlank: boolean }
  | { type: "hit"; shooterId: string; targetId: string; damage: number }
  | { type: "heal"; shooterId: string; targetId: string; amount: number }
  | { type: "kill"; killerId: string; victimId: string }
  | { type: "blocked"; shooterId: string; blockerId: string; targetId: string; damage: number }
  | { type: "stalemate_engaged"; timeSinceDamage: number }
  | { type: "dispersal_engaged"; lockedPairs: number; agentsAtWall: number };

export type BattleEventType = BattleEvent["type"];

export interface SimulationContext {
  config: BattleConfig;
  dt: number;
  frame: number;
  time: number;
  agents: AgentState[];
  agentsById: Map<string, AgentState>;
  projectiles: Projectile[];
  events: BattleEvent[];
  rng: SeededRNG;
  collision: CollisionProvider;
  stalemate: StalemateState;
}
