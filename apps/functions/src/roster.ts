import type {
  AIBehavior,
  AgentSpawnDescriptor,
  ProjectileType,
  SpawnPlacement,
  TacticalOrders,
  TeamId,
} from "./types";

export const RANGE_SCALE_FACTOR = 2.5;
export const DEFAULT_MUZZLE_OFFSET = 92;
export const DEFAULT_TURRET_ROTATION_SPEED = 20;

export const CHASSIS_DEFAULT_BEHAVIORS: Readonly<Record<string, AIBehavior>> = {
  "DLZ-100": "TACTICAL",
  "DLZ-250": "AGGRESSIVE",
  SmartMove: "TACTICAL",
  "CLR-Z050": "DEFENSIVE",
  Electron: "TACTICAL",
  Durichas: "DEFENSIVE",
  Deliverance: "DEFENSIVE",
};

export interface ChassisStats {
  name: string;
  shielding: number;
  speed: number;
  rotationSpeed: number;
  turretRotationSpeed?: number;
  intelligence: number;
  agility: number;
}

export interface PlatingStats {
  name: string;
  shielding: number;
}

export interface WeaponStats {
  name: string;
  /** Negative values heal. */
  damagePerShot: number;
  shotsPerMinute: number;
  /** Catalog units; scaled by RANGE_SCALE_FACTOR into arena pixels. */
  minRange: number;
  maxRange: number;
  projectileType: ProjectileType;
  muzzleOffset?: number;
}

export interface BotLoadout {
  id: string;
  name: string;
  chassis: ChassisStats;
  plating: PlatingStats;
  weapon: WeaponStats;
  tactics?: Partial<TacticalOrders>;
  spawn?: SpawnPlacement;
}

export function scaleRange(catalogRange: number): number {
  return Math.trunc(catalogRange * RANGE_SCALE_FACTOR);
}

export function defaultBehavior(chassisName: string, isHealer: boolean): AIBehavior {
  if (isHealer) {
    return "PROTECTOR";
  }

  return CHASSIS_DEFAULT_BEHAVIORS[chassisName] ?? "TACTICAL";
}

export function buildSpawnDescriptor(loadout: BotLoadout, team: TeamId): AgentSpawnDescriptor {
  const { chassis, plating, weapon } = loadout;
  const isHealer = weapon.damagePerShot < 0;

  return {
    id: loadout.id,
    name: loadout.name,
    team,
    chassisId: chassis.name,
    platingId: plating.name,
    weaponId: weapon.name,
    stats: {
      maxHealth: chassis.shielding + plating.shielding,
      speed: chassis.speed,
      rotationSpeed: chassis.rotationSpeed,
      turretRotationSpeed: chassis.turretRotationSpeed ?? DEFAULT_TURRET_ROTATION_SPEED,
      intelligence: chassis.intelligence,
      agility: Math.min(1, Math.max(0, chassis.agility)),
      damagePerShot: Math.abs(weapon.damagePerShot),
      shotsPerSecond: weapon.shotsPerMinute / 60,
      minRange: scaleRange(weapon.minRange),
      maxRange: scaleRange(weapon.maxRange),
      isHealer,
      allowsPointBlank: weapon.minRange === 0,
      muzzleOffset: weapon.muzzleOffset ?? DEFAULT_MUZZLE_OFFSET,
      projectileType: weapon.projectileType,
    },
    tactics: {
      behavior: loadout.tactics?.behavior ?? defaultBehavior(chassis.name, isHealer),
      targetPriority: loadout.tactics?.targetPriority ?? "CLOSEST",
      engagementRange: loadout.tactics?.engagementRange ?? "AUTO",
    },
    spawn: loadout.spawn,
  };
}

export function buildRoster(team1: readonly BotLoadout[], team2: readonly BotLoadout[]): AgentSpawnDescriptor[] {
  return [
    ...team1.map((loadout) => buildSpawnDescriptor(loadout, 1)),
    ...team2.map((loadout) => buildSpawnDescriptor(loadout, 2)),
  ];
}
