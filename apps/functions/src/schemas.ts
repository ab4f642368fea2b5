import { z } from "zod";
import type { SimulateBattleInput } from "./battleEngine";
import type { AlphaBitmap } from "./collision";
import { buildRoster } from "./roster";
import { MAX_FPS } from "./simulationConfig";
import { AI_BEHAVIORS, ENGAGEMENT_RANGES, PROJECTILE_TYPES, TARGET_PRIORITIES } from "./types";

export const MAX_TEAM_SIZE = 8;
export const MAX_PLATING_SIDE = 512;

const NAME_SCHEMA = z.string().min(1).max(80);

const VECTOR_SCHEMA = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const CHASSIS_SCHEMA = z.object({
  name: NAME_SCHEMA,
  shielding: z.number().min(0).max(100_000),
  speed: z.number().min(0).max(2_000),
  rotationSpeed: z.number().min(0).max(3_600),
  turretRotationSpeed: z.number().min(0).max(3_600).optional(),
  intelligence: z.number().min(0).max(10),
  agility: z.number().min(0).max(1),
});

export const PLATING_SCHEMA = z.object({
  name: NAME_SCHEMA,
  shielding: z.number().min(0).max(100_000),
});

export const WEAPON_SCHEMA = z
  .object({
    name: NAME_SCHEMA,
    damagePerShot: z.number().min(-10_000).max(10_000),
    shotsPerMinute: z.number().min(0).max(6_000),
    minRange: z.number().min(0).max(2_000),
    maxRange: z.number().min(0).max(2_000),
    projectileType: z.enum(PROJECTILE_TYPES).default("bullet"),
    muzzleOffset: z.number().min(0).max(500).optional(),
  })
  .refine((weapon) => weapon.minRange <= weapon.maxRange, {
    message: "minRange must not exceed maxRange",
    path: ["minRange"],
  });

export const TACTICS_SCHEMA = z.object({
  behavior: z.enum(AI_BEHAVIORS).optional(),
  targetPriority: z.enum(TARGET_PRIORITIES).optional(),
  engagementRange: z.enum(ENGAGEMENT_RANGES).optional(),
});

export const LOADOUT_SCHEMA = z.object({
  id: z.string().min(1).max(64),
  name: NAME_SCHEMA,
  chassis: CHASSIS_SCHEMA,
  plating: PLATING_SCHEMA,
  weapon: WEAPON_SCHEMA,
  tactics: TACTICS_SCHEMA.optional(),
  spawn: z
    .object({
      position: VECTOR_SCHEMA,
      orientation: z.number().finite(),
    })
    .optional(),
});

export const CONFIG_SCHEMA = z.object({
  arenaWidth: z.number().min(200).max(10_000).optional(),
  arenaHeight: z.number().min(200).max(10_000).optional(),
  fps: z.number().int().min(1).max(MAX_FPS).optional(),
  maxDuration: z.number().positive().max(600).optional(),
  projectileSpeed: z.number().positive().max(10_000).optional(),
  botRadius: z.number().positive().max(200).optional(),
});

export const PLATING_BITMAP_SCHEMA = z
  .object({
    width: z.number().int().min(1).max(MAX_PLATING_SIDE),
    height: z.number().int().min(1).max(MAX_PLATING_SIDE),
    alpha: z.string().min(1).base64(),
  })
  .transform((bitmap, ctx): AlphaBitmap => {
    const alpha = new Uint8Array(Buffer.from(bitmap.alpha, "base64"));
    const expected = bitmap.width * bitmap.height;
    if (alpha.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `alpha must decode to width*height = ${expected} bytes, got ${alpha.length}`,
        path: ["alpha"],
      });
      return z.NEVER;
    }

    return { width: bitmap.width, height: bitmap.height, alpha };
  });

export const BATTLE_REQUEST_SCHEMA = z
  .object({
    team1: z.array(LOADOUT_SCHEMA).min(1).max(MAX_TEAM_SIZE),
    team2: z.array(LOADOUT_SCHEMA).min(1).max(MAX_TEAM_SIZE),
    config: CONFIG_SCHEMA.default({}),
    seed: z.number().int().min(0).max(0xffffffff).optional(),
    platings: z.record(z.string().min(1), PLATING_BITMAP_SCHEMA).default({}),
  })
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    [...request.team1, ...request.team2].forEach((loadout) => {
      if (seen.has(loadout.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate bot id: ${loadout.id}`,
          path: ["team2"],
        });
      }

      seen.add(loadout.id);
    });
  });

export const PREVIEW_REQUEST_SCHEMA = z.intersection(
  BATTLE_REQUEST_SCHEMA,
  z.object({ includeFrames: z.boolean().default(false) })
);

export type BattleRequest = z.infer<typeof BATTLE_REQUEST_SCHEMA>;

export function platingsWithoutBitmap(request: BattleRequest): string[] {
  const missing = new Set<string>();
  for (const loadout of [...request.team1, ...request.team2]) {
    if (!(loadout.plating.name in request.platings)) {
      missing.add(loadout.plating.name);
    }
  }

  return [...missing];
}

export function toSimulationInput(request: BattleRequest, seed: number): SimulateBattleInput {
  return {
    agents: buildRoster(request.team1, request.team2),
    config: request.config,
    seed,
    platings: request.platings,
  };
}
