import { isHeadingIntoWall, type SteeringCommand, type WallSide } from "./movement";
import type { SeededRNG } from "./seededRng";
import type { AIBehavior, AgentState } from "./types";
import { normalizeAngle } from "./vectorMath";

export const OPTIMAL_CLOSE_FACTOR = 1.15;

export interface BehaviorContext {
  agent: AgentState;
  target: AgentState;
  distance: number;
  bearing: number;
  preferredRange: number;
  walls: readonly WallSide[];
  targetWalls: readonly WallSide[];
  rng: SeededRNG;
}

export type BehaviorFn = (ctx: BehaviorContext) => SteeringCommand;

function toward(ctx: BehaviorContext, offset: number, speed: number): SteeringCommand {
  return { direction: normalizeAngle(ctx.bearing + offset), speed };
}

function away(ctx: BehaviorContext, offset: number, speed: number): SteeringCommand {
  return toward(ctx, 180 + offset, speed);
}

function holdFacing(ctx: BehaviorContext): SteeringCommand {
  return toward(ctx, 0, 0);
}

function aggressive(ctx: BehaviorContext): SteeringCommand {
  const optimalClose = ctx.agent.minRange * OPTIMAL_CLOSE_FACTOR;
  if (ctx.distance < optimalClose) {
    return away(ctx, 0, 0.5);
  }

  if (ctx.targetWalls.length > 0 && ctx.distance <= ctx.preferredRange) {
    return away(ctx, 0, 0.3);
  }

  return toward(ctx, 0, 1);
}

function defensive(ctx: BehaviorContext): SteeringCommand {
  if (ctx.distance >= ctx.preferredRange) {
    return holdFacing(ctx);
  }

  const retreat = away(ctx, 0, ctx.distance < ctx.preferredRange * 0.8 ? 1 : 0.7);
  if (!ctx.walls.length || !isHeadingIntoWall(retreat.direction, ctx.walls)) {
    return retreat;
  }

  const preferred = toward(ctx, 90 * ctx.agent.strafeDirection, 0.9);
  if (!isHeadingIntoWall(preferred.direction, ctx.walls)) {
    return preferred;
  }

  return toward(ctx, -90 * ctx.agent.strafeDirection, 0.9);
}

function kiting(ctx: BehaviorContext): SteeringCommand {
  const side = ctx.agent.strafeDirection;
  if (ctx.distance < ctx.preferredRange * 0.9) {
    return away(ctx, 15 * side, 1);
  }

  if (ctx.distance > ctx.preferredRange * 1.1) {
    return toward(ctx, 15 * side, 0.7);
  }

  return away(ctx, -40 * side, 0.6);
}

function flanker(ctx: BehaviorContext): SteeringCommand {
  let offset = 90;
  if (ctx.distance > ctx.preferredRange * 1.1) {
    offset = 70;
  } else if (ctx.distance < ctx.preferredRange * 0.9) {
    offset = 110;
  }

  return toward(ctx, offset * ctx.agent.strafeDirection, 0.85);
}

function sniper(ctx: BehaviorContext): SteeringCommand {
  if (ctx.distance < ctx.preferredRange * 0.75) {
    return away(ctx, 0, 1);
  }

  if (ctx.distance < ctx.preferredRange * 0.9) {
    return away(ctx, 0, 0.5);
  }

  return holdFacing(ctx);
}

function hold(ctx: BehaviorContext): SteeringCommand {
  const { agent } = ctx;
  const tolerance = Math.max(40, (agent.maxRange - agent.minRange) / 2);
  if (ctx.distance > ctx.preferredRange + tolerance * 1.5) {
    return toward(ctx, 0, 0.2);
  }

  if (ctx.distance < ctx.preferredRange - tolerance * 1.5) {
    return away(ctx, 0, 0.2);
  }

  return holdFacing(ctx);
}

function berserker(ctx: BehaviorContext): SteeringCommand {
  const jitter = ctx.rng.uniform(-30, 30);
  const roll = ctx.rng.nextFloat();

  if (roll < 0.6) {
    return toward(ctx, jitter, 1);
  }

  if (roll < 0.85) {
    return toward(ctx, 90 * ctx.agent.strafeDirection + jitter, 0.9);
  }

  return { direction: ctx.rng.uniform(0, 360), speed: 1 };
}

function tactical(ctx: BehaviorContext): SteeringCommand {
  const { agent } = ctx;
  const band = Math.max(0, agent.maxRange - agent.minRange) * 0.15;
  const side = agent.strafeDirection;

  if (ctx.distance > ctx.preferredRange + band) {
    return toward(ctx, 15 * side, 0.8);
  }

  if (ctx.distance < ctx.preferredRange - band) {
    return toward(ctx, 140 * side, 0.7);
  }

  return toward(ctx, 90 * side, 0.5);
}

export const BEHAVIOR_STEERING: Record<Exclude<AIBehavior, "PROTECTOR">, BehaviorFn> = {
  AGGRESSIVE: aggressive,
  DEFENSIVE: defensive,
  TACTICAL: tactical,
  KITING: kiting,
  HOLD: hold,
  FLANKER: flanker,
  SNIPER: sniper,
  BERSERKER: berserker,
};
