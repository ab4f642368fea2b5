import { createAgentState } from "./agents";
import { updateMovement } from "./aiDecision";
import { createCollisionProvider, type AlphaBitmap, type CollisionProvider } from "./collision";
import { resolveFiring, updateTurrets } from "./combat";
import { buildBattleResult, captureFrame, type BattleResult, type FrameSnapshot } from "./frameRecorder";
import { advanceProjectiles } from "./projectiles";
import { SeededRNG } from "./seededRng";
import { resolveBattleConfig, resolveMaxFrames, type BattleConfig } from "./simulationConfig";
import { createStalemateState, updateStalemate } from "./stalemate";
import { updateTargets } from "./targeting";
import type { AgentSpawnDescriptor, AgentState, SimulationContext, SpawnPlacement, TeamId } from "./types";

export const SPAWN_EDGE_OFFSET = 120;
export const DEFAULT_SEED = 1;

export interface SimulateBattleInput {
  agents: readonly AgentSpawnDescriptor[];
  config?: Partial<BattleConfig>;
  seed?: number;
  platings?: Readonly<Record<string, AlphaBitmap>>;
  collision?: CollisionProvider;
  /** Checked before every tick; returning true stops the run with the frames so far. */
  shouldCancel?: (frame: number) => boolean;
  maxFrames?: number;
}

function teamPlacements(count: number, team: TeamId, config: BattleConfig): SpawnPlacement[] {
  const spacing = config.arenaWidth / (count + 1);
  const y = team === 1 ? SPAWN_EDGE_OFFSET : config.arenaHeight - SPAWN_EDGE_OFFSET;
  const orientation = team === 1 ? 90 : 270;

  return Array.from({ length: count }, (_, index) => ({
    position: { x: spacing * (index + 1), y },
    orientation,
  }));
}

export function spawnPlacements(descriptors: readonly AgentSpawnDescriptor[], config: BattleConfig): SpawnPlacement[] {
  const team1 = descriptors.filter((descriptor) => descriptor.team === 1);
  const team2 = descriptors.filter((descriptor) => descriptor.team === 2);
  const lanes: Record<TeamId, SpawnPlacement[]> = {
    1: teamPlacements(team1.length, 1, config),
    2: teamPlacements(team2.length, 2, config),
  };
  const nextLane: Record<TeamId, number> = { 1: 0, 2: 0 };

  return descriptors.map((descriptor) => {
    const lane = lanes[descriptor.team][nextLane[descriptor.team]];
    nextLane[descriptor.team] += 1;
    return descriptor.spawn ?? lane;
  });
}

function assertUniqueIds(descriptors: readonly AgentSpawnDescriptor[]): void {
  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    if (seen.has(descriptor.id)) {
      throw new Error(`duplicate agent id: ${descriptor.id}`);
    }

    seen.add(descriptor.id);
  }
}

export function createSimulationContext(input: SimulateBattleInput): SimulationContext {
  assertUniqueIds(input.agents);

  const config = resolveBattleConfig(input.config);
  const rng = new SeededRNG(input.seed ?? DEFAULT_SEED);
  const placements = spawnPlacements(input.agents, config);
  const agents: AgentState[] = input.agents.map((descriptor, index) =>
    createAgentState(descriptor, placements[index], config, rng)
  );

  return {
    config,
    dt: 1 / config.fps,
    frame: 0,
    time: 0,
    agents,
    agentsById: new Map(agents.map((agent) => [agent.id, agent])),
    projectiles: [],
    events: [],
    rng,
    collision: input.collision ?? createCollisionProvider(Object.entries(input.platings ?? {}), config.botRadius),
    stalemate: createStalemateState(),
  };
}

function teamEliminated(agents: readonly AgentState[]): boolean {
  const team1Alive = agents.some((agent) => agent.team === 1 && agent.alive);
  const team2Alive = agents.some((agent) => agent.team === 2 && agent.alive);
  return !team1Alive || !team2Alive;
}

export function stepSimulation(ctx: SimulationContext): FrameSnapshot {
  ctx.time = ctx.frame / ctx.config.fps;
  ctx.events = updateStalemate(ctx.stalemate, ctx.frame, ctx.agents, ctx.config);

  updateTargets(ctx);
  updateMovement(ctx);
  updateTurrets(ctx);
  advanceProjectiles(ctx);
  resolveFiring(ctx);

  return captureFrame(ctx);
}

export function simulateBattle(input: SimulateBattleInput): BattleResult {
  const ctx = createSimulationContext(input);
  const seed = input.seed ?? DEFAULT_SEED;
  const durationCap = resolveMaxFrames({ maxDuration: ctx.config.maxDuration }, ctx.config.fps);
  const requested = resolveMaxFrames({ maxFrames: input.maxFrames, maxDuration: ctx.config.maxDuration }, ctx.config.fps);
  const frameLimit = Math.max(0, Math.min(durationCap, requested));

  const frames: FrameSnapshot[] = [];
  let cancelled = false;

  while (ctx.frame < frameLimit) {
    if (input.shouldCancel?.(ctx.frame)) {
      cancelled = true;
      break;
    }

    frames.push(stepSimulation(ctx));

    if (teamEliminated(ctx.agents)) {
      break;
    }

    ctx.frame += 1;
  }

  return buildBattleResult(ctx, frames, seed, cancelled);
}
