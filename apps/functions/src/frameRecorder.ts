import { stalematePhase, timeSinceDamage, type StalematePhase } from "./stalemate";
import type { AgentState, BattleEvent, Projectile, ProjectileType, SimulationContext, TeamId } from "./types";

export interface AgentView {
  id: string;
  name: string;
  team: TeamId;
  chassisId: string;
  platingId: string;
  weaponId: string;
  x: number;
  y: number;
  orientation: number;
  weaponOrientation: number;
  health: number;
  maxHealth: number;
  alive: boolean;
  targetId: string | null;
  isTurning: boolean;
}

export interface ProjectileView {
  shooterId: string;
  targetId: string;
  x: number;
  y: number;
  vx: number;
  vy: number;
  damage: number;
  isHeal: boolean;
  projectileType: ProjectileType;
  ttl: number;
}

export interface StalemateView {
  phase: StalematePhase;
  engaged: boolean;
  dispersal: boolean;
  timeSinceDamage: number;
}

export interface FrameSnapshot {
  readonly frame: number;
  readonly time: number;
  readonly agents: readonly AgentView[];
  readonly projectiles: readonly ProjectileView[];
  readonly events: readonly BattleEvent[];
  readonly stalemate: StalemateView;
}

export interface AgentStats {
  name: string;
  team: TeamId;
  alive: boolean;
  health: number;
  maxHealth: number;
  damageDealt: number;
  damageTaken: number;
  kills: number;
}

export type WinnerTeam = 0 | TeamId;

export interface BattleSummary {
  winnerTeam: WinnerTeam;
  totalFrames: number;
  duration: number;
  fps: number;
  arenaWidth: number;
  arenaHeight: number;
  seed: number;
  cancelled: boolean;
  team1Survivors: number;
  team2Survivors: number;
  agentStats: Record<string, AgentStats>;
}

export interface BattleResult extends BattleSummary {
  frames: FrameSnapshot[];
}

function round(value: number, digits = 4): number {
  return Number(value.toFixed(digits));
}

function agentView(agent: AgentState): AgentView {
  return {
    id: agent.id,
    name: agent.name,
    team: agent.team,
    chassisId: agent.chassisId,
    platingId: agent.platingId,
    weaponId: agent.weaponId,
    x: round(agent.position.x),
    y: round(agent.position.y),
    orientation: round(agent.orientation, 2),
    weaponOrientation: round(agent.weaponOrientation, 2),
    health: round(agent.health),
    maxHealth: agent.maxHealth,
    alive: agent.alive,
    targetId: agent.targetId,
    isTurning: agent.isTurning,
  };
}

function projectileView(projectile: Projectile): ProjectileView {
  return {
    shooterId: projectile.shooterId,
    targetId: projectile.targetId,
    x: round(projectile.position.x),
    y: round(projectile.position.y),
    vx: round(projectile.velocity.x),
    vy: round(projectile.velocity.y),
    damage: projectile.damage,
    isHeal: projectile.isHeal,
    projectileType: projectile.projectileType,
    ttl: projectile.ttl < 0 ? -1 : round(projectile.ttl),
  };
}

export function captureFrame(ctx: SimulationContext): FrameSnapshot {
  return {
    frame: ctx.frame,
    time: round(ctx.time),
    agents: ctx.agents.map(agentView),
    projectiles: ctx.projectiles.map(projectileView),
    events: [...ctx.events],
    stalemate: {
      phase: stalematePhase(ctx.stalemate),
      engaged: ctx.stalemate.stalemateEngaged,
      dispersal: ctx.stalemate.dispersalEngaged,
      timeSinceDamage: round(timeSinceDamage(ctx.stalemate, ctx.frame, ctx.config.fps)),
    },
  };
}

export function resolveWinner(agents: readonly AgentState[]): WinnerTeam {
  const team1Alive = agents.some((agent) => agent.team === 1 && agent.alive);
  const team2Alive = agents.some((agent) => agent.team === 2 && agent.alive);

  if (team1Alive && !team2Alive) {
    return 1;
  }

  if (team2Alive && !team1Alive) {
    return 2;
  }

  return 0;
}

export function buildBattleResult(
  ctx: SimulationContext,
  frames: FrameSnapshot[],
  seed: number,
  cancelled: boolean
): BattleResult {
  const agentStats: Record<string, AgentStats> = {};
  for (const agent of ctx.agents) {
    agentStats[agent.id] = {
      name: agent.name,
      team: agent.team,
      alive: agent.alive,
      health: round(agent.health),
      maxHealth: agent.maxHealth,
      damageDealt: round(agent.damageDealt),
      damageTaken: round(agent.damageTaken),
      kills: agent.kills,
    };
  }

  return {
    winnerTeam: resolveWinner(ctx.agents),
    totalFrames: frames.length,
    duration: round(frames.length / ctx.config.fps),
    fps: ctx.config.fps,
    arenaWidth: ctx.config.arenaWidth,
    arenaHeight: ctx.config.arenaHeight,
    seed,
    cancelled,
    team1Survivors: ctx.agents.filter((agent) => agent.team === 1 && agent.alive).length,
    team2Survivors: ctx.agents.filter((agent) => agent.team === 2 && agent.alive).length,
    agentStats,
    frames,
  };
}

export function summarizeBattle(result: BattleResult): BattleSummary {
  const { frames: _frames, ...summary } = result;
  return summary;
}
