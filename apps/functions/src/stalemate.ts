import { isEnemy } from "./agents";
import { detectWalls } from "./movement";
import type { BattleConfig } from "./simulationConfig";
import type { AgentState, BattleEvent } from "./types";
import { distance } from "./vectorMath";

export const STALEMATE_THRESHOLD = 3.0;
export const DISPERSAL_THRESHOLD = 9.0;
export const DISPERSAL_DURATION = 6.0;
export const DISPERSAL_REENTRY_GAP = 6.0;

export type StalematePhase = "NORMAL" | "STALEMATE" | "DISPERSAL";

export interface StalemateState {
  lastDamageFrame: number;
  stalemateEngaged: boolean;
  dispersalEngaged: boolean;
  dispersalStartFrame: number | null;
  dispersalEndFrame: number | null;
}

export interface CornerLock {
  lockedPairs: number;
  agentsAtWall: number;
  locked: boolean;
}

export function createStalemateState(): StalemateState {
  return {
    lastDamageFrame: 0,
    stalemateEngaged: false,
    dispersalEngaged: false,
    dispersalStartFrame: null,
    dispersalEndFrame: null,
  };
}

export function stalematePhase(state: StalemateState): StalematePhase {
  if (state.dispersalEngaged) {
    return "DISPERSAL";
  }

  return state.stalemateEngaged ? "STALEMATE" : "NORMAL";
}

export function timeSinceDamage(state: StalemateState, frame: number, fps: number): number {
  return (frame - state.lastDamageFrame) / fps;
}

/** Resets the no-damage clock. An active dispersal runs to its end regardless. */
export function recordEnemyDamage(state: StalemateState, frame: number): void {
  state.lastDamageFrame = frame;
  state.stalemateEngaged = false;
}

export function detectCornerLock(agents: readonly AgentState[], config: BattleConfig): CornerLock {
  const living = agents.filter((agent) => agent.alive);
  let lockedPairs = 0;

  for (let i = 0; i < living.length; i += 1) {
    for (let j = i + 1; j < living.length; j += 1) {
      const a = living[i];
      const b = living[j];
      if (!isEnemy(a, b)) {
        continue;
      }

      const gap = distance(a.position, b.position);
      if (gap < a.minRange && gap < b.minRange) {
        lockedPairs += 1;
      }
    }
  }

  const agentsAtWall = living.filter((agent) => detectWalls(agent.position, config).length > 0).length;
  return { lockedPairs, agentsAtWall, locked: lockedPairs >= 1 || agentsAtWall >= 2 };
}

export function updateStalemate(
  state: StalemateState,
  frame: number,
  agents: readonly AgentState[],
  config: BattleConfig
): BattleEvent[] {
  const events: BattleEvent[] = [];
  const framesPerSecond = config.fps;

  if (state.dispersalEngaged && state.dispersalStartFrame !== null) {
    if (frame - state.dispersalStartFrame >= Math.round(DISPERSAL_DURATION * framesPerSecond)) {
      state.dispersalEngaged = false;
      state.dispersalStartFrame = null;
      state.dispersalEndFrame = frame;
    }
  }

  const quietFor = timeSinceDamage(state, frame, framesPerSecond);

  if (!state.stalemateEngaged && quietFor >= STALEMATE_THRESHOLD) {
    state.stalemateEngaged = true;
    events.push({ type: "stalemate_engaged", timeSinceDamage: quietFor });
  }

  if (!state.stalemateEngaged || state.dispersalEngaged || quietFor < DISPERSAL_THRESHOLD) {
    return events;
  }

  const reentryAllowed =
    state.dispersalEndFrame === null ||
    frame - state.dispersalEndFrame >= Math.round(DISPERSAL_REENTRY_GAP * framesPerSecond);
  if (!reentryAllowed) {
    return events;
  }

  const cornerLock = detectCornerLock(agents, config);
  if (cornerLock.locked) {
    state.dispersalEngaged = true;
    state.dispersalStartFrame = frame;
    events.push({
      type: "dispersal_engaged",
      lockedPairs: cornerLock.lockedPairs,
      agentsAtWall: cornerLock.agentsAtWall,
    });
  }

  return events;
}
