import { healthFraction, isEnemy } from "./agents";
import type { SeededRNG } from "./seededRng";
import type { AgentState, SimulationContext, TargetPriority } from "./types";
import { distance } from "./vectorMath";

export const TARGET_REEVALUATION_INTERVAL = 2.0;
export const CANDIDATE_RANGE_FACTOR = 2;
export const FURTHEST_RANGE_FACTOR = 1.5;

const HEALTH_NOISE = 20;
const DISTANCE_NOISE = 50;

type ScoredPriority = Exclude<TargetPriority, "FOCUS_FIRE">;

function noise(agent: AgentState, amplitude: number, rng: SeededRNG): number {
  return rng.uniform(0, amplitude) * ((10 - agent.intelligence) / 10);
}

export function targetCandidates(agent: AgentState, agents: readonly AgentState[]): AgentState[] {
  if (agent.isHealer) {
    return agents.filter(
      (other) => other !== agent && other.alive && !isEnemy(agent, other) && other.health < other.maxHealth
    );
  }

  const reach = agent.maxRange * CANDIDATE_RANGE_FACTOR;
  return agents.filter(
    (other) => other.alive && isEnemy(agent, other) && distance(agent.position, other.position) <= reach
  );
}

function focusFireTarget(
  agent: AgentState,
  candidates: readonly AgentState[],
  agents: readonly AgentState[]
): AgentState | null {
  const candidateIds = new Set(candidates.map((candidate) => candidate.id));
  const counts = new Map<string, number>();

  for (const ally of agents) {
    if (ally === agent || !ally.alive || isEnemy(agent, ally) || !ally.targetId) {
      continue;
    }

    if (candidateIds.has(ally.targetId)) {
      counts.set(ally.targetId, (counts.get(ally.targetId) ?? 0) + 1);
    }
  }

  let bestId: string | null = null;
  let bestCount = 0;
  for (const [id, count] of counts) {
    if (count > bestCount) {
      bestId = id;
      bestCount = count;
    }
  }

  return candidates.find((candidate) => candidate.id === bestId) ?? null;
}

function scoredTarget(
  agent: AgentState,
  candidates: readonly AgentState[],
  priority: ScoredPriority,
  rng: SeededRNG
): AgentState | null {
  let pool = candidates;
  if (priority === "FURTHEST") {
    const reach = agent.maxRange * FURTHEST_RANGE_FACTOR;
    const inReach = candidates.filter((candidate) => distance(agent.position, candidate.position) <= reach);
    pool = inReach.length ? inReach : candidates;
  }

  let best: AgentState | null = null;
  let bestKey = Number.POSITIVE_INFINITY;

  for (const candidate of pool) {
    let key: number;
    if (priority === "WEAKEST") {
      key = candidate.health + noise(agent, HEALTH_NOISE, rng);
    } else if (priority === "STRONGEST") {
      key = -candidate.health + noise(agent, HEALTH_NOISE, rng);
    } else if (priority === "CLOSEST") {
      key = distance(agent.position, candidate.position) + noise(agent, DISTANCE_NOISE, rng);
    } else {
      key = -distance(agent.position, candidate.position) + noise(agent, DISTANCE_NOISE, rng);
    }

    if (key < bestKey) {
      best = candidate;
      bestKey = key;
    }
  }

  return best;
}

export function selectTarget(agent: AgentState, agents: readonly AgentState[], rng: SeededRNG): string | null {
  const candidates = targetCandidates(agent, agents);
  if (!candidates.length) {
    return null;
  }

  if (agent.targetPriority === "FOCUS_FIRE") {
    const focused = focusFireTarget(agent, candidates, agents);
    if (focused) {
      return focused.id;
    }
  }

  const priority: ScoredPriority = agent.targetPriority === "FOCUS_FIRE" ? "WEAKEST" : agent.targetPriority;
  return scoredTarget(agent, candidates, priority, rng)?.id ?? null;
}

export function weakestAlly(agent: AgentState, agents: readonly AgentState[]): AgentState | null {
  let weakest: AgentState | null = null;
  let weakestFraction = Number.POSITIVE_INFINITY;

  for (const other of agents) {
    if (other === agent || !other.alive || isEnemy(agent, other)) {
      continue;
    }

    const fraction = healthFraction(other);
    if (fraction < weakestFraction) {
      weakest = other;
      weakestFraction = fraction;
    }
  }

  return weakest;
}

export function nearestEnemy(agent: AgentState, agents: readonly AgentState[]): AgentState | null {
  let nearest: AgentState | null = null;
  let nearestDistance = Number.POSITIVE_INFINITY;

  for (const other of agents) {
    if (!other.alive || !isEnemy(agent, other)) {
      continue;
    }

    const gap = distance(agent.position, other.position);
    if (gap < nearestDistance) {
      nearest = other;
      nearestDistance = gap;
    }
  }

  return nearest;
}

function needsNewTarget(agent: AgentState, current: AgentState | undefined): boolean {
  if (!current || !current.alive) {
    return true;
  }

  return agent.isHealer && current.health >= current.maxHealth;
}

export function updateTargets(ctx: SimulationContext): void {
  for (const agent of ctx.agents) {
    if (!agent.alive) {
      continue;
    }

    const current = agent.targetId ? ctx.agentsById.get(agent.targetId) : undefined;
    const intervalElapsed = ctx.time - agent.lastTargetCheck >= TARGET_REEVALUATION_INTERVAL;
    if (!intervalElapsed && agent.targetId !== null && !needsNewTarget(agent, current)) {
      continue;
    }

    agent.targetId = selectTarget(agent, ctx.agents, ctx.rng);
    agent.lastTargetCheck = ctx.time;
  }
}
