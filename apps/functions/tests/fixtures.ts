import { createAgentState } from "../src/agents";
import { CircularCollisionProvider } from "../src/collision";
import { SeededRNG } from "../src/seededRng";
import { resolveBattleConfig } from "../src/simulationConfig";
import { createStalemateState } from "../src/stalemate";
import type {
  AgentCombatStats,
  AgentSpawnDescriptor,
  AgentState,
  SimulationContext,
  TacticalOrders,
  TeamId,
} from "../src/types";

export const TEST_CONFIG = resolveBattleConfig();

export interface AgentOptions {
  stats?: Partial<AgentCombatStats>;
  tactics?: Partial<TacticalOrders>;
  x?: number;
  y?: number;
  orientation?: number;
}

export const createStats = (overrides?: Partial<AgentCombatStats>): AgentCombatStats => ({
  maxHealth: 100,
  speed: 60,
  rotationSpeed: 90,
  turretRotationSpeed: 90,
  intelligence: 10,
  agility: 0.5,
  damagePerShot: 10,
  shotsPerSecond: 1,
  minRange: 0,
  maxRange: 300,
  isHealer: false,
  allowsPointBlank: false,
  muzzleOffset: 40,
  projectileType: "bullet",
  ...(overrides ?? {}),
});

export const createDescriptor = (id: string, team: TeamId, options: AgentOptions = {}): AgentSpawnDescriptor => ({
  id,
  name: `Bot ${id}`,
  team,
  chassisId: "test-chassis",
  platingId: "test-plating",
  weaponId: "test-weapon",
  stats: createStats(options.stats),
  tactics: options.tactics,
  spawn:
    options.x === undefined || options.y === undefined
      ? undefined
      : { position: { x: options.x, y: options.y }, orientation: options.orientation ?? 0 },
});

export const createAgent = (id: string, team: TeamId, options: AgentOptions = {}): AgentState =>
  createAgentState(
    createDescriptor(id, team, options),
    { position: { x: options.x ?? 500, y: options.y ?? 500 }, orientation: options.orientation ?? 0 },
    TEST_CONFIG,
    new SeededRNG(7)
  );

export const createContext = (agents: AgentState[], overrides?: Partial<SimulationContext>): SimulationContext => ({
  config: TEST_CONFIG,
  dt: 1 / TEST_CONFIG.fps,
  frame: 0,
  time: 0,
  agents,
  agentsById: new Map(agents.map((agent) => [agent.id, agent])),
  projectiles: [],
  events: [],
  rng: new SeededRNG(11),
  collision: new CircularCollisionProvider(TEST_CONFIG.botRadius),
  stalemate: createStalemateState(),
  ...(overrides ?? {}),
});
