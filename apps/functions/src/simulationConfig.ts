export interface BattleConfig {
  arenaWidth: number;
  arenaHeight: number;
  fps: number;
  maxDuration: number;
  projectileSpeed: number;
  botRadius: number;
}

export const DEFAULT_BATTLE_CONFIG: Readonly<BattleConfig> = Object.freeze({
  arenaWidth: 1000,
  arenaHeight: 1000,
  fps: 30,
  maxDuration: 120,
  projectileSpeed: 500,
  botRadius: 32,
});

export const MAX_FPS = 240;

export class BattleConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BattleConfigError";
  }
}

function requirePositive(name: keyof BattleConfig, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new BattleConfigError(`${name} must be a positive number, got ${value}`);
  }

  return value;
}

const CONFIG_KEYS: readonly (keyof BattleConfig)[] = [
  "arenaWidth",
  "arenaHeight",
  "fps",
  "maxDuration",
  "projectileSpeed",
  "botRadius",
];

export function resolveBattleConfig(input: Partial<BattleConfig> = {}): BattleConfig {
  const merged: BattleConfig = { ...DEFAULT_BATTLE_CONFIG };
  for (const key of CONFIG_KEYS) {
    const value = input[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const fps = merged.fps;
  if (!Number.isInteger(fps) || fps < 1 || fps > MAX_FPS) {
    throw new BattleConfigError(`fps must be an integer between 1 and ${MAX_FPS}, got ${fps}`);
  }

  const config: BattleConfig = {
    arenaWidth: requirePositive("arenaWidth", merged.arenaWidth),
    arenaHeight: requirePositive("arenaHeight", merged.arenaHeight),
    fps,
    maxDuration: requirePositive("maxDuration", merged.maxDuration),
    projectileSpeed: requirePositive("projectileSpeed", merged.projectileSpeed),
    botRadius: requirePositive("botRadius", merged.botRadius),
  };

  const playable = config.botRadius * 2 + 80;
  if (config.arenaWidth <= playable || config.arenaHeight <= playable) {
    throw new BattleConfigError(
      `arena ${config.arenaWidth}x${config.arenaHeight} leaves no room for bots of radius ${config.botRadius}`
    );
  }

  return config;
}

export interface MaxFramesInput {
  maxFrames?: number;
  maxDuration?: number;
}

export function resolveMaxFrames(input: MaxFramesInput, fps: number): number {
  const maxFrames = input.maxFrames;
  if (typeof maxFrames === "number" && Number.isInteger(maxFrames)) {
    return maxFrames;
  }

  const maxDuration = input.maxDuration;
  if (typeof maxDuration === "number" && Number.isFinite(maxDuration)) {
    return Math.floor(maxDuration * fps + 1e-9);
  }

  return Math.floor(DEFAULT_BATTLE_CONFIG.maxDuration * fps);
}
