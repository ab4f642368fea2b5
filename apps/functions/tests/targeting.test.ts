import { describe, expect, it } from "vitest";
import { SeededRNG } from "../src/seededRng";
import { nearestEnemy, selectTarget, updateTargets, weakestAlly } from "../src/targeting";
import { createAgent, createContext } from "./fixtures";

describe("target selection", () => {
  it("sends healers to the most injured teammate only", () => {
    const healer = createAgent("medic", 1, { stats: { isHealer: true }, x: 500, y: 500 });
    const hurt = createAgent("hurt", 1, { x: 300, y: 300 });
    const healthy = createAgent("healthy", 1, { x: 520, y: 620 });
    const enemy = createAgent("enemy", 2, { x: 560, y: 500 });
    hurt.health = 40;

    expect(selectTarget(healer, [healer, hurt, healthy, enemy], new SeededRNG(1))).toBe("hurt");

    hurt.health = 100;
    expect(selectTarget(healer, [healer, hurt, healthy, enemy], new SeededRNG(1))).toBeNull();
  });

  it("picks the closest enemy without noise at full intelligence", () => {
    const agent = createAgent("a", 1, { x: 500, y: 500 });
    const near = createAgent("near", 2, { x: 600, y: 500 });
    const far = createAgent("far", 2, { x: 500, y: 700 });

    expect(selectTarget(agent, [agent, far, near], new SeededRNG(1))).toBe("near");
  });

  it("ranks enemies by health for weakest and strongest", () => {
    const sturdy = createAgent("sturdy", 2, { x: 600, y: 500 });
    const fragile = createAgent("fragile", 2, { x: 500, y: 650 });
    sturdy.health = 80;
    fragile.health = 30;

    const weakestSeeker = createAgent("a", 1, { tactics: { targetPriority: "WEAKEST" } });
    const strongestSeeker = createAgent("b", 1, { tactics: { targetPriority: "STRONGEST" } });

    expect(selectTarget(weakestSeeker, [weakestSeeker, sturdy, fragile], new SeededRNG(1))).toBe("fragile");
    expect(selectTarget(strongestSeeker, [strongestSeeker, sturdy, fragile], new SeededRNG(1))).toBe("sturdy");
  });

  it("keeps furthest picks within one and a half times max range", () => {
    const agent = createAgent("a", 1, { x: 200, y: 500, tactics: { targetPriority: "FURTHEST" } });
    const close = createAgent("close", 2, { x: 300, y: 500 });
    const mid = createAgent("mid", 2, { x: 600, y: 500 });
    const beyond = createAgent("beyond", 2, { x: 750, y: 500 });

    expect(selectTarget(agent, [agent, close, mid, beyond], new SeededRNG(1))).toBe("mid");
  });

  it("ignores enemies beyond twice the max range", () => {
    const agent = createAgent("a", 1, { x: 100, y: 100 });
    const distant = createAgent("distant", 2, { x: 900, y: 900 });

    expect(selectTarget(agent, [agent, distant], new SeededRNG(1))).toBeNull();
  });

  it("joins the target most teammates are already shooting", () => {
    const agent = createAgent("a", 1, { x: 500, y: 500, tactics: { targetPriority: "FOCUS_FIRE" } });
    const allyOne = createAgent("ally-1", 1, { x: 400, y: 400 });
    const allyTwo = createAgent("ally-2", 1, { x: 600, y: 400 });
    const allyThree = createAgent("ally-3", 1, { x: 700, y: 400 });
    const first = createAgent("e1", 2, { x: 500, y: 600 });
    const second = createAgent("e2", 2, { x: 500, y: 700 });
    allyOne.targetId = "e2";
    allyTwo.targetId = "e2";
    allyThree.targetId = "e1";

    const agents = [agent, allyOne, allyTwo, allyThree, first, second];
    expect(selectTarget(agent, agents, new SeededRNG(1))).toBe("e2");
  });

  it("falls back to the weakest enemy when no teammate has a target", () => {
    const agent = createAgent("a", 1, { tactics: { targetPriority: "FOCUS_FIRE" } });
    const first = createAgent("e1", 2, { x: 500, y: 600 });
    const second = createAgent("e2", 2, { x: 500, y: 700 });
    second.health = 20;

    expect(selectTarget(agent, [agent, first, second], new SeededRNG(1))).toBe("e2");
  });
});

describe("target upkeep", () => {
  it("re-targets immediately when the current target dies", () => {
    const agent = createAgent("a", 1, { x: 500, y: 500 });
    const first = createAgent("e1", 2, { x: 600, y: 500 });
    const second = createAgent("e2", 2, { x: 500, y: 750 });
    agent.targetId = "e1";
    agent.lastTargetCheck = 0.5;
    first.alive = false;
    first.health = 0;

    updateTargets(createContext([agent, first, second], { time: 1 }));

    expect(agent.targetId).toBe("e2");
    expect(agent.lastTargetCheck).toBe(1);
  });

  it("keeps a live target until the re-evaluation interval elapses", () => {
    const agent = createAgent("a", 1, { x: 500, y: 500 });
    const current = createAgent("e1", 2, { x: 500, y: 750 });
    const closer = createAgent("e2", 2, { x: 600, y: 500 });
    agent.targetId = "e1";
    agent.lastTargetCheck = 0.5;

    updateTargets(createContext([agent, current, closer], { time: 2 }));
    expect(agent.targetId).toBe("e1");

    updateTargets(createContext([agent, current, closer], { time: 2.5 }));
    expect(agent.targetId).toBe("e2");
  });

  it("moves a healer on once its patient is back at full health", () => {
    const healer = createAgent("medic", 1, { stats: { isHealer: true } });
    const patched = createAgent("patched", 1, { x: 300, y: 300 });
    const wounded = createAgent("wounded", 1, { x: 700, y: 300 });
    wounded.health = 55;
    healer.targetId = "patched";
    healer.lastTargetCheck = 0;

    updateTargets(createContext([healer, patched, wounded], { time: 0.5 }));
    expect(healer.targetId).toBe("wounded");
  });
});

describe("ally and enemy lookups", () => {
  it("finds the weakest ally by health fraction and the nearest enemy", () => {
    const agent = createAgent("a", 1);
    const tank = createAgent("tank", 1, { stats: { maxHealth: 400 }, x: 300, y: 300 });
    const scout = createAgent("scout", 1, { x: 700, y: 300 });
    const enemyNear = createAgent("near", 2, { x: 500, y: 600 });
    const enemyFar = createAgent("far", 2, { x: 500, y: 900 });
    tank.health = 200;
    scout.health = 60;

    const agents = [agent, tank, scout, enemyNear, enemyFar];
    expect(weakestAlly(agent, agents)?.id).toBe("tank");
    expect(nearestEnemy(agent, agents)?.id).toBe("near");
  });
});
