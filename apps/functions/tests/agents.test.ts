import { describe, expect, it } from "vitest";
import { applyHeal, canShoot, healthFraction, preferredRange, takeDamage } from "../src/agents";
import { createAgent, type AgentOptions } from "./fixtures";

describe("agent state", () => {
  it("floors min range at the collision-derived minimum and clamps agility", () => {
    const agent = createAgent("a", 1, { stats: { minRange: 0, agility: 1.4 } });
    expect(agent.minRange).toBe(80);
    expect(agent.agility).toBe(1);

    const longRange = createAgent("b", 1, { stats: { minRange: 120 } });
    expect(longRange.minRange).toBe(120);
  });

  it("spawns dead when max health is zero", () => {
    const agent = createAgent("a", 1, { stats: { maxHealth: 0 } });
    expect(agent.alive).toBe(false);
    expect(agent.health).toBe(0);
    expect(healthFraction(agent)).toBe(0);
  });

  it("caps damage at remaining health and dies at zero", () => {
    const agent = createAgent("a", 1);

    expect(takeDamage(agent, 30)).toBe(30);
    expect(agent.health).toBe(70);
    expect(agent.alive).toBe(true);

    expect(takeDamage(agent, 500)).toBe(70);
    expect(agent.health).toBe(0);
    expect(agent.alive).toBe(false);
    expect(agent.damageTaken).toBe(100);

    expect(takeDamage(agent, 10)).toBe(0);
  });

  it("heals up to max health and never revives", () => {
    const agent = createAgent("a", 1);
    takeDamage(agent, 50);

    expect(applyHeal(agent, 80)).toBe(50);
    expect(agent.health).toBe(100);

    takeDamage(agent, 100);
    expect(applyHeal(agent, 20)).toBe(0);
    expect(agent.alive).toBe(false);
  });

  it("gates shots on the weapon cooldown", () => {
    const agent = createAgent("a", 1, { stats: { shotsPerSecond: 2 } });
    expect(canShoot(agent, 0.4)).toBe(false);
    expect(canShoot(agent, 0.5)).toBe(true);

    const unarmed = createAgent("b", 1, { stats: { shotsPerSecond: 0 } });
    expect(canShoot(unarmed, 100)).toBe(false);
  });
});

describe("preferred range", () => {
  it("derives the automatic range from the behavior", () => {
    const rangeFor = (options: AgentOptions) => preferredRange(createAgent("a", 1, options));

    expect(rangeFor({ tactics: { behavior: "AGGRESSIVE" } })).toBeCloseTo(113, 10);
    expect(rangeFor({ tactics: { behavior: "DEFENSIVE" } })).toBeCloseTo(289, 10);
    expect(rangeFor({ tactics: { behavior: "KITING" } })).toBeCloseTo(250.5, 10);
    expect(rangeFor({ tactics: { behavior: "FLANKER" } })).toBeCloseTo(206.5, 10);
    expect(rangeFor({ tactics: { behavior: "SNIPER" } })).toBeCloseTo(288, 10);
    expect(rangeFor({ tactics: { behavior: "TACTICAL" } })).toBe(190);
  });

  it("lets an explicit engagement range override the behavior", () => {
    const agent = createAgent("a", 1, { tactics: { behavior: "SNIPER", engagementRange: "CLOSE" } });
    expect(preferredRange(agent)).toBeCloseTo(102, 10);

    agent.engagementRange = "OPTIMAL";
    expect(preferredRange(agent)).toBe(190);

    agent.engagementRange = "MAX";
    expect(preferredRange(agent)).toBeCloseTo(289, 10);
  });
});
