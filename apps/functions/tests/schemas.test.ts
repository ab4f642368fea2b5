import { describe, expect, it } from "vitest";
import {
  BATTLE_REQUEST_SCHEMA,
  PLATING_BITMAP_SCHEMA,
  PREVIEW_REQUEST_SCHEMA,
  WEAPON_SCHEMA,
  platingsWithoutBitmap,
  toSimulationInput,
} from "../src/schemas";

const createLoadoutPayload = (id: string, plating = "Slate") => ({
  id,
  name: `Bot ${id}`,
  chassis: { name: "Frame-X", shielding: 100, speed: 80, rotationSpeed: 120, intelligence: 6, agility: 0.4 },
  plating: { name: plating, shielding: 50 },
  weapon: { name: "Needle", damagePerShot: 12, shotsPerMinute: 120, minRange: 20, maxRange: 120 },
});

const alphaOf = (bytes: number[]) => Buffer.from(bytes).toString("base64");

describe("BATTLE_REQUEST_SCHEMA", () => {
  it("fills defaults for config, platings and projectile type", () => {
    const request = BATTLE_REQUEST_SCHEMA.parse({
      team1: [createLoadoutPayload("a")],
      team2: [createLoadoutPayload("b")],
    });

    expect(request.config).toEqual({});
    expect(request.platings).toEqual({});
    expect(request.seed).toBeUndefined();
    expect(request.team1[0].weapon.projectileType).toBe("bullet");
  });

  it("rejects ids shared across teams", () => {
    const parsed = BATTLE_REQUEST_SCHEMA.safeParse({
      team1: [createLoadoutPayload("a")],
      team2: [createLoadoutPayload("a")],
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues.map((issue) => issue.message)).toEqual(["duplicate bot id: a"]);
    }
  });

  it("rejects empty teams and out-of-range frame rates", () => {
    expect(
      BATTLE_REQUEST_SCHEMA.safeParse({ team1: [], team2: [createLoadoutPayload("b")] }).success
    ).toBe(false);
    expect(
      BATTLE_REQUEST_SCHEMA.safeParse({
        team1: [createLoadoutPayload("a")],
        team2: [createLoadoutPayload("b")],
        config: { fps: 500 },
      }).success
    ).toBe(false);
  });
});

describe("WEAPON_SCHEMA", () => {
  it("requires the minimum range not to exceed the maximum", () => {
    const parsed = WEAPON_SCHEMA.safeParse({
      name: "Backwards",
      damagePerShot: 5,
      shotsPerMinute: 60,
      minRange: 200,
      maxRange: 100,
    });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].message).toBe("minRange must not exceed maxRange");
    }
  });
});

describe("PLATING_BITMAP_SCHEMA", () => {
  it("decodes the alpha channel", () => {
    const bitmap = PLATING_BITMAP_SCHEMA.parse({ width: 2, height: 2, alpha: alphaOf([0, 255, 200, 10]) });

    expect(bitmap.width).toBe(2);
    expect(bitmap.height).toBe(2);
    expect(Array.from(bitmap.alpha)).toEqual([0, 255, 200, 10]);
  });

  it("rejects alpha data that does not match the dimensions", () => {
    const parsed = PLATING_BITMAP_SCHEMA.safeParse({ width: 2, height: 2, alpha: alphaOf([1, 2, 3]) });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].message).toBe("alpha must decode to width*height = 4 bytes, got 3");
    }
  });
});

describe("PREVIEW_REQUEST_SCHEMA", () => {
  it("defaults to leaving frames out", () => {
    const preview = PREVIEW_REQUEST_SCHEMA.parse({
      team1: [createLoadoutPayload("a")],
      team2: [createLoadoutPayload("b")],
    });

    expect(preview.includeFrames).toBe(false);
    expect(preview.team1[0].id).toBe("a");
  });
});

describe("request helpers", () => {
  it("lists platings without a bitmap once each", () => {
    const request = BATTLE_REQUEST_SCHEMA.parse({
      team1: [createLoadoutPayload("a", "Slate"), createLoadoutPayload("b", "Mesh")],
      team2: [createLoadoutPayload("c", "Slate")],
      platings: { Mesh: { width: 1, height: 1, alpha: alphaOf([255]) } },
    });

    expect(platingsWithoutBitmap(request)).toEqual(["Slate"]);
  });

  it("builds simulator input from a request", () => {
    const request = BATTLE_REQUEST_SCHEMA.parse({
      team1: [createLoadoutPayload("a")],
      team2: [createLoadoutPayload("b")],
      config: { maxDuration: 30 },
    });

    const input = toSimulationInput(request, 1234);

    expect(input.seed).toBe(1234);
    expect(input.config).toEqual({ maxDuration: 30 });
    expect(input.agents.map((agent) => [agent.id, agent.team])).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
  });
});
