import { onRequest } from "firebase-functions/v2/https";
import * as admin from "firebase-admin";
import { FieldValue } from "firebase-admin/firestore";
import type { DocumentSnapshot } from "firebase-admin/firestore";
import cors from "cors";
import { z } from "zod";
import { simulateBattle } from "./battleEngine";
import { summarizeBattle, type BattleResult, type BattleSummary, type FrameSnapshot } from "./frameRecorder";
import {
  BattleApiError,
  errorMessage,
  errorResponse,
  isJsonObject,
  normalizePath,
  safeJsonBody,
  sendError,
  type ResponseLike,
} from "./httpUtils";
import {
  BATTLE_REQUEST_SCHEMA,
  PREVIEW_REQUEST_SCHEMA,
  platingsWithoutBitmap,
  toSimulationInput,
  type BattleRequest,
} from "./schemas";
import { loadReplay, replayPathFor, saveReplay } from "./storage";

if (!admin.apps.length) {
  admin.initializeApp();
}

const db = admin.firestore();
const enableCors = cors({ origin: true });
const API_VERSION = "0.1.0";

const STORED_BATTLE_SCHEMA = z
  .object({
    replayPath: z.string().optional(),
    replaySizeBytes: z.number().optional(),
    winnerTeam: z.union([z.literal(0), z.literal(1), z.literal(2)]),
    totalFrames: z.number(),
    duration: z.number(),
    fps: z.number(),
    arenaWidth: z.number(),
    arenaHeight: z.number(),
    seed: z.number(),
    cancelled: z.boolean().default(false),
    team1Survivors: z.number(),
    team2Survivors: z.number(),
    agentStats: z.record(
      z.object({
        name: z.string(),
        team: z.union([z.literal(1), z.literal(2)]),
        alive: z.boolean(),
        health: z.number(),
        maxHealth: z.number(),
        damageDealt: z.number(),
        damageTaken: z.number(),
        kills: z.number(),
      })
    ),
  })
  .passthrough();

interface BattleResponseData extends BattleSummary {
  id: string;
  replayPath: string | null;
  createdAt: string | null;
  frames?: FrameSnapshot[];
}

function serializeTimestamp(value: unknown): string | null {
  if (!value) {
    return null;
  }

  if (value instanceof admin.firestore.Timestamp) {
    return value.toDate().toISOString();
  }

  if (typeof value === "string") {
    return value;
  }

  return null;
}

function resolveSeed(request: BattleRequest): number {
  return request.seed ?? Math.floor(Math.random() * 0xffffffff);
}

function runRequestedBattle(request: BattleRequest): BattleResult {
  const missingPlatings = platingsWithoutBitmap(request);
  if (missingPlatings.length) {
    console.warn(`No collision bitmap for platings ${missingPlatings.join(", ")}; using circular hit tests.`);
  }

  return simulateBattle(toSimulationInput(request, resolveSeed(request)));
}

function serializeBattleDoc(doc: DocumentSnapshot, frames?: FrameSnapshot[]): BattleResponseData {
  const raw = doc.data();
  if (!raw) {
    throw new BattleApiError(404, `Battle ${doc.id} not found`);
  }

  const data = STORED_BATTLE_SCHEMA.parse(raw);
  return {
    id: doc.id,
    replayPath: data.replayPath ?? null,
    winnerTeam: data.winnerTeam,
    totalFrames: data.totalFrames,
    duration: data.duration,
    fps: data.fps,
    arenaWidth: data.arenaWidth,
    arenaHeight: data.arenaHeight,
    seed: data.seed,
    cancelled: data.cancelled,
    team1Survivors: data.team1Survivors,
    team2Survivors: data.team2Survivors,
    agentStats: data.agentStats,
    createdAt: serializeTimestamp(raw.createdAt),
    frames,
  };
}

async function resolveReplayFrames(battleId: string, replayPath: string | null): Promise<FrameSnapshot[]> {
  if (!replayPath) {
    return [];
  }

  try {
    const replay = await loadReplay(replayPath);
    if (isJsonObject(replay) && Array.isArray(replay.frames)) {
      return replay.frames;
    }

    console.warn(`Replay for battle ${battleId} has no frames`);
    return [];
  } catch (error) {
    console.warn(`Failed to load replay for battle ${battleId}:`, errorMessage(error));
    return [];
  }
}

async function createBattle(payload: unknown): Promise<BattleResponseData> {
  const request = BATTLE_REQUEST_SCHEMA.parse(payload);
  const result = runRequestedBattle(request);
  const summary = summarizeBattle(result);

  const battleRef = db.collection("battles").doc();
  const replayPath = replayPathFor(battleRef.id);
  const replaySizeBytes = await saveReplay(replayPath, { frames: result.frames });

  await battleRef.set({
    ...summary,
    replayPath,
    replaySizeBytes,
    team1: request.team1.map((loadout) => loadout.id),
    team2: request.team2.map((loadout) => loadout.id),
    createdAt: FieldValue.serverTimestamp(),
  });

  console.info(
    `Battle ${battleRef.id} finished: winner team ${summary.winnerTeam} after ${summary.totalFrames} frames`
  );

  const battleSnapshot = await battleRef.get();
  return serializeBattleDoc(battleSnapshot);
}

async function getBattle(battleId: string): Promise<BattleResponseData> {
  const battleSnapshot = await db.collection("battles").doc(battleId).get();
  if (!battleSnapshot.exists) {
    throw new BattleApiError(404, `Battle ${battleId} not found`);
  }

  const battle = serializeBattleDoc(battleSnapshot);
  const frames = await resolveReplayFrames(battleId, battle.replayPath);
  return { ...battle, frames };
}

function previewBattle(payload: unknown): BattleSummary & { frames?: FrameSnapshot[] } {
  const request = PREVIEW_REQUEST_SCHEMA.parse(payload);
  const result = runRequestedBattle(request);
  const summary = summarizeBattle(result);
  return request.includeFrames ? { ...summary, frames: result.frames } : summary;
}

interface ApiRequest {
  method: string;
  path?: string;
  url?: string;
  body?: unknown;
}

async function handleApiRequest(req: ApiRequest, res: ResponseLike): Promise<void> {
  const path = normalizePath(req);

  try {
    if (req.method === "GET" && path === "/") {
      res.json({
        name: "bot-arena API",
        version: API_VERSION,
        endpoints: ["GET /health", "POST /battles", "POST /battles/preview", "GET /battles/:battleId"],
      });
      return;
    }

    if (req.method === "GET" && path === "/health") {
      res.json({ status: "ok", time: new Date().toISOString() });
      return;
    }

    if (req.method === "POST" && path === "/battles/preview") {
      const battle = previewBattle(safeJsonBody(req));
      res.json({ battle });
      return;
    }

    if (req.method === "POST" && path === "/battles") {
      const battle = await createBattle(safeJsonBody(req));
      res.status(201).json({ battle });
      return;
    }

    if (req.method === "GET" && /^\/battles\/[^/]+$/.test(path)) {
      const battleId = path.split("/")[2];
      const battle = await getBattle(battleId);
      res.json({ battle });
      return;
    }

    errorResponse(res, 404, `Route not found: ${req.method} ${path}`);
  } catch (error) {
    sendError(res, error, "Invalid battle payload");
  }
}

export const api = onRequest({ region: "us-central1", memory: "512MiB", timeoutSeconds: 120 }, (req, res) => {
  enableCors(req, res, () => {
    if (req.method === "OPTIONS") {
      res.status(204).send("");
      return;
    }

    handleApiRequest(req, res).catch((error: unknown) => {
      console.error("Unhandled API failure:", errorMessage(error));
      errorResponse(res, 500, "Internal error");
    });
  });
});
