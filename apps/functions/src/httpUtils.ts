import { z } from "zod";
import { BattleConfigError } from "./simulationConfig";

export type JsonObject = Record<string, unknown>;

export interface RequestLike {
  method?: string;
  path?: string;
  url?: string;
  body?: unknown;
}

export interface ResponseLike {
  status(code: number): ResponseLike;
  json(payload: unknown): ResponseLike;
  send(body: string): void;
}

export class BattleApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "BattleApiError";
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function normalizePath(req: RequestLike): string {
  const pathWithQuery = req.path || req.url || "/";
  const pathOnly = pathWithQuery.split("?")[0] || "/";
  const trimmed = pathOnly.length > 1 && pathOnly.endsWith("/") ? pathOnly.slice(0, -1) : pathOnly;

  if (trimmed === "/api") {
    return "/";
  }

  if (trimmed.startsWith("/api/")) {
    return trimmed.slice(4);
  }

  return trimmed;
}

export function safeJsonBody(req: RequestLike): JsonObject {
  if (!req.body) {
    return {};
  }

  if (isJsonObject(req.body)) {
    return req.body;
  }

  if (typeof req.body !== "string") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(req.body);
  } catch (_error) {
    throw new BattleApiError(400, "invalid JSON body");
  }

  if (!isJsonObject(parsed)) {
    throw new BattleApiError(400, "JSON body must be an object");
  }

  return parsed;
}

export function errorResponse(
  res: ResponseLike,
  status: number,
  message: string,
  details?: unknown
): ResponseLike {
  const payload: { error: string; details?: unknown } = { error: message };
  if (details !== undefined) {
    payload.details = details;
  }

  return res.status(status).json(payload);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (isJsonObject(error) && typeof error.message === "string") {
    return error.message;
  }

  return String(error);
}

export function sendError(res: ResponseLike, error: unknown, invalidPayloadMessage: string): ResponseLike {
  if (error instanceof z.ZodError) {
    return errorResponse(res, 400, invalidPayloadMessage, error.flatten());
  }

  if (error instanceof BattleApiError) {
    return errorResponse(res, error.status, error.message, error.details);
  }

  if (error instanceof BattleConfigError) {
    return errorResponse(res, 400, error.message);
  }

  console.error(error);
  return errorResponse(res, 500, "Internal error", errorMessage(error));
}
