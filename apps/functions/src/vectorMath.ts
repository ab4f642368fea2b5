export interface Vector2 {
  x: number;
  y: number;
}

export const ZERO_VECTOR: Readonly<Vector2> = Object.freeze({ x: 0, y: 0 });

export function vec(x: number, y: number): Vector2 {
  return { x, y };
}

export function add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vector2, factor: number): Vector2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function dot(a: Vector2, b: Vector2): number {
  return a.x * b.x + a.y * b.y;
}

export function magnitude(v: Vector2): number {
  return Math.hypot(v.x, v.y);
}

export function normalize(v: Vector2): Vector2 {
  const length = magnitude(v);
  if (length === 0) {
    return { x: 0, y: 0 };
  }

  return { x: v.x / length, y: v.y / length };
}

export function distance(a: Vector2, b: Vector2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function normalizeAngle(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/** Signed shortest rotation, in (-180, 180]. */
export function wrapAngle(degrees: number): number {
  const wrapped = normalizeAngle(degrees);
  return wrapped > 180 ? wrapped - 360 : wrapped;
}

/**
 * Heading from one point to another. 0 points east and 90 points down the
 * screen, since y grows downward in arena coordinates.
 */
export function angleTo(from: Vector2, to: Vector2): number {
  return normalizeAngle(toDegrees(Math.atan2(to.y - from.y, to.x - from.x)));
}

export function angleOf(v: Vector2): number {
  return normalizeAngle(toDegrees(Math.atan2(v.y, v.x)));
}

export function fromAngle(degrees: number, length = 1): Vector2 {
  const radians = toRadians(degrees);
  return { x: Math.cos(radians) * length, y: Math.sin(radians) * length };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
