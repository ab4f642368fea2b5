import { LruCache } from "./lruCache";
import { distance, normalizeAngle, toRadians, type Vector2 } from "./vectorMath";

export const ALPHA_SOLID_THRESHOLD = 128;
export const MASK_ANGLE_STEP = 5;
export const DEFAULT_MASK_CACHE_SIZE = 36;

const EXTENT_EPSILON = 1e-6;

/** Row-major 8-bit alpha channel of a plating sprite drawn facing east. */
export interface AlphaBitmap {
  width: number;
  height: number;
  alpha: Uint8Array;
}

export interface OccupancyMask {
  width: number;
  height: number;
  cells: Uint8Array;
}

export type MaskQueryResult = "hit" | "miss" | "unavailable";

export interface CollisionBody {
  platingId: string;
  position: Vector2;
  orientation: number;
}

export interface CollisionProvider {
  readonly kind: "bitmap" | "circular";
  hitTest(point: Vector2, body: CollisionBody): boolean;
}

export function buildBaseMask(bitmap: AlphaBitmap): OccupancyMask {
  const size = bitmap.width * bitmap.height;
  if (bitmap.alpha.length !== size) {
    throw new Error(`alpha channel has ${bitmap.alpha.length} bytes, expected ${size}`);
  }

  const cells = new Uint8Array(size);
  for (let index = 0; index < size; index += 1) {
    cells[index] = bitmap.alpha[index] > ALPHA_SOLID_THRESHOLD ? 1 : 0;
  }

  return { width: bitmap.width, height: bitmap.height, cells };
}

export function quantizeAngle(degrees: number): number {
  return normalizeAngle(Math.round(degrees / MASK_ANGLE_STEP) * MASK_ANGLE_STEP);
}

function rotatedExtent(a: number, b: number, cos: number, sin: number): number {
  return Math.max(1, Math.ceil(Math.abs(a * cos) + Math.abs(b * sin) - EXTENT_EPSILON));
}

/**
 * Nearest-neighbour rotation into an expanded bounding box. Positive angles turn
 * clockwise on screen, so a sprite facing east ends up facing the given heading.
 */
export function rotateMask(mask: OccupancyMask, degrees: number): OccupancyMask {
  const radians = toRadians(normalizeAngle(degrees));
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  const width = rotatedExtent(mask.width, mask.height, cos, sin);
  const height = rotatedExtent(mask.width, mask.height, sin, cos);
  const cells = new Uint8Array(width * height);

  for (let py = 0; py < height; py += 1) {
    const dy = py + 0.5 - height / 2;
    for (let px = 0; px < width; px += 1) {
      const dx = px + 0.5 - width / 2;
      const sx = Math.floor(dx * cos + dy * sin + mask.width / 2);
      const sy = Math.floor(-dx * sin + dy * cos + mask.height / 2);

      if (sx < 0 || sy < 0 || sx >= mask.width || sy >= mask.height) {
        continue;
      }

      cells[py * width + px] = mask.cells[sy * mask.width + sx];
    }
  }

  return { width, height, cells };
}

export function isMaskCellSolid(mask: OccupancyMask, x: number, y: number): boolean {
  if (x < 0 || y < 0 || x >= mask.width || y >= mask.height) {
    return false;
  }

  return mask.cells[y * mask.width + x] === 1;
}

export class CollisionOracle {
  private readonly baseMasks = new Map<string, OccupancyMask>();
  private readonly rotatedMasks = new Map<string, LruCache<number, OccupancyMask>>();

  constructor(
    bitmaps: Iterable<[string, AlphaBitmap]>,
    private readonly cacheSize = DEFAULT_MASK_CACHE_SIZE
  ) {
    for (const [platingId, bitmap] of bitmaps) {
      this.baseMasks.set(platingId, buildBaseMask(bitmap));
    }
  }

  get platingCount(): number {
    return this.baseMasks.size;
  }

  hasMask(platingId: string): boolean {
    return this.baseMasks.has(platingId);
  }

  getRotatedMask(platingId: string, degrees: number): OccupancyMask | null {
    const base = this.baseMasks.get(platingId);
    if (!base) {
      return null;
    }

    const angle = quantizeAngle(degrees);
    let cache = this.rotatedMasks.get(platingId);
    if (!cache) {
      cache = new LruCache<number, OccupancyMask>(this.cacheSize);
      this.rotatedMasks.set(platingId, cache);
    }

    const cached = cache.get(angle);
    if (cached) {
      return cached;
    }

    const rotated = angle === 0 ? base : rotateMask(base, angle);
    cache.set(angle, rotated);
    return rotated;
  }

  queryPoint(platingId: string, point: Vector2, center: Vector2, degrees: number, scale = 1): MaskQueryResult {
    const mask = this.getRotatedMask(platingId, degrees);
    if (!mask) {
      return "unavailable";
    }

    const px = Math.floor(mask.width / 2 + (point.x - center.x) / scale);
    const py = Math.floor(mask.height / 2 + (point.y - center.y) / scale);
    return isMaskCellSolid(mask, px, py) ? "hit" : "miss";
  }
}

export class CircularCollisionProvider implements CollisionProvider {
  readonly kind = "circular";

  constructor(private readonly radius: number) {}

  hitTest(point: Vector2, body: CollisionBody): boolean {
    return distance(point, body.position) < this.radius;
  }
}

export class BitmapCollisionProvider implements CollisionProvider {
  readonly kind = "bitmap";

  constructor(
    private readonly oracle: CollisionOracle,
    private readonly fallback: CircularCollisionProvider
  ) {}

  hitTest(point: Vector2, body: CollisionBody): boolean {
    const result = this.oracle.queryPoint(body.platingId, point, body.position, body.orientation);
    if (result === "unavailable") {
      return this.fallback.hitTest(point, body);
    }

    return result === "hit";
  }
}

export function createCollisionProvider(
  bitmaps: Iterable<[string, AlphaBitmap]>,
  botRadius: number,
  cacheSize = DEFAULT_MASK_CACHE_SIZE
): CollisionProvider {
  const circular = new CircularCollisionProvider(botRadius);
  const oracle = new CollisionOracle(bitmaps, cacheSize);
  if (oracle.platingCount === 0) {
    return circular;
  }

  return new BitmapCollisionProvider(oracle, circular);
}
