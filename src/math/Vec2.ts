import type { Vector2 } from "@/types";

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

/**
 * Vec2 - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec2 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number): Vector2 {
    return { x, y };
  },

  /**
   * Add two vectors
   */
  add(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x + b.x, y: a.y + b.y };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector2): number {
    return Math.hypot(v.x, v.y);
  },

  /**
   * Calculate distance between two points
   */
  distance(a: Vector2, b: Vector2): number {
    return Vec2.length(Vec2.subtract(b, a));
  },

  /**
   * Midpoint between two points
   */
  midpoint(a: Vector2, b: Vector2): Vector2 {
    return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
  },

  /**
   * Vector of the given length pointing at angleDeg (counter-clockwise from +X)
   */
  fromPolar(magnitude: number, angleDeg: number): Vector2 {
    const rad = angleDeg * DEG_TO_RAD;
    return { x: magnitude * Math.cos(rad), y: magnitude * Math.sin(rad) };
  },

  /**
   * Direction of the vector from a to b in degrees, normalized to (-180, 180].
   * A zero-length vector has angle 0.
   */
  angleDeg(from: Vector2, to: Vector2): number {
    return normalizeAngleDeg(Math.atan2(to.y - from.y, to.x - from.x) * RAD_TO_DEG);
  },

  /**
   * Check that both components are finite numbers
   */
  isFinite(v: Vector2): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y);
  },
};

/**
 * Normalize an angle in degrees to (-180, 180].
 *
 * atan2 can return exactly -180 (for a -0 y component), which maps to 180.
 */
export function normalizeAngleDeg(angle: number): number {
  let a = angle % 360;
  if (a <= -180) a += 360;
  if (a > 180) a -= 360;
  // -0 is not a useful angle to hand to callers
  return a === 0 ? 0 : a;
}
