import type { Position } from "../typedefs.js";
import type { RandomSource } from "./Random.js";

/** Radius and center are always read and replaced together. */
export interface ZoneCircle {
  readonly radius: number;
  readonly center: Position;
}

export function planarDistance(a: Position, b: Position): number {
  return Math.hypot(a.x - b.x, a.z - b.z);
}

/** Signed distance to the zone edge: positive inside, negative outside. */
export function distanceToEdge(circle: ZoneCircle, position: Position): number {
  return circle.radius - planarDistance(position, circle.center);
}

export function isInside(circle: ZoneCircle, position: Position): boolean {
  return planarDistance(position, circle.center) <= circle.radius;
}

export function lerp(from: number, to: number, alpha: number): number {
  return from + (to - from) * alpha;
}

export function lerpCircle(from: ZoneCircle, to: ZoneCircle, alpha: number): ZoneCircle {
  const t = Math.min(Math.max(alpha, 0), 1);
  return {
    radius: lerp(from.radius, to.radius, t),
    center: {
      x: lerp(from.center.x, to.center.x, t),
      y: lerp(from.center.y, to.center.y, t),
      z: lerp(from.center.z, to.center.z, t),
    },
  };
}

/** Moves the center by up to `fraction * radius` on each ground-plane axis. */
export function driftCenter(
  center: Position,
  radius: number,
  fraction: number,
  random: RandomSource,
): Position {
  const span = 2 * fraction * radius;
  return {
    x: center.x + (random() - 0.5) * span,
    y: center.y,
    z: center.z + (random() - 0.5) * span,
  };
}

/** `count` evenly spaced points on a ring around `center`, all at `height`. */
export function ringPositions(
  center: Position,
  radius: number,
  count: number,
  height: number,
): Position[] {
  return Array.from({ length: count }, (_, index) => {
    const angle = ((index + 1) / count) * Math.PI * 2;
    return {
      x: center.x + Math.cos(angle) * radius,
      y: height,
      z: center.z + Math.sin(angle) * radius,
    };
  });
}
