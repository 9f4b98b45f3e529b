import type { Axis3D, Offset2D } from "../types/catalog";

export const ZERO_OFFSET: Readonly<Offset2D> = Object.freeze({ x: 0, y: 0 });

/** Flip between two endpoints; anything that is not `a` goes back to `a`. */
export function toggleBetween<T>(current: T, a: T, b: T): T {
  return Object.is(current, a) ? b : a;
}

export function clampUnit(n: number): number {
  if (n <= 0) return 0;
  if (n >= 1) return 1;
  return n;
}

/** CSS `rotate3d()` for a rotation of `degrees` about `axis`. */
export function rotate3d(axis: Axis3D, degrees: number): string {
  return `rotate3d(${axis.x}, ${axis.y}, ${axis.z}, ${degrees}deg)`;
}
