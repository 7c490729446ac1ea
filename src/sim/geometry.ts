/**
 * Point math for the simulator.
 *
 * Pure functions over immutable `Point` values; nothing here mutates.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

export function point(x: number, y: number): Point {
  return { x, y };
}

export function add(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function scale(p: Point, s: number): Point {
  return { x: p.x * s, y: p.y * s };
}

/** Offset from `from` to `to`: to - from. */
export function offset(from: Point, to: Point): Point {
  return { x: to.x - from.x, y: to.y - from.y };
}

/** Euclidean distance. `Math.hypot` keeps axis-aligned distances exact. */
export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Unit vector for an angle in radians. 0 = +x, PI/2 = +y. */
export function fromAngle(angle: number): Point {
  return { x: Math.cos(angle), y: Math.sin(angle) };
}
