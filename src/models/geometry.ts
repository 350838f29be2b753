/**
 * Geometry Engine — pure functions over vertex lists.
 *
 * Points are plain `{ x, y }` records in map pixel space. Nothing here
 * mutates its input.
 */

import { err, ok, type Result } from './errors.js';

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned box as [minX, minY, maxX, maxY]. */
export type BoundingBox = readonly [minX: number, minY: number, maxX: number, maxY: number];

const EDGE_EPSILON = 1e-10;

/** Rotate points about `origin` by `angle` degrees (clockwise in y-down space). */
export function rotate(points: readonly Point[], origin: Point, angle: number): Point[] {
  const radians = (angle * Math.PI) / 180;
  const sin = Math.sin(radians);
  const cos = Math.cos(radians);
  return points.map((p) => {
    const dx = p.x - origin.x;
    const dy = p.y - origin.y;
    return {
      x: origin.x + (cos * dx - sin * dy),
      y: origin.y + (sin * dx + cos * dy),
    };
  });
}

/**
 * Integer bounds of a point list, each edge truncated toward zero.
 * An empty list yields [0, 0, 0, 0].
 */
export function boundingBox(points: readonly Point[]): BoundingBox {
  if (points.length === 0) return [0, 0, 0, 0];
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }
  return [Math.trunc(minX), Math.trunc(minY), Math.trunc(maxX), Math.trunc(maxY)];
}

/**
 * Ray-casting containment test.
 *
 * Each edge is tested against a horizontal ray running right from the point;
 * the epsilon keeps near-horizontal edges from dividing by zero. Points on an
 * edge or vertex follow the parity rule and are not special-cased.
 */
export function pointInPolygon(point: Point, polygon: readonly Point[]): boolean {
  const { x, y } = point;
  const n = polygon.length;
  let inside = false;

  for (let i = 0, j = n - 1; i < n; j = i++) {
    const pi = polygon[i];
    const pj = polygon[j];
    const crosses =
      pi.y > y !== pj.y > y &&
      x < ((pj.x - pi.x) * (y - pi.y)) / (pj.y - pi.y + EDGE_EPSILON) + pi.x;
    if (crosses) inside = !inside;
  }

  return inside;
}

/** Analytic test against an axis-aligned ellipse. Zero radii contain nothing. */
export function pointInEllipse(point: Point, center: Point, rx: number, ry: number): boolean {
  if (rx <= 0 || ry <= 0) return false;
  const dx = (point.x - center.x) / rx;
  const dy = (point.y - center.y) / ry;
  return dx * dx + dy * dy <= 1;
}

function cross(a: Point, b: Point, c: Point): number {
  return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}

/**
 * Whether every consecutive vertex triple turns the same way.
 *
 * Fewer than 3 points is trivially convex. A collinear triple counts as a
 * non-positive turn.
 */
export function isConvex(polygon: readonly Point[]): boolean {
  const n = polygon.length;
  if (n < 3) return true;

  let positive = 0;
  for (let i = 0; i < n; i++) {
    if (cross(polygon[i], polygon[(i + 1) % n], polygon[(i + 2) % n]) > 0) positive++;
  }
  return positive === 0 || positive === n;
}

/** AABB overlap. Boxes that only touch do not intersect. */
export function intersectsRect(a: BoundingBox, b: BoundingBox): boolean {
  return a[0] < b[2] && a[2] > b[0] && a[1] < b[3] && a[3] > b[1];
}

function unit(x: number, y: number): Point | undefined {
  const length = Math.hypot(x, y);
  return length === 0 ? undefined : { x: x / length, y: y / length };
}

/** Unit edge normals of a polygon; zero-length edges contribute none. */
export function polygonAxes(polygon: readonly Point[]): Point[] {
  const axes: Point[] = [];
  const n = polygon.length;
  for (let i = 0; i < n; i++) {
    const p1 = polygon[i];
    const p2 = polygon[(i + 1) % n];
    const nx = -(p2.y - p1.y);
    const ny = p2.x - p1.x;
    const axis = unit(nx, ny);
    if (axis) axes.push(axis);
  }
  return axes;
}

/** Project a polygon onto an axis, returning [min, max]. */
export function projectPolygon(polygon: readonly Point[], axis: Point): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const p of polygon) {
    const dot = p.x * axis.x + p.y * axis.y;
    if (dot < min) min = dot;
    if (dot > max) max = dot;
  }
  return [min, max];
}

/**
 * Extra axes for polygons whose edges span fewer than two directions.
 *
 * A segment (or any collinear vertex list) contributes its own direction,
 * since its edge normal alone cannot separate collinear neighbours. When
 * either input has no edges at all, the axis through the two centroids is
 * added as well.
 */
function degenerateAxes(a: readonly Point[], b: readonly Point[]): Point[] {
  const axes: Point[] = [];
  let pointLike = false;

  for (const polygon of [a, b]) {
    const normals = polygonAxes(polygon);
    if (normals.length === 0) {
      pointLike = true;
      continue;
    }
    const [first] = normals;
    const collinear = normals.every((n) => Math.abs(n.x * first.y - n.y * first.x) < EDGE_EPSILON);
    if (collinear) axes.push({ x: first.y, y: -first.x });
  }

  if (pointLike) {
    const ca = centroid(a);
    const cb = centroid(b);
    const axis = unit(cb.x - ca.x, cb.y - ca.y);
    if (axis) axes.push(axis);
  }
  return axes;
}

function centroid(polygon: readonly Point[]): Point {
  let x = 0;
  let y = 0;
  for (const p of polygon) {
    x += p.x;
    y += p.y;
  }
  return { x: x / polygon.length, y: y / polygon.length };
}

/**
 * Separating Axis Theorem test for two convex polygons.
 *
 * Fails with `NonConvexPolygon` when either input is concave. Touching
 * projections count as overlap. Segments and single points (repeated
 * vertices included) are tested along their direction and the line
 * between centroids, so disjoint degenerate shapes do not overlap.
 */
export function intersectsPolygon(a: readonly Point[], b: readonly Point[]): Result<boolean> {
  if (!isConvex(a) || !isConvex(b)) {
    return err('NonConvexPolygon', 'Separating axis test requires convex polygons');
  }
  if (a.length === 0 || b.length === 0) return ok(false);

  const axes = [...polygonAxes(a), ...polygonAxes(b), ...degenerateAxes(a, b)];
  for (const axis of axes) {
    const [minA, maxA] = projectPolygon(a, axis);
    const [minB, maxB] = projectPolygon(b, axis);
    if (maxA < minB || maxB < minA) return ok(false);
  }
  return ok(true);
}
