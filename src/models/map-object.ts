/**
 * Map Object Model — positioned entities of an object layer.
 *
 * An object is built once from its attribute record: the shape is resolved,
 * a GID is normalized through the host registry, and width/height are
 * recomputed from the shape. Objects are never mutated afterwards; position
 * changes produce a new object.
 */

import type { GidRegistry } from './chunk.js';
import { ok, type Result } from './errors.js';
import {
  boundingBox,
  intersectsPolygon,
  intersectsRect,
  pointInEllipse,
  pointInPolygon,
  rotate,
  type BoundingBox,
  type Point,
} from './geometry.js';
import {
  generateRectanglePoints,
  parseShape,
  shapeSize,
  type Shape,
  type ShapeElement,
  type ShapeKind,
} from './shape.js';

export type PropertyValue = string | number | boolean;

/** Typed attributes of an `<object>` element plus its shape sub-element. */
export interface ObjectRecord {
  readonly id?: number;
  readonly name?: string;
  readonly type?: string;
  readonly x?: number;
  readonly y?: number;
  readonly width?: number;
  readonly height?: number;
  readonly rotation?: number;
  readonly gid?: number;
  readonly visible?: boolean;
  readonly template?: string;
  readonly shape?: ShapeElement | null;
  readonly properties?: Readonly<Record<string, PropertyValue>>;
}

/** Object kind: a shape kind, or `tile` for GID-backed objects. */
export type ObjectKind = ShapeKind | 'tile';

export interface MapObjectModel {
  readonly id: number;
  readonly name: string;
  readonly type: string;
  readonly kind: ObjectKind;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  /** Clockwise rotation about (x, y), in degrees. */
  readonly rotation: number;
  /** Normalized GID, 0 when the object is not tile-backed. */
  readonly gid: number;
  readonly visible: boolean;
  readonly template: string | undefined;
  readonly shape: Shape;
  readonly properties: Readonly<Record<string, PropertyValue>>;
}

export interface MapObjectOptions {
  ellipseSegments?: number;
}

/**
 * Build an object from its record.
 *
 * Fails with `MalformedShapeData` when the shape's point data is malformed.
 */
export function createMapObject(
  record: ObjectRecord,
  registry: GidRegistry,
  options: MapObjectOptions = {},
): Result<MapObjectModel> {
  const x = record.x ?? 0;
  const y = record.y ?? 0;
  const declared = { width: record.width ?? 0, height: record.height ?? 0 };

  const shape = parseShape({ x, y, ...declared }, record.shape, {
    ellipseSegments: options.ellipseSegments,
  });
  if (!shape.ok) return shape;

  const gid = record.gid ? registry.registerGid(record.gid) : 0;
  const { width, height } = shapeSize(shape.value, declared);

  const object: MapObjectModel = {
    id: record.id ?? 0,
    name: record.name ?? '',
    type: record.type ?? '',
    kind: gid !== 0 && shape.value.kind === 'rectangle' ? 'tile' : shape.value.kind,
    x,
    y,
    width,
    height,
    rotation: record.rotation ?? 0,
    gid,
    visible: record.visible ?? true,
    template: record.template,
    shape: shape.value,
    properties: Object.freeze({ ...record.properties }),
  };
  return ok(Object.freeze(object));
}

/**
 * Merge an object record over the record of its template.
 *
 * Attributes set on the object win; properties are merged key by key. The
 * template's shape applies only when the object declares none.
 */
export function applyTemplate(record: ObjectRecord, template: ObjectRecord): ObjectRecord {
  return {
    id: record.id ?? template.id,
    name: record.name ?? template.name,
    type: record.type ?? template.type,
    x: record.x ?? template.x,
    y: record.y ?? template.y,
    width: record.width ?? template.width,
    height: record.height ?? template.height,
    rotation: record.rotation ?? template.rotation,
    gid: record.gid ?? template.gid,
    visible: record.visible ?? template.visible,
    template: record.template,
    shape: record.shape ?? template.shape,
    properties: { ...template.properties, ...record.properties },
  };
}

/** Copy of an object moved to a new anchor, its points translated with it. */
export function moveMapObject(object: MapObjectModel, position: Point): MapObjectModel {
  const dx = position.x - object.x;
  const dy = position.y - object.y;
  const shape: Shape = Object.freeze({
    ...object.shape,
    points: Object.freeze(object.shape.points.map((p) => ({ x: p.x + dx, y: p.y + dy }))),
  });
  return Object.freeze({ ...object, x: position.x, y: position.y, shape });
}

// ── Queries ─────────────────────────────────────────────────────────

/** Outline of the object before rotation. */
function outline(object: MapObjectModel): readonly Point[] {
  if (object.shape.points.length > 0) return object.shape.points;
  return generateRectanglePoints(object.x, object.y, object.width, object.height);
}

/** Vertices with the object's rotation applied about its anchor. */
export function objectPoints(object: MapObjectModel): Point[] {
  return rotate(outline(object), { x: object.x, y: object.y }, object.rotation);
}

export function objectBoundingBox(object: MapObjectModel): BoundingBox {
  return boundingBox(objectPoints(object));
}

/**
 * Whether a point lies within the object.
 *
 * Point and text objects contain nothing. Ellipses use the analytic test
 * on the ellipse inscribed in `x`, `y`, `width`, `height`, and those are
 * the sizes measured from the polygon approximation, not the declared
 * ones. With a segment count that is not a multiple of 4 the samples miss
 * the extremes, so the tested ellipse is smaller and off-center (3
 * segments give 0.75 of the declared width).
 */
export function objectContainsPoint(object: MapObjectModel, point: Point): boolean {
  switch (object.kind) {
    case 'ellipse': {
      const rx = object.width / 2;
      const ry = object.height / 2;
      return pointInEllipse(point, { x: object.x + rx, y: object.y + ry }, rx, ry);
    }
    case 'point':
    case 'text':
      return false;
    default:
      return pointInPolygon(point, objectPoints(object));
  }
}

export function objectIntersectsRect(object: MapObjectModel, rect: BoundingBox): boolean {
  return intersectsRect(objectBoundingBox(object), rect);
}

/** Bounding-box overlap of two objects. */
export function objectIntersectsObject(a: MapObjectModel, b: MapObjectModel): boolean {
  return objectIntersectsRect(a, objectBoundingBox(b));
}

/** Exact overlap of two convex objects. */
export function objectIntersectsPolygon(a: MapObjectModel, b: MapObjectModel): Result<boolean> {
  return intersectsPolygon(objectPoints(a), objectPoints(b));
}
