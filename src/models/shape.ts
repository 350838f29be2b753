/**
 * Shape Parser — object sub-elements to vertex lists.
 *
 * A map object is a rectangle unless it carries a polygon, polyline,
 * ellipse, point or text sub-element. Every kind resolves to an immutable
 * `Shape` in absolute map pixel coordinates.
 */

import { err, ok, type Result } from './errors.js';
import type { Point } from './geometry.js';

export type ShapeKind = 'rectangle' | 'polygon' | 'polyline' | 'ellipse' | 'point' | 'text';

export type HorizontalAlign = 'left' | 'center' | 'right' | 'justify';
export type VerticalAlign = 'top' | 'center' | 'bottom';

/** Rich-text attributes of a text object. */
export interface TextStyle {
  readonly text: string;
  readonly fontFamily: string;
  readonly pixelSize: number;
  readonly wrap: boolean;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly strikeOut: boolean;
  readonly kerning: boolean;
  readonly hAlign: HorizontalAlign;
  readonly vAlign: VerticalAlign;
  readonly color: string;
}

export interface Shape {
  readonly kind: ShapeKind;
  /** Absolute vertices; empty for point and text objects. */
  readonly points: readonly Point[];
  readonly closed: boolean;
  readonly text?: TextStyle;
}

/** The shape sub-element of an object, if any. */
export type ShapeElement =
  | { readonly tag: 'polygon' | 'polyline'; readonly points: string }
  | { readonly tag: 'ellipse' }
  | { readonly tag: 'point' }
  | {
      readonly tag: 'text';
      readonly text?: string;
      readonly attributes?: Readonly<Record<string, string>>;
    };

/** Declared position and size of the owning object. */
export interface ObjectBounds {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface ShapeOptions {
  /** Segments of the ellipse approximation. Defaults to 16. */
  ellipseSegments?: number;
  /** Rotation of the ellipse samples about its center, in radians. */
  ellipseRotation?: number;
}

export const DEFAULT_TEXT_STYLE: TextStyle = Object.freeze({
  text: '',
  fontFamily: 'Sans Serif',
  pixelSize: 16,
  wrap: false,
  bold: false,
  italic: false,
  underline: false,
  strikeOut: false,
  kerning: true,
  hAlign: 'left',
  vAlign: 'top',
  color: '#000000FF',
});

// ── Point generators ────────────────────────────────────────────────

/** Corners of a rectangle, clockwise from the top-left. */
export function generateRectanglePoints(
  x: number,
  y: number,
  width: number,
  height: number,
): Point[] {
  return [
    { x, y },
    { x: x + width, y },
    { x: x + width, y: y + height },
    { x, y: y + height },
  ];
}

/**
 * Evenly spaced samples around the ellipse inscribed in the given box.
 * Zero segments yields no points.
 */
export function generateEllipsePoints(
  x: number,
  y: number,
  width: number,
  height: number,
  segments: number = 16,
  rotation: number = 0,
): Point[] {
  const cx = x + width / 2;
  const cy = y + height / 2;
  const rx = width / 2;
  const ry = height / 2;
  const cosR = Math.cos(rotation);
  const sinR = Math.sin(rotation);

  const points: Point[] = [];
  for (let i = 0; i < segments; i++) {
    const theta = (2 * Math.PI * i) / segments;
    const ex = rx * Math.cos(theta);
    const ey = ry * Math.sin(theta);
    points.push({
      x: cx + ex * cosR - ey * sinR,
      y: cy + ex * sinR + ey * cosR,
    });
  }
  return points;
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse a whitespace-separated list of `dx,dy` pairs. */
export function parsePointList(text: string): Result<Point[]> {
  const trimmed = text.trim();
  if (!trimmed) return ok([]);

  const points: Point[] = [];
  for (const pair of trimmed.split(/\s+/)) {
    const parts = pair.split(',');
    if (parts.length !== 2 || !NUMBER_PATTERN.test(parts[0]) || !NUMBER_PATTERN.test(parts[1])) {
      return err('MalformedShapeData', `Malformed point "${pair}"`);
    }
    points.push({ x: Number(parts[0]), y: Number(parts[1]) });
  }
  return ok(points);
}

// ── Text ────────────────────────────────────────────────────────────

const H_ALIGNS: readonly HorizontalAlign[] = ['left', 'center', 'right', 'justify'];
const V_ALIGNS: readonly VerticalAlign[] = ['top', 'center', 'bottom'];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value);
}

/** Read text attributes, filling the editor defaults. */
export function parseTextStyle(
  text: string | undefined,
  attributes: Readonly<Record<string, string>> = {},
): Result<TextStyle> {
  const flag = (name: string, fallback: boolean): boolean => {
    const value = attributes[name];
    return value === undefined ? fallback : value === '1';
  };

  let pixelSize = DEFAULT_TEXT_STYLE.pixelSize;
  const rawSize = attributes['pixelsize'];
  if (rawSize !== undefined) {
    if (!/^\d+$/.test(rawSize.trim())) {
      return err('MalformedShapeData', `Invalid text pixel size "${rawSize}"`);
    }
    pixelSize = Number(rawSize);
  }

  const hAlign = attributes['halign'] ?? DEFAULT_TEXT_STYLE.hAlign;
  const vAlign = attributes['valign'] ?? DEFAULT_TEXT_STYLE.vAlign;

  return ok({
    text: text ?? '',
    fontFamily: attributes['fontfamily'] ?? DEFAULT_TEXT_STYLE.fontFamily,
    pixelSize,
    wrap: flag('wrap', DEFAULT_TEXT_STYLE.wrap),
    bold: flag('bold', DEFAULT_TEXT_STYLE.bold),
    italic: flag('italic', DEFAULT_TEXT_STYLE.italic),
    underline: flag('underline', DEFAULT_TEXT_STYLE.underline),
    strikeOut: flag('strikeout', DEFAULT_TEXT_STYLE.strikeOut),
    kerning: flag('kerning', DEFAULT_TEXT_STYLE.kerning),
    hAlign: isOneOf(H_ALIGNS, hAlign) ? hAlign : DEFAULT_TEXT_STYLE.hAlign,
    vAlign: isOneOf(V_ALIGNS, vAlign) ? vAlign : DEFAULT_TEXT_STYLE.vAlign,
    color: attributes['color'] ?? DEFAULT_TEXT_STYLE.color,
  });
}

// ── Shape resolution ────────────────────────────────────────────────

function freezeShape(shape: Shape): Shape {
  Object.freeze(shape.points);
  return Object.freeze(shape);
}

/**
 * Resolve an object's geometry from its sub-element.
 *
 * Polygon and polyline points are offsets from the object anchor and come
 * back translated to absolute coordinates.
 */
export function parseShape(
  bounds: ObjectBounds,
  element: ShapeElement | null | undefined,
  options: ShapeOptions = {},
): Result<Shape> {
  const { x, y, width, height } = bounds;

  if (!element) {
    return ok(
      freezeShape({
        kind: 'rectangle',
        points: generateRectanglePoints(x, y, width, height),
        closed: true,
      }),
    );
  }

  switch (element.tag) {
    case 'polygon':
    case 'polyline': {
      const parsed = parsePointList(element.points);
      if (!parsed.ok) return parsed;
      return ok(
        freezeShape({
          kind: element.tag,
          points: parsed.value.map((p) => ({ x: p.x + x, y: p.y + y })),
          closed: element.tag === 'polygon',
        }),
      );
    }
    case 'ellipse':
      return ok(
        freezeShape({
          kind: 'ellipse',
          points: generateEllipsePoints(
            x,
            y,
            width,
            height,
            options.ellipseSegments ?? 16,
            options.ellipseRotation ?? 0,
          ),
          closed: true,
        }),
      );
    case 'point':
      return ok(freezeShape({ kind: 'point', points: [], closed: false }));
    case 'text': {
      const style = parseTextStyle(element.text, element.attributes);
      if (!style.ok) return style;
      return ok(freezeShape({ kind: 'text', points: [], closed: true, text: style.value }));
    }
  }
}

/**
 * Size of an object after shape resolution: the extent of its points when
 * it has any, otherwise the declared size.
 */
export function shapeSize(
  shape: Shape,
  declared: { readonly width: number; readonly height: number },
): { width: number; height: number } {
  if (shape.points.length === 0) {
    return { width: declared.width, height: declared.height };
  }
  const xs = shape.points.map((p) => p.x);
  const ys = shape.points.map((p) => p.y);
  return {
    width: Math.max(...xs) - Math.min(...xs),
    height: Math.max(...ys) - Math.min(...ys),
  };
}
