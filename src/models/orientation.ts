/**
 * Orientation Transform — pixel/tile coordinate math per map projection.
 *
 * Unknown orientation strings fall back to orthogonal math rather than
 * failing, matching how the editor treats unrecognized maps.
 */

import type { Point } from './geometry.js';

export type Orientation = 'orthogonal' | 'isometric' | 'staggered' | 'hexagonal';
export type StaggerAxis = 'x' | 'y';
export type StaggerIndex = 'odd' | 'even';

/** Rotation a GID-backed object may carry, in degrees. */
export type ObjectRotation = 0 | 90 | 180 | 270;

export interface TileCoord {
  col: number;
  row: number;
}

const ORIENTATIONS: readonly Orientation[] = ['orthogonal', 'isometric', 'staggered', 'hexagonal'];

/** Narrow an orientation attribute, falling back to orthogonal. */
export function parseOrientation(value: string | undefined): Orientation {
  return ORIENTATIONS.find((o) => o === value) ?? 'orthogonal';
}

export function parseStaggerAxis(value: string | undefined): StaggerAxis {
  return value === 'x' ? 'x' : 'y';
}

export function parseStaggerIndex(value: string | undefined): StaggerIndex {
  return value === 'even' ? 'even' : 'odd';
}

/** Whether the stride at `index` carries the half-tile offset. */
function isShifted(index: number, staggerIndex: StaggerIndex): boolean {
  const odd = ((index % 2) + 2) % 2 === 1;
  return staggerIndex === 'odd' ? odd : !odd;
}

/** Distance between staggered strides, as a fraction of the tile size. */
function strideFactor(orientation: Orientation): number {
  return orientation === 'hexagonal' ? 0.75 : 0.5;
}

/**
 * Convert a map pixel position to the tile containing it.
 *
 * Staggered and hexagonal maps step by half (staggered) or three quarters
 * (hexagonal) of a tile along the stagger axis, and shift the cross axis by
 * half a tile on the strides selected by `staggerIndex`.
 */
export function pixelToTile(
  pixel: Point,
  orientation: string,
  tileWidth: number,
  tileHeight: number,
  staggerAxis: StaggerAxis = 'y',
  staggerIndex: StaggerIndex = 'odd',
): TileCoord {
  const kind = parseOrientation(orientation);
  const { x, y } = pixel;

  switch (kind) {
    case 'isometric': {
      const tx = x / tileWidth;
      const ty = y / tileHeight;
      return {
        col: Math.floor((tx + ty) / 2),
        row: Math.floor((ty - tx) / 2),
      };
    }
    case 'staggered':
    case 'hexagonal': {
      const factor = strideFactor(kind);
      if (staggerAxis === 'x') {
        const col = Math.floor(x / (tileWidth * factor));
        const offset = isShifted(col, staggerIndex) ? tileHeight / 2 : 0;
        return { col, row: Math.floor((y - offset) / tileHeight) };
      }
      const row = Math.floor(y / (tileHeight * factor));
      const offset = isShifted(row, staggerIndex) ? tileWidth / 2 : 0;
      return { col: Math.floor((x - offset) / tileWidth), row };
    }
    case 'orthogonal':
      return {
        col: Math.floor(x / tileWidth),
        row: Math.floor(y / tileHeight),
      };
  }
}

/**
 * Pixel position of a tile's reference corner; the inverse of `pixelToTile`
 * for whole tile coordinates.
 */
export function tileToPixel(
  tile: TileCoord,
  orientation: string,
  tileWidth: number,
  tileHeight: number,
  staggerAxis: StaggerAxis = 'y',
  staggerIndex: StaggerIndex = 'odd',
): Point {
  const kind = parseOrientation(orientation);
  const { col, row } = tile;

  switch (kind) {
    case 'isometric':
      return { x: (col - row) * tileWidth, y: (col + row) * tileHeight };
    case 'staggered':
    case 'hexagonal': {
      const factor = strideFactor(kind);
      if (staggerAxis === 'x') {
        const offset = isShifted(col, staggerIndex) ? tileHeight / 2 : 0;
        return { x: col * tileWidth * factor, y: row * tileHeight + offset };
      }
      const offset = isShifted(row, staggerIndex) ? tileWidth / 2 : 0;
      return { x: col * tileWidth + offset, y: row * tileHeight * factor };
    }
    case 'orthogonal':
      return { x: col * tileWidth, y: row * tileHeight };
  }
}

/**
 * Correct the anchor of a GID-backed object so its rotation pivots where
 * the editor draws it.
 *
 * Orthogonal, staggered and hexagonal maps move the anchor by the object
 * size for the rotation quadrant. Isometric maps additionally recenter by
 * half a tile and shift 90/270 degree placements by half the height.
 * `invertY` moves the anchor from the bottom edge to the top edge.
 * Unrecognized orientations leave the anchor unchanged.
 */
export function adjustGidObjectPosition(
  x: number,
  y: number,
  width: number,
  height: number,
  orientation: string,
  rotation: ObjectRotation,
  tileWidth: number,
  tileHeight: number,
  invertY: boolean,
): Point {
  if (!ORIENTATIONS.some((o) => o === orientation)) {
    return { x, y };
  }

  let ax = x;
  let ay = y;

  if (orientation === 'isometric') {
    ax -= tileWidth / 2;
    ay -= tileHeight / 2;
    if (rotation === 90 || rotation === 270) {
      ax += height / 2;
      ay += height / 2;
    }
  } else if (rotation === 90) {
    ax += height;
  } else if (rotation === 180) {
    ax += width;
    ay += height;
  } else if (rotation === 270) {
    ay += width;
  }

  if (invertY) ay -= height;
  return { x: ax, y: ay };
}

/** Snap an arbitrary rotation in degrees to the nearest quarter turn. */
export function toObjectRotation(degrees: number): ObjectRotation {
  const quarter = ((Math.round(degrees / 90) % 4) + 4) % 4;
  return ([0, 90, 180, 270] as const)[quarter];
}
