import { describe, it, expect } from 'vitest';
import {
  adjustGidObjectPosition,
  parseOrientation,
  parseStaggerAxis,
  parseStaggerIndex,
  pixelToTile,
  tileToPixel,
  toObjectRotation,
  type StaggerAxis,
  type StaggerIndex,
} from './orientation.js';

// ── parse helpers ─────────────────────────────────────────────────────

describe('parseOrientation', () => {
  it('accepts the four projections', () => {
    for (const o of ['orthogonal', 'isometric', 'staggered', 'hexagonal']) {
      expect(parseOrientation(o)).toBe(o);
    }
  });

  it('falls back to orthogonal', () => {
    expect(parseOrientation('oblique')).toBe('orthogonal');
    expect(parseOrientation(undefined)).toBe('orthogonal');
  });

  it('defaults stagger settings to y / odd', () => {
    expect(parseStaggerAxis(undefined)).toBe('y');
    expect(parseStaggerAxis('x')).toBe('x');
    expect(parseStaggerIndex(undefined)).toBe('odd');
    expect(parseStaggerIndex('even')).toBe('even');
  });
});

// ── pixelToTile ───────────────────────────────────────────────────────

describe('pixelToTile', () => {
  it('divides by tile size for orthogonal maps', () => {
    expect(pixelToTile({ x: 64, y: 96 }, 'orthogonal', 32, 32)).toEqual({ col: 2, row: 3 });
  });

  it('floors fractional positions', () => {
    expect(pixelToTile({ x: 31.9, y: 32 }, 'orthogonal', 32, 32)).toEqual({ col: 0, row: 1 });
  });

  it('uses the diamond formula for isometric maps', () => {
    expect(pixelToTile({ x: 64, y: 32 }, 'isometric', 32, 32)).toEqual({ col: 1, row: -1 });
    expect(pixelToTile({ x: 0, y: 0 }, 'isometric', 32, 32)).toEqual({ col: 0, row: 0 });
  });

  it('steps half a tile per row on y-staggered maps', () => {
    for (const index of ['even', 'odd'] as const) {
      expect(pixelToTile({ x: 48, y: 32 }, 'staggered', 32, 32, 'y', index)).toEqual({
        col: 1,
        row: 2,
      });
    }
  });

  it('steps half a tile per column on x-staggered maps', () => {
    for (const index of ['even', 'odd'] as const) {
      expect(pixelToTile({ x: 32, y: 48 }, 'staggered', 32, 32, 'x', index)).toEqual({
        col: 2,
        row: 1,
      });
    }
  });

  it('shifts only the strides selected by the stagger index', () => {
    // y = 16 lands on row 1, which is odd.
    expect(pixelToTile({ x: 40, y: 16 }, 'staggered', 32, 32, 'y', 'odd')).toEqual({
      col: 0,
      row: 1,
    });
    expect(pixelToTile({ x: 40, y: 16 }, 'staggered', 32, 32, 'y', 'even')).toEqual({
      col: 1,
      row: 1,
    });
  });

  it('steps three quarters of a tile on hexagonal maps', () => {
    expect(pixelToTile({ x: 64, y: 64 }, 'hexagonal', 32, 32, 'y', 'odd')).toEqual({
      col: 2,
      row: 2,
    });
    expect(pixelToTile({ x: 64, y: 64 }, 'hexagonal', 32, 32, 'x', 'odd')).toEqual({
      col: 2,
      row: 2,
    });
  });

  it('falls back to orthogonal math for unknown orientations', () => {
    expect(pixelToTile({ x: 64, y: 64 }, 'unknown', 32, 32)).toEqual({ col: 2, row: 2 });
  });
});

// ── tileToPixel ───────────────────────────────────────────────────────

describe('tileToPixel', () => {
  it('multiplies by tile size for orthogonal maps', () => {
    expect(tileToPixel({ col: 2, row: 3 }, 'orthogonal', 32, 16)).toEqual({ x: 64, y: 48 });
  });

  it('maps back to the same tile for every projection', () => {
    const cases: Array<[string, StaggerAxis, StaggerIndex]> = [
      ['orthogonal', 'y', 'odd'],
      ['isometric', 'y', 'odd'],
      ['staggered', 'y', 'odd'],
      ['staggered', 'y', 'even'],
      ['staggered', 'x', 'odd'],
      ['hexagonal', 'x', 'even'],
      ['hexagonal', 'y', 'odd'],
    ];
    for (const [orientation, axis, index] of cases) {
      for (const tile of [
        { col: 3, row: 5 },
        { col: 4, row: 2 },
      ]) {
        const pixel = tileToPixel(tile, orientation, 32, 32, axis, index);
        expect(pixelToTile(pixel, orientation, 32, 32, axis, index)).toEqual(tile);
      }
    }
  });

  it('offsets shifted rows by half a tile', () => {
    expect(tileToPixel({ col: 1, row: 1 }, 'staggered', 32, 32, 'y', 'odd')).toEqual({
      x: 48,
      y: 16,
    });
  });
});

// ── adjustGidObjectPosition ───────────────────────────────────────────

describe('adjustGidObjectPosition', () => {
  it('leaves unrotated orthogonal objects in place', () => {
    expect(adjustGidObjectPosition(10, 20, 30, 40, 'orthogonal', 0, 64, 64, false)).toEqual({
      x: 10,
      y: 20,
    });
  });

  it('moves 90 degree orthogonal objects right by their height', () => {
    expect(adjustGidObjectPosition(0, 0, 10, 20, 'orthogonal', 90, 64, 64, false)).toEqual({
      x: 20,
      y: 0,
    });
  });

  it('moves 180 degree objects by their size, then inverts y', () => {
    expect(adjustGidObjectPosition(5, 5, 10, 20, 'orthogonal', 180, 64, 64, true)).toEqual({
      x: 15,
      y: 5,
    });
  });

  it('recenters isometric objects by half a tile', () => {
    expect(adjustGidObjectPosition(100, 100, 32, 32, 'isometric', 0, 64, 64, false)).toEqual({
      x: 68,
      y: 68,
    });
  });

  it('biases rotated isometric objects by half their height', () => {
    expect(adjustGidObjectPosition(100, 100, 32, 32, 'isometric', 90, 64, 64, true)).toEqual({
      x: 84,
      y: 52,
    });
  });

  it('shares the orthogonal rule on staggered and hexagonal maps', () => {
    expect(adjustGidObjectPosition(0, 0, 10, 20, 'staggered', 270, 64, 64, false)).toEqual({
      x: 0,
      y: 10,
    });
    expect(adjustGidObjectPosition(10, 10, 10, 20, 'hexagonal', 180, 64, 64, true)).toEqual({
      x: 20,
      y: 10,
    });
  });

  it('leaves objects on unknown orientations untouched', () => {
    expect(adjustGidObjectPosition(1, 2, 3, 4, 'unknown', 90, 64, 64, true)).toEqual({
      x: 1,
      y: 2,
    });
  });
});

describe('toObjectRotation', () => {
  it('snaps to the nearest quarter turn', () => {
    expect(toObjectRotation(0)).toBe(0);
    expect(toObjectRotation(89)).toBe(90);
    expect(toObjectRotation(-90)).toBe(270);
    expect(toObjectRotation(540)).toBe(180);
  });
});
