/**
 * Chunk Assembler — paged ("infinite") tile layer data.
 *
 * Infinite maps store tile data as independently positioned rectangular
 * chunks. Each chunk is decoded on its own, then all chunks are stitched
 * into one full-size grid. Structural anomalies (count mismatches, cells
 * outside the map, negative positions) are logged and skipped; malformed
 * chunk attributes abort extraction.
 */

import { err, ok, type Result } from './errors.js';
import { decodePayload, type DecodeOptions } from './layer-data.js';
import { EMPTY_GID } from './gid.js';
import { silentLogger } from './logger.js';

/** Attributes and text of one `<chunk>` element, as read from the file. */
export interface ChunkRecord {
  readonly x?: string;
  readonly y?: string;
  readonly width?: string;
  readonly height?: string;
  readonly text?: string | null;
}

export interface Chunk {
  /** Tile offset of the chunk's top-left cell. */
  readonly position: readonly [x: number, y: number];
  /** Size in tiles. */
  readonly size: readonly [width: number, height: number];
  /** Row-major raw GIDs, sliced by the declared width. */
  readonly grid: readonly (readonly number[])[];
  /** Decompressed payload; empty for CSV chunks. */
  readonly raw: Uint8Array;
}

/**
 * Host capability that turns a raw GID into the id stored in the grid.
 *
 * Implementations strip flag bits and record the tile as in use.
 */
export interface GidRegistry {
  registerGid(rawGid: number): number;
}

const INT_PATTERN = /^-?\d+$/;

function parseChunkInt(
  record: ChunkRecord,
  name: 'x' | 'y' | 'width' | 'height',
  index: number,
): Result<number> {
  const value = record[name]?.trim();
  if (value === undefined || !INT_PATTERN.test(value)) {
    return err(
      'InvalidChunkAttribute',
      `Chunk ${index} has an invalid "${name}" attribute`,
      value,
    );
  }
  const parsed = Number(value);
  if ((name === 'width' || name === 'height') && parsed < 0) {
    return err('InvalidChunkAttribute', `Chunk ${index} has a negative ${name}`, value);
  }
  return ok(parsed);
}

/**
 * Decode `<chunk>` records into chunks.
 *
 * A chunk without text or with undecodable text is left out. A missing or
 * non-integer attribute fails the whole extraction.
 */
export function extractChunks(
  records: readonly ChunkRecord[],
  encoding: string | undefined,
  compression: string | undefined,
  options: DecodeOptions = {},
): Result<Chunk[]> {
  const logger = options.logger ?? silentLogger;
  const chunks: Chunk[] = [];

  for (const [index, record] of records.entries()) {
    const x = parseChunkInt(record, 'x', index);
    if (!x.ok) return x;
    const y = parseChunkInt(record, 'y', index);
    if (!y.ok) return y;
    const width = parseChunkInt(record, 'width', index);
    if (!width.ok) return width;
    const height = parseChunkInt(record, 'height', index);
    if (!height.ok) return height;

    const text = record.text?.trim();
    if (!text) {
      logger.error(`Chunk ${index} has no tile data; skipping`);
      continue;
    }

    const payload = decodePayload(text, encoding, compression, { logger });
    if (!payload.ok) {
      logger.error(`Chunk ${index} could not be decoded; skipping`, {
        kind: payload.error.kind,
        reason: payload.error.message,
      });
      continue;
    }

    const gids = Array.from(payload.value.gids);
    const expected = width.value * height.value;
    if (gids.length !== expected) {
      logger.warn(`Chunk ${index} GID count mismatch`, { expected, actual: gids.length });
    }

    const grid: number[][] = [];
    for (let row = 0; row < height.value; row++) {
      grid.push(gids.slice(row * width.value, (row + 1) * width.value));
    }

    logger.debug(`Chunk ${index} decoded`, {
      x: x.value,
      y: y.value,
      width: width.value,
      height: height.value,
    });

    chunks.push(
      Object.freeze({
        position: [x.value, y.value] as const,
        size: [width.value, height.value] as const,
        grid,
        raw: payload.value.raw,
      }),
    );
  }

  logger.info(`Extracted ${chunks.length} of ${records.length} chunks`);
  return ok(chunks);
}

/**
 * Merge chunks into a `width` x `height` grid of normalized GIDs.
 *
 * Chunks are applied in order, so a later chunk overwrites cells an earlier
 * one wrote. Cells missing from a short chunk row are left untouched.
 */
export function stitchChunks(
  chunks: readonly Chunk[],
  width: number,
  height: number,
  registry: GidRegistry,
  options: DecodeOptions = {},
): number[][] {
  const logger = options.logger ?? silentLogger;
  const grid: number[][] = Array.from({ length: height }, () =>
    new Array<number>(width).fill(EMPTY_GID),
  );

  for (const [index, chunk] of chunks.entries()) {
    const [cx, cy] = chunk.position;
    if (cx < 0 || cy < 0) {
      logger.warn(`Skipping chunk ${index} at negative position`, { x: cx, y: cy });
      continue;
    }

    const [cw, ch] = chunk.size;
    let outOfBoundsLogged = false;
    let shortRowsLogged = false;

    for (let y = 0; y < ch; y++) {
      const row: readonly number[] | undefined = chunk.grid[y];
      for (let x = 0; x < cw; x++) {
        if (row === undefined || x >= row.length) {
          if (!shortRowsLogged) {
            logger.warn(`Chunk ${index} has fewer cells than its declared size`, {
              width: cw,
              height: ch,
            });
            shortRowsLogged = true;
          }
          break;
        }

        const normalized = registry.registerGid(row[x]);
        const gx = cx + x;
        const gy = cy + y;
        if (gx < width && gy < height) {
          grid[gy][gx] = normalized;
        } else if (!outOfBoundsLogged) {
          logger.warn(`Chunk ${index} contains out-of-bounds tiles`, { x: gx, y: gy });
          outOfBoundsLogged = true;
        }
      }
    }
  }

  logger.info(`Stitched ${chunks.length} chunks into ${width}x${height} grid`);
  return grid;
}
