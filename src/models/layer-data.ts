/**
 * Layer Data Codec — encoded tile payloads to flat GID sequences.
 *
 * Tile layer and chunk payloads arrive as text: either CSV or base64 over
 * an optionally compressed byte stream of little-endian u32 GIDs.
 * Decoding never normalizes GIDs; flags stay in the returned values.
 */

import { gunzipSync, gzipSync, unzlibSync, zlibSync } from 'fflate';
import { decompress as zstdDecompress } from 'fzstd';
import { err, ok, type Result } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export type LayerEncoding = 'base64' | 'csv';
export type LayerCompression = 'zlib' | 'gzip' | 'zstd';

export interface DecodeOptions {
  logger?: Logger;
}

/** Decoded GIDs together with the byte payload they were read from. */
export interface DecodedPayload {
  readonly gids: Uint32Array;
  /** Decompressed bytes; empty for CSV, which has no binary form. */
  readonly raw: Uint8Array;
}

const EMPTY_BYTES = new Uint8Array(0);

const INFLATERS: Readonly<Record<string, (bytes: Uint8Array) => Uint8Array>> = {
  zlib: (bytes) => unzlibSync(bytes),
  gzip: (bytes) => gunzipSync(bytes),
  zstd: (bytes) => zstdDecompress(bytes),
};

function decompressBytes(
  bytes: Uint8Array,
  compression: string | undefined,
): Result<Uint8Array> {
  if (!compression) return ok(bytes);

  const inflate = INFLATERS[compression];
  if (!inflate) {
    return err('UnsupportedCompression', `Layer compression "${compression}" is not supported`);
  }
  try {
    return ok(inflate(bytes));
  } catch (cause) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return err('CorruptLayerData', `Failed to ${compression}-decompress layer data`, detail);
  }
}

/**
 * Read little-endian u32 values from a byte buffer.
 *
 * A length that is not a multiple of 4 leaves a partial trailing GID; those
 * bytes are dropped and reported through the logger.
 */
export function unpackGids(bytes: Uint8Array, logger: Logger = silentLogger): Uint32Array {
  const count = Math.floor(bytes.byteLength / 4);
  const remainder = bytes.byteLength % 4;
  if (remainder !== 0) {
    logger.warn('Layer data length is not a multiple of 4; dropping trailing bytes', {
      byteLength: bytes.byteLength,
      dropped: remainder,
    });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const gids = new Uint32Array(count);
  for (let i = 0; i < count; i++) {
    gids[i] = view.getUint32(i * 4, true);
  }
  return gids;
}

const UINT_PATTERN = /^\d+$/;

function parseCsv(text: string): Result<Uint32Array> {
  const trimmed = text.trim();
  if (!trimmed) return ok(new Uint32Array(0));

  const cells = trimmed.split(',');
  const gids = new Uint32Array(cells.length);
  for (let i = 0; i < cells.length; i++) {
    const cell = cells[i].trim();
    const value = Number(cell);
    if (!UINT_PATTERN.test(cell) || value > 0xffffffff) {
      return err('CorruptLayerData', `Invalid CSV tile value "${cell}" at index ${i}`);
    }
    gids[i] = value;
  }
  return ok(gids);
}

/** Decode a payload, keeping the decompressed bytes. */
export function decodePayload(
  text: string,
  encoding: string | undefined,
  compression: string | undefined,
  options: DecodeOptions = {},
): Result<DecodedPayload> {
  const logger = options.logger ?? silentLogger;

  if (encoding === 'base64') {
    const bytes: Uint8Array = Buffer.from(text.trim(), 'base64');
    const inflated = decompressBytes(bytes, compression);
    if (!inflated.ok) return inflated;
    return ok({ gids: unpackGids(inflated.value, logger), raw: inflated.value });
  }

  if (encoding === 'csv') {
    const parsed = parseCsv(text);
    if (!parsed.ok) return parsed;
    return ok({ gids: parsed.value, raw: EMPTY_BYTES });
  }

  return err(
    'UnsupportedEncoding',
    encoding ? `Layer encoding "${encoding}" is not supported` : 'Layer data has no encoding',
  );
}

/** Decode layer text into its flat sequence of raw GIDs. */
export function decodeLayerData(
  text: string,
  encoding: string | undefined,
  compression: string | undefined,
  options: DecodeOptions = {},
): Result<Uint32Array> {
  const payload = decodePayload(text, encoding, compression, options);
  return payload.ok ? ok(payload.value.gids) : payload;
}

/**
 * Encode GIDs in the textual form Tiled writes.
 *
 * Zstd output is not offered; decoding it is supported.
 */
export function encodeLayerData(
  gids: ArrayLike<number>,
  encoding: LayerEncoding,
  compression?: Exclude<LayerCompression, 'zstd'>,
): string {
  if (encoding === 'csv') {
    return Array.from(gids).join(',');
  }

  const bytes = new Uint8Array(gids.length * 4);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < gids.length; i++) {
    view.setUint32(i * 4, gids[i] >>> 0, true);
  }

  let packed: Uint8Array = bytes;
  if (compression === 'zlib') packed = zlibSync(bytes);
  else if (compression === 'gzip') packed = gzipSync(bytes);
  return Buffer.from(packed).toString('base64');
}

// ── Grid reshaping ──────────────────────────────────────────────────

/**
 * Slice a flat GID sequence into rows of `width`.
 *
 * The last row is short when the length is not a multiple of `width`.
 */
export function reshape(gids: ArrayLike<number>, width: number): number[][] {
  const source = Array.from(gids);
  if (width <= 0) return source.length ? [source] : [];
  const rows: number[][] = [];
  for (let i = 0; i < source.length; i += width) {
    rows.push(source.slice(i, i + width));
  }
  return rows;
}

/** Concatenate grid rows back into one row-major sequence. */
export function flatten(grid: readonly (readonly number[])[]): number[] {
  return grid.flat();
}
