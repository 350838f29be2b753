/**
 * GID Constants & Codec — single source of truth.
 *
 * A GID (Global tile ID) is a 32-bit unsigned integer where the top 3 bits
 * encode flip/rotation flags and the lower 29 bits hold the base tile index.
 *
 *   bit 31 — horizontal flip
 *   bit 30 — vertical flip
 *   bit 29 — diagonal flip (anti-diagonal transpose)
 */

/** GID value representing an empty cell. */
export const EMPTY_GID = 0;

/** Flip/rotation flags stored in the top 3 bits of a 32-bit GID. */
export const FLIP_HORIZONTAL = 0x80000000;
export const FLIP_VERTICAL = 0x40000000;
export const FLIP_DIAGONAL = 0x20000000;

/** Mask covering all three flag bits. */
export const FLIP_FLAGS_MASK = 0xe0000000;

/** Mask to extract the base tile ID, stripping all flags. */
export const GID_MASK = 0x1fffffff;

/** Transform flags decoded from the top bits of a GID. */
export interface TileFlags {
  readonly flippedHorizontally: boolean;
  readonly flippedVertically: boolean;
  readonly flippedDiagonally: boolean;
}

export const EMPTY_FLAGS: TileFlags = Object.freeze({
  flippedHorizontally: false,
  flippedVertically: false,
  flippedDiagonally: false,
});

/** Rotation a flag combination expresses, in degrees. */
export type TileRotation = 0 | 90 | 180 | 270;

export interface DecodedGid {
  readonly gid: number;
  readonly flags: TileFlags;
}

/** Strip flip/rotation flags from a GID, returning the base tile index. */
export function maskGid(gid: number): number {
  return (gid & GID_MASK) >>> 0;
}

/** Check whether a GID has the horizontal flip flag set. */
export function isFlippedHorizontal(gid: number): boolean {
  return (gid & FLIP_HORIZONTAL) !== 0;
}

/** Check whether a GID has the vertical flip flag set. */
export function isFlippedVertical(gid: number): boolean {
  return (gid & FLIP_VERTICAL) !== 0;
}

/** Check whether a GID has the diagonal flip flag set. */
export function isFlippedDiagonal(gid: number): boolean {
  return (gid & FLIP_DIAGONAL) !== 0;
}

/** Read all three flag bits of a GID. */
export function flagsFromGid(gid: number): TileFlags {
  return {
    flippedHorizontally: isFlippedHorizontal(gid),
    flippedVertically: isFlippedVertical(gid),
    flippedDiagonally: isFlippedDiagonal(gid),
  };
}

/** Compose a GID from a base tile ID and optional flip/rotation flags. */
export function composeGid(
  tileId: number,
  flipH: boolean = false,
  flipV: boolean = false,
  flipD: boolean = false,
): number {
  let gid = tileId & GID_MASK;
  if (flipH) gid |= FLIP_HORIZONTAL;
  if (flipV) gid |= FLIP_VERTICAL;
  if (flipD) gid |= FLIP_DIAGONAL;
  return gid >>> 0;
}

/**
 * Rotation expressed by a flag combination.
 *
 * Only diagonal flips paired with a horizontal and/or vertical flip map to
 * a rotation. A lone diagonal flip is a transpose, not a rotation, and
 * reports 0.
 */
export function rotationFromFlags(flags: TileFlags): TileRotation {
  if (!flags.flippedDiagonally) return 0;
  const h = flags.flippedHorizontally;
  const v = flags.flippedVertically;
  if (h && !v) return 90;
  if (h && v) return 180;
  if (!h && v) return 270;
  return 0;
}

// ── Flag cache ──────────────────────────────────────────────────────

/**
 * Memo of decoded flags keyed by raw GID.
 *
 * Append-only: a key always maps to the same flags, so a repeated insert
 * for the same key is harmless. Entries are frozen before they are stored.
 */
export class FlagCache {
  private readonly entries = new Map<number, TileFlags>();

  get(rawGid: number): TileFlags | undefined {
    return this.entries.get(rawGid);
  }

  set(rawGid: number, flags: TileFlags): TileFlags {
    const existing = this.entries.get(rawGid);
    if (existing) return existing;
    const frozen = Object.freeze({ ...flags });
    this.entries.set(rawGid, frozen);
    return frozen;
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Decodes raw GIDs, memoizing flag lookups in its own cache. */
export class GidCodec {
  readonly cache: FlagCache;

  constructor(cache: FlagCache = new FlagCache()) {
    this.cache = cache;
  }

  /**
   * Split a raw GID into its base tile index and transform flags.
   *
   * Unflagged GIDs take a fast path that never touches the cache.
   */
  decode(rawGid: number): DecodedGid {
    const raw = rawGid >>> 0;
    if (raw < FLIP_DIAGONAL) {
      return { gid: raw, flags: EMPTY_FLAGS };
    }
    const flags = this.cache.get(raw) ?? this.cache.set(raw, flagsFromGid(raw));
    return { gid: maskGid(raw), flags };
  }
}

const defaultCodec = new GidCodec();

/**
 * Functional form of `GidCodec.decode`.
 *
 * Without a cache, flags are memoized in a module-wide cache shared by
 * every call.
 */
export function decodeGid(rawGid: number, cache?: FlagCache): DecodedGid {
  const codec = cache ? new GidCodec(cache) : defaultCodec;
  return codec.decode(rawGid);
}
