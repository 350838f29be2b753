import type { GidRegistry } from './chunk.js';
import { resolveConfig, type TmxConfig } from './config.js';
import { unwrap } from './errors.js';
import { EMPTY_FLAGS, GidCodec, rotationFromFlags, type TileFlags, type TileRotation } from './gid.js';
import {
  findLayerByName,
  getCell,
  parseGroupLayer,
  parseObjectLayer,
  parseTileLayer,
  type GroupLayer,
  type GroupLayerRecord,
  type Layer,
  type LayerOptions,
  type ObjectLayer,
  type ObjectLayerRecord,
  type TileLayer,
  type TileLayerRecord,
} from './layer-model.js';
import { createLogger, type Logger } from './logger.js';
import { moveMapObject, type MapObjectModel, type ObjectRecord } from './map-object.js';
import {
  adjustGidObjectPosition,
  parseOrientation,
  parseStaggerAxis,
  parseStaggerIndex,
  pixelToTile,
  tileToPixel,
  toObjectRotation,
  type Orientation,
  type StaggerAxis,
  type StaggerIndex,
  type TileCoord,
} from './orientation.js';

/**
 * Options for constructing a TilemapModel.
 */
export interface TilemapOptions {
  /** Map width in tiles. */
  width: number;
  /** Map height in tiles. */
  height: number;
  /** Tile width in pixels. */
  tileWidth: number;
  /** Tile height in pixels. */
  tileHeight: number;
  /** Projection name; unknown values behave as orthogonal. */
  orientation?: string;
  staggerAxis?: string;
  staggerIndex?: string;
  config?: Partial<TmxConfig>;
  logger?: Logger;
  /** Object templates by source path. */
  templates?: ReadonlyMap<string, ObjectRecord>;
}

/** A tile id registered with the map, mapped back to its file GID. */
export interface RegisteredTile {
  /** GID as written in the file, flags stripped. */
  readonly tiledGid: number;
  readonly flags: TileFlags;
}

/**
 * Core data structure for a loaded tile map.
 *
 * Hold map dimensions, projection, and an ordered layer stack. Act as the
 * `GidRegistry` for its layers: every distinct raw GID (base tile plus
 * flags) gets a compact id from 1 upward, so grids keep per-cell flags
 * without storing flag bits.
 */
export class TilemapModel implements GidRegistry {
  readonly width: number;
  readonly height: number;
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly orientation: Orientation;
  readonly staggerAxis: StaggerAxis;
  readonly staggerIndex: StaggerIndex;
  readonly config: TmxConfig;

  private readonly logger: Logger;
  private readonly codec = new GidCodec();
  private readonly templates: ReadonlyMap<string, ObjectRecord>;
  private _layers: Layer[] = [];
  private _idsByRaw = new Map<number, number>();
  private _tiles: RegisteredTile[] = [];

  constructor(options: TilemapOptions) {
    this.width = options.width;
    this.height = options.height;
    this.tileWidth = options.tileWidth;
    this.tileHeight = options.tileHeight;
    this.orientation = parseOrientation(options.orientation);
    this.staggerAxis = parseStaggerAxis(options.staggerAxis);
    this.staggerIndex = parseStaggerIndex(options.staggerIndex);
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? createLogger('map', { level: this.config.logLevel });
    this.templates = options.templates ?? new Map();

    if (options.orientation !== undefined && options.orientation !== this.orientation) {
      this.logger.warn(`Unknown orientation "${options.orientation}"; using orthogonal`);
    }
  }

  // ── GID registry ──────────────────────────────────────────────────

  /** Register a raw GID and return its compact id. GID 0 stays 0. */
  registerGid(rawGid: number): number {
    const raw = rawGid >>> 0;
    if (raw === 0) return 0;

    const existing = this._idsByRaw.get(raw);
    if (existing !== undefined) return existing;

    const { gid, flags } = this.codec.decode(raw);
    this._tiles.push({ tiledGid: gid, flags });
    const id = this._tiles.length;
    this._idsByRaw.set(raw, id);
    return id;
  }

  /** Number of distinct tiles registered so far. */
  get registeredCount(): number {
    return this._tiles.length;
  }

  /** File GID (flags stripped) behind a compact id, or 0. */
  tiledGidFor(id: number): number {
    return this._tiles[id - 1]?.tiledGid ?? 0;
  }

  /** Flags behind a compact id. */
  flagsFor(id: number): TileFlags {
    return this._tiles[id - 1]?.flags ?? EMPTY_FLAGS;
  }

  /** Rotation expressed by the flags behind a compact id. */
  tileRotation(id: number): TileRotation {
    return rotationFromFlags(this.flagsFor(id));
  }

  // ── Layer management ──────────────────────────────────────────────

  /** Ordered layer stack (index 0 = bottom). */
  get layers(): readonly Layer[] {
    return this._layers;
  }

  /** Append a layer to the top of the stack. */
  addLayer(layer: Layer): void {
    this._layers.push(layer);
  }

  /** Remove and return the layer at the given index. */
  removeLayer(index: number): Layer | undefined {
    if (index < 0 || index >= this._layers.length) {
      return undefined;
    }
    return this._layers.splice(index, 1)[0];
  }

  /** Get the layer at the given index. */
  getLayer(index: number): Layer | undefined {
    return this._layers[index];
  }

  /** Replace the layer at the given index (no-op when out of range). */
  replaceLayer(index: number, layer: Layer): void {
    if (index < 0 || index >= this._layers.length) {
      return;
    }
    this._layers[index] = layer;
  }

  /** First layer with the given name, searching into groups. */
  getLayerByName(name: string): Layer | undefined {
    return findLayerByName(this._layers, name);
  }

  /**
   * Decode a tile layer record and append it.
   *
   * Throws a TmxError when the data cannot be decoded.
   */
  loadTileLayer(record: TileLayerRecord): TileLayer {
    const layer = unwrap(parseTileLayer(record, this, this.layerOptions()));
    this.addLayer(layer);
    return layer;
  }

  /**
   * Build an object layer record and append it.
   *
   * Tile objects are re-anchored for the map projection. Throws a TmxError
   * on malformed shape data.
   */
  loadObjectLayer(record: ObjectLayerRecord): ObjectLayer {
    const layer = this.placeObjects(unwrap(parseObjectLayer(record, this, this.layerOptions())));
    this.addLayer(layer);
    return layer;
  }

  /**
   * Build a group layer record with all of its children and append it.
   *
   * Throws a TmxError when any child fails to load.
   */
  loadGroupLayer(record: GroupLayerRecord): GroupLayer {
    const layer = this.placeGroup(unwrap(parseGroupLayer(record, this, this.layerOptions())));
    this.addLayer(layer);
    return layer;
  }

  private layerOptions(): LayerOptions {
    return {
      logger: this.logger,
      ellipseSegments: this.config.ellipseSegments,
      templates: this.templates,
    };
  }

  private placeObjects(layer: ObjectLayer): ObjectLayer {
    return { ...layer, objects: layer.objects.map((o) => this.placeTileObject(o)) };
  }

  private placeGroup(group: GroupLayer): GroupLayer {
    const layers = group.layers.map((layer): Layer => {
      switch (layer.type) {
        case 'object':
          return this.placeObjects(layer);
        case 'group':
          return this.placeGroup(layer);
        case 'tile':
          return layer;
      }
    });
    return { ...group, layers };
  }

  /** Copy of a GID-backed object with its anchor corrected for this map. */
  placeTileObject(object: MapObjectModel): MapObjectModel {
    if (object.kind !== 'tile') return object;
    const position = adjustGidObjectPosition(
      object.x,
      object.y,
      object.width,
      object.height,
      this.orientation,
      toObjectRotation(object.rotation),
      this.tileWidth,
      this.tileHeight,
      this.config.invertY,
    );
    return moveMapObject(object, position);
  }

  // ── Cell access (convenience wrappers) ────────────────────────────

  /**
   * Get the GID at (col, row) on a specific tile layer.
   *
   * Return 0 if the layer index is out of range, the layer is not a
   * tile layer, or the coordinates are out of bounds.
   */
  getCellGid(layerIndex: number, col: number, row: number): number {
    const layer = this._layers[layerIndex];
    if (!layer || layer.type !== 'tile') {
      return 0;
    }
    return getCell(layer, col, row);
  }

  // ── Coordinate conversion ─────────────────────────────────────────

  /** Convert a pixel position to the tile containing it (not clamped). */
  pixelToTile(px: number, py: number): TileCoord {
    return pixelToTile(
      { x: px, y: py },
      this.orientation,
      this.tileWidth,
      this.tileHeight,
      this.staggerAxis,
      this.staggerIndex,
    );
  }

  /** Convert a tile column/row to the pixel position of its reference corner. */
  tileToPixel(col: number, row: number): { x: number; y: number } {
    return tileToPixel(
      { col, row },
      this.orientation,
      this.tileWidth,
      this.tileHeight,
      this.staggerAxis,
      this.staggerIndex,
    );
  }

  /** Map width in pixels. */
  get pixelWidth(): number {
    return this.width * this.tileWidth;
  }

  /** Map height in pixels. */
  get pixelHeight(): number {
    return this.height * this.tileHeight;
  }
}
