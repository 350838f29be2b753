/**
 * Layer Model — Owned by Tilemap Model.
 *
 * Layer types: TileLayer (row-major 2D grid of normalized GIDs),
 * ObjectLayer (positioned map objects) and GroupLayer (nested layers).
 * All are built once from the records a loader reads out of the map file;
 * edits return new layers.
 *
 * GID 0 = empty cell. Raw GIDs carry flip/rotation flags in their top
 * 3 bits; grids hold the ids returned by the host `GidRegistry`.
 */

import { extractChunks, stitchChunks, type ChunkRecord, type GidRegistry } from './chunk.js';
import { err, ok, type Result } from './errors.js';
import { EMPTY_GID } from './gid.js';
import { decodeLayerData, reshape } from './layer-data.js';
import type { Logger } from './logger.js';
import {
  applyTemplate,
  createMapObject,
  type MapObjectModel,
  type ObjectRecord,
  type PropertyValue,
} from './map-object.js';

// ── Records ────────────────────────────────────────────────────────────

/** The `<data>` element of a tile layer. */
export interface TileDataRecord {
  readonly encoding?: string;
  readonly compression?: string;
  readonly text?: string;
  /** `<chunk>` children of an infinite map layer. */
  readonly chunks?: readonly ChunkRecord[];
  /** Number of legacy `<tile>` children. */
  readonly tileElementCount?: number;
}

export interface TileLayerRecord {
  readonly name?: string;
  readonly width: number;
  readonly height: number;
  readonly opacity?: number;
  readonly visible?: boolean;
  readonly offsetX?: number;
  readonly offsetY?: number;
  readonly data: TileDataRecord;
}

export interface ObjectLayerRecord {
  readonly name?: string;
  readonly opacity?: number;
  readonly visible?: boolean;
  readonly offsetX?: number;
  readonly offsetY?: number;
  readonly color?: string;
  readonly objects: readonly ObjectRecord[];
}

export interface GroupLayerRecord {
  readonly name?: string;
  readonly opacity?: number;
  readonly visible?: boolean;
  readonly offsetX?: number;
  readonly offsetY?: number;
  readonly properties?: Readonly<Record<string, PropertyValue>>;
  /** Child layers, bottom to top. */
  readonly layers: readonly LayerRecord[];
}

/** Any layer record, tagged with the element it came from. */
export type LayerRecord =
  | ({ readonly type: 'tile' } & TileLayerRecord)
  | ({ readonly type: 'object' } & ObjectLayerRecord)
  | ({ readonly type: 'group' } & GroupLayerRecord);

// ── Interfaces ─────────────────────────────────────────────────────────

/** Base properties shared by all layer types. */
export interface LayerBase {
  readonly name: string;
  readonly visible: boolean;
  readonly opacity: number; // 0.0 to 1.0
  readonly offsetX: number;
  readonly offsetY: number;
}

/** TileLayer stores normalized GIDs as rows: data[row][col]. */
export interface TileLayer extends LayerBase {
  readonly type: 'tile';
  readonly width: number;
  readonly height: number;
  readonly data: readonly (readonly number[])[];
}

/** ObjectLayer holds freeform positioned entities. */
export interface ObjectLayer extends LayerBase {
  readonly type: 'object';
  readonly color: string | undefined;
  readonly objects: readonly MapObjectModel[];
}

/** GroupLayer nests other layers under one name and property set. */
export interface GroupLayer extends LayerBase {
  readonly type: 'group';
  readonly properties: Readonly<Record<string, PropertyValue>>;
  readonly layers: readonly Layer[];
}

/** Discriminated union of all layer types. */
export type Layer = TileLayer | ObjectLayer | GroupLayer;

export interface LayerOptions {
  logger?: Logger;
  ellipseSegments?: number;
  /** Template records by source path, for objects that reference one. */
  templates?: ReadonlyMap<string, ObjectRecord>;
}

function clampOpacity(opacity: number | undefined): number {
  return Math.max(0, Math.min(1, opacity ?? 1));
}

// ── Parsing ────────────────────────────────────────────────────────────

/**
 * Build a tile layer from its record.
 *
 * Chunked data is stitched to the layer size; inline data is decoded,
 * registered and reshaped by the layer width. Legacy per-tile XML data
 * fails with `UnsupportedTileFormat`.
 */
export function parseTileLayer(
  record: TileLayerRecord,
  registry: GidRegistry,
  options: LayerOptions = {},
): Result<TileLayer> {
  const { data } = record;
  const decodeOptions = { logger: options.logger };

  if ((data.tileElementCount ?? 0) > 0) {
    return err(
      'UnsupportedTileFormat',
      'XML <tile> layer data is not supported; use base64 or csv encoding',
    );
  }

  let grid: number[][];
  if (data.chunks && data.chunks.length > 0) {
    const chunks = extractChunks(data.chunks, data.encoding, data.compression, decodeOptions);
    if (!chunks.ok) return chunks;
    grid = stitchChunks(chunks.value, record.width, record.height, registry, decodeOptions);
  } else {
    const gids = decodeLayerData(data.text ?? '', data.encoding, data.compression, decodeOptions);
    if (!gids.ok) return gids;
    grid = reshape(
      Array.from(gids.value, (raw) => registry.registerGid(raw)),
      record.width,
    );
  }

  return ok({
    type: 'tile',
    name: record.name ?? '',
    visible: record.visible ?? true,
    opacity: clampOpacity(record.opacity),
    offsetX: record.offsetX ?? 0,
    offsetY: record.offsetY ?? 0,
    width: record.width,
    height: record.height,
    data: grid,
  });
}

/**
 * Build an object layer from its record.
 *
 * Objects naming a template are merged over it first. A template missing
 * from `options.templates` leaves the object's own attributes in effect.
 */
export function parseObjectLayer(
  record: ObjectLayerRecord,
  registry: GidRegistry,
  options: LayerOptions = {},
): Result<ObjectLayer> {
  const objects: MapObjectModel[] = [];
  for (const objectRecord of record.objects) {
    const template = objectRecord.template
      ? options.templates?.get(objectRecord.template)
      : undefined;
    if (objectRecord.template && !template) {
      options.logger?.warn(`Template "${objectRecord.template}" not found`, {
        object: objectRecord.id,
      });
    }
    const merged = template ? applyTemplate(objectRecord, template) : objectRecord;
    const object = createMapObject(merged, registry, {
      ellipseSegments: options.ellipseSegments,
    });
    if (!object.ok) return object;
    objects.push(object.value);
  }

  return ok({
    type: 'object',
    name: record.name ?? '',
    visible: record.visible ?? true,
    opacity: clampOpacity(record.opacity),
    offsetX: record.offsetX ?? 0,
    offsetY: record.offsetY ?? 0,
    color: record.color,
    objects,
  });
}

/**
 * Build a group layer and, recursively, its children.
 *
 * The first child that fails stops the build with its error.
 */
export function parseGroupLayer(
  record: GroupLayerRecord,
  registry: GidRegistry,
  options: LayerOptions = {},
): Result<GroupLayer> {
  const layers: Layer[] = [];
  for (const child of record.layers) {
    const layer = parseLayer(child, registry, options);
    if (!layer.ok) return layer;
    layers.push(layer.value);
  }

  return ok({
    type: 'group',
    name: record.name ?? '',
    visible: record.visible ?? true,
    opacity: clampOpacity(record.opacity),
    offsetX: record.offsetX ?? 0,
    offsetY: record.offsetY ?? 0,
    properties: Object.freeze({ ...record.properties }),
    layers,
  });
}

/** Build any layer from its tagged record. */
export function parseLayer(
  record: LayerRecord,
  registry: GidRegistry,
  options: LayerOptions = {},
): Result<Layer> {
  switch (record.type) {
    case 'tile':
      return parseTileLayer(record, registry, options);
    case 'object':
      return parseObjectLayer(record, registry, options);
    case 'group':
      return parseGroupLayer(record, registry, options);
  }
}

// ── Layer Property Updates ─────────────────────────────────────────────

/** Return a new layer with the given name. */
export function setLayerName<T extends Layer>(layer: T, name: string): T {
  return { ...layer, name };
}

/** Return a new layer with the given visibility. */
export function setLayerVisible<T extends Layer>(layer: T, visible: boolean): T {
  return { ...layer, visible };
}

/** Return a new layer with the given opacity (clamped to 0.0-1.0). */
export function setLayerOpacity<T extends Layer>(layer: T, opacity: number): T {
  return { ...layer, opacity: clampOpacity(opacity) };
}

// ── Object Access ──────────────────────────────────────────────────────

/** First object with the given name, in layer order. */
export function findObjectByName(layer: ObjectLayer, name: string): MapObjectModel | undefined {
  return layer.objects.find((o) => o.name === name);
}

/** Return a new layer with the object appended. */
export function addObject(layer: ObjectLayer, object: MapObjectModel): ObjectLayer {
  return { ...layer, objects: [...layer.objects, object] };
}

/** Return a new layer without the objects that have the given id. */
export function removeObject(layer: ObjectLayer, id: number): ObjectLayer {
  return { ...layer, objects: layer.objects.filter((o) => o.id !== id) };
}

/** Return a new layer with the object of the same id replaced. */
export function updateObject(layer: ObjectLayer, object: MapObjectModel): ObjectLayer {
  return { ...layer, objects: layer.objects.map((o) => (o.id === object.id ? object : o)) };
}

/** Return a new layer with no objects. */
export function clearObjects(layer: ObjectLayer): ObjectLayer {
  return { ...layer, objects: [] };
}

// ── Layer Lookup ───────────────────────────────────────────────────────

/** Yield every layer depth-first, each group before its children. */
export function* iterLayers(layers: readonly Layer[]): Generator<Layer> {
  for (const layer of layers) {
    yield layer;
    if (layer.type === 'group') yield* iterLayers(layer.layers);
  }
}

/** First layer with the given name, searching into groups. */
export function findLayerByName(layers: readonly Layer[], name: string): Layer | undefined {
  for (const layer of iterLayers(layers)) {
    if (layer.name === name) return layer;
  }
  return undefined;
}

// ── Cell Access ────────────────────────────────────────────────────────

/** Get the GID at (col, row), or EMPTY_GID outside the grid. */
export function getCell(layer: TileLayer, col: number, row: number): number {
  const cells: readonly number[] | undefined = layer.data[row];
  return cells?.[col] ?? EMPTY_GID;
}

/** A non-empty cell of a tile layer. */
export interface TileCell {
  x: number;
  y: number;
  gid: number;
}

/** Yield every non-empty cell in row-major order. */
export function* iterTiles(layer: TileLayer): Generator<TileCell> {
  for (const [y, row] of layer.data.entries()) {
    for (const [x, gid] of row.entries()) {
      if (gid !== EMPTY_GID) yield { x, y, gid };
    }
  }
}
