export * from './models/errors.js';
export * from './models/logger.js';
export * from './models/config.js';
export * from './models/gid.js';
export * from './models/layer-data.js';
export * from './models/chunk.js';
export * from './models/geometry.js';
export * from './models/shape.js';
export * from './models/orientation.js';
export * from './models/map-object.js';
export * from './models/layer-model.js';
export * from './models/tilemap-model.js';
