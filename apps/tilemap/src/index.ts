export type { Bounds, CornerConvention, LinearRing, Mission, Position, Rectangle, TileEntry } from './types/geo';
export { TileMapError, ParseError, IOError } from './errors';
export { CORNER_CONVENTIONS, loadConfig, readVerbose, readCornerConvention, isCornerConvention, type TileMapConfig } from './config';
export { TileMap, parseTileLine, formatTileLine, type TileMapOptions } from './services/tileMap';
export { Sentinel2TileMap, isMgrsTile } from './services/sentinel2TileMap';
export { Landsat8TileMap, wrsTileId } from './services/landsat8TileMap';
export { parseKmlPlacemarks, type KmlPlacemark } from './services/kml';
export { MISSIONS, isMission, createTileMap, loadTileMap } from './services/missions';
export { rect, intersects, envelope, fromCorners } from './utils/geometry';
