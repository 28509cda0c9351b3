import type { Mission, TileEntry } from '../types/geo';
import { ParseError } from '../errors';
import { envelope } from '../utils/geometry';
import type { KmlPlacemark } from './kml';
import { TileMap } from './tileMap';

// WRS-2 grid limits
const MAX_PATH = 233;
const MAX_ROW = 248;

const PATH_ROW_NAME = /^(\d{1,3})[_\s-](\d{1,3})$/;

export const wrsTileId = (path: number, row: number): string =>
  `${String(path).padStart(3, '0')}${String(row).padStart(3, '0')}`;

function pathRow(placemark: KmlPlacemark): [string, string] | undefined {
  const { PATH, ROW } = placemark.data;
  if (PATH !== undefined && ROW !== undefined) return [PATH, ROW];
  const match = placemark.name ? PATH_ROW_NAME.exec(placemark.name) : null;
  return match ? [match[1], match[2]] : undefined;
}

/**
 * Landsat-8 tiles are WRS-2 path/row cells, named PPPRRR (e.g. 187031).
 * Path and row come from the placemark's ExtendedData, or from a "path_row" name.
 */
export class Landsat8TileMap extends TileMap {
  readonly mission: Mission = 'landsat8';

  protected tileFromPlacemark(placemark: KmlPlacemark): TileEntry | undefined {
    if (placemark.rings.length === 0) return undefined;
    const found = pathRow(placemark);
    if (!found) return undefined;

    const [pathText, rowText] = found;
    const path = Number(pathText);
    const row = Number(rowText);
    if (!Number.isInteger(path) || path < 1 || path > MAX_PATH) {
      throw new ParseError(`Invalid WRS-2 path "${pathText}"`, { field: 'PATH' });
    }
    if (!Number.isInteger(row) || row < 1 || row > MAX_ROW) {
      throw new ParseError(`Invalid WRS-2 row "${rowText}"`, { field: 'ROW' });
    }
    const rectangle = envelope(placemark.rings);
    return rectangle && { id: wrsTileId(path, row), rectangle };
  }
}
