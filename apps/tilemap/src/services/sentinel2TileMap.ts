import type { Mission, TileEntry } from '../types/geo';
import { ParseError } from '../errors';
import { envelope } from '../utils/geometry';
import type { KmlPlacemark } from './kml';
import { TileMap } from './tileMap';

// UTM zone, latitude band, 100km square column and row letters (I and O never used)
const MGRS_TILE = /^(\d{2})[C-HJ-NP-X][A-HJ-NP-Z][A-HJ-NP-V]$/;

export const isMgrsTile = (name: string): boolean => {
  const match = MGRS_TILE.exec(name);
  if (!match) return false;
  const zone = Number(match[1]);
  return zone >= 1 && zone <= 60;
};

/** Sentinel-2 tiles: placemark name is the MGRS square, extent is the envelope of its polygons. */
export class Sentinel2TileMap extends TileMap {
  readonly mission: Mission = 'sentinel2';

  protected tileFromPlacemark(placemark: KmlPlacemark): TileEntry | undefined {
    if (!placemark.name || placemark.rings.length === 0) return undefined;
    const id = placemark.name.toUpperCase();
    if (!isMgrsTile(id)) {
      throw new ParseError(`Invalid Sentinel-2 tile name "${placemark.name}"`, { field: 'name' });
    }
    const rectangle = envelope(placemark.rings);
    return rectangle && { id, rectangle };
  }
}
