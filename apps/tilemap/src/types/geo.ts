export type Position = [number, number]; // [lon, lat] in degrees
export type LinearRing = Position[]; // closed (first==last)

/** Axis-aligned rectangle anchored at its min corner. Width/height are kept as given, even if negative. */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export type Mission = 'sentinel2' | 'landsat8';

/**
 * How an upper-left / lower-right corner pair becomes a query rectangle.
 *  - literal:   Rectangle(ulx, uly, ulx-lrx, uly-lry), compatible with existing callers
 *  - corrected: Rectangle(ulx, lry, lrx-ulx, uly-lry)
 */
export type CornerConvention = 'literal' | 'corrected';

export interface TileEntry {
  id: string;
  rectangle: Rectangle;
}
