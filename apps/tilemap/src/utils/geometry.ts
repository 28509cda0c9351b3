import type { Bounds, CornerConvention, LinearRing, Position, Rectangle } from '../types/geo';

export const rect = (x: number, y: number, width: number, height: number): Rectangle =>
  Object.freeze({ x, y, width, height });

export const closeRing = (ring: LinearRing): LinearRing => {
  if (ring.length < 3) return ring;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) return [...ring, first];
  return ring;
};

export const isEmpty = (r: Rectangle): boolean => !(r.width > 0) || !(r.height > 0);

export const emptyBounds = (): Bounds => ({ minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity });

// Grows bounds to cover r; origins feed the min side, far edges (origin + extent) the max side.
export const extend = (b: Bounds, r: Rectangle): Bounds => ({
  minX: Math.min(b.minX, r.x),
  minY: Math.min(b.minY, r.y),
  maxX: Math.max(b.maxX, r.x + r.width),
  maxY: Math.max(b.maxY, r.y + r.height)
});

export const boundsToRect = (b: Bounds): Rectangle => rect(b.minX, b.minY, b.maxX - b.minX, b.maxY - b.minY);

/** Strict overlap: rectangles sharing only an edge or a corner do not intersect, empty ones never do. */
export const intersects = (a: Rectangle, b: Rectangle): boolean => {
  if (isEmpty(a) || isEmpty(b)) return false;
  return a.x < b.x + b.width && a.x + a.width > b.x
    && a.y < b.y + b.height && a.y + a.height > b.y;
};

export const envelope = (rings: LinearRing[]): Rectangle | undefined => {
  let b = emptyBounds();
  for (const ring of rings) {
    for (const [x, y] of ring) b = extend(b, rect(x, y, 0, 0));
  }
  return b.minX <= b.maxX && b.minY <= b.maxY ? boundsToRect(b) : undefined;
};

export const fromCorners = (ul: Position, lr: Position, convention: CornerConvention): Rectangle => {
  const [ulx, uly] = ul;
  const [lrx, lry] = lr;
  return convention === 'literal'
    ? rect(ulx, uly, ulx - lrx, uly - lry)
    : rect(ulx, lry, lrx - ulx, uly - lry);
};

// Shortest round-tripping form; integral values keep a trailing ".0" (2 -> "2.0").
export const formatDouble = (value: number): string => {
  if (Object.is(value, -0)) return '-0.0';
  const s = String(value);
  return /^-?\d+$/.test(s) ? `${s}.0` : s;
};

const DOUBLE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const parseDouble = (text: string): number | undefined => {
  const s = text.trim();
  if (s === 'NaN') return NaN;
  if (/^[+-]?Infinity$/.test(s)) return s.startsWith('-') ? -Infinity : Infinity;
  return DOUBLE.test(s) ? Number(s) : undefined;
};
