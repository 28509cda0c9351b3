import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { LinearRing, Position } from '../types/geo';
import { ParseError } from '../errors';
import { closeRing, parseDouble } from '../utils/geometry';

export interface KmlPlacemark {
  name?: string;
  data: Record<string, string>; // ExtendedData, keyed by upper-cased field name
  rings: LinearRing[]; // outer rings of every Polygon, MultiGeometry included
}

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true
});

const isNode = (value: unknown): value is XmlNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] =>
  value === undefined ? [] : Array.isArray(value) ? value : [value];

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return undefined;
}

// Depth-first search for every element named `tag`, not descending into matches
function collect(node: unknown, tag: string, out: unknown[] = []): unknown[] {
  if (Array.isArray(node)) {
    for (const item of node) collect(item, tag, out);
  } else if (isNode(node)) {
    for (const [key, val] of Object.entries(node)) {
      if (key.startsWith('@_') || key === '#text') continue;
      if (key === tag) out.push(...asArray(val));
      else collect(val, tag, out);
    }
  }
  return out;
}

const collectNodes = (node: unknown, tag: string): XmlNode[] => collect(node, tag).filter(isNode);

function parseCoordinates(text: string, placemark: string): LinearRing {
  const ring: Position[] = [];
  for (const token of text.trim().split(/\s+/)) {
    if (!token) continue;
    const parts = token.split(',');
    const lon = parts.length >= 2 ? parseDouble(parts[0]) : undefined;
    const lat = parts.length >= 2 ? parseDouble(parts[1]) : undefined;
    if (lon === undefined || lat === undefined) {
      throw new ParseError(`Invalid coordinate "${token}" in placemark ${placemark}`, { field: 'coordinates' });
    }
    ring.push([lon, lat]);
  }
  return closeRing(ring);
}

function extendedData(placemark: XmlNode): Record<string, string> {
  const data: Record<string, string> = {};
  for (const ext of collectNodes(placemark, 'ExtendedData')) {
    for (const el of [...collectNodes(ext, 'Data'), ...collectNodes(ext, 'SimpleData')]) {
      const key = textOf(el['@_name']);
      const value = 'value' in el ? textOf(el.value) : textOf(el);
      if (key && value !== undefined) data[key.toUpperCase()] = value.trim();
    }
  }
  return data;
}

function toPlacemark(node: XmlNode, index: number): KmlPlacemark {
  const name = textOf(node.name)?.trim() || undefined;
  const label = name ?? `#${index + 1}`;
  const rings: LinearRing[] = [];
  for (const polygon of collectNodes(node, 'Polygon')) {
    for (const outer of collectNodes(polygon, 'outerBoundaryIs')) {
      for (const coords of collect(outer, 'coordinates')) {
        const ring = parseCoordinates(textOf(coords) ?? '', label);
        if (ring.length > 0) rings.push(ring);
      }
    }
  }
  return { name, data: extendedData(node), rings };
}

/** Parses a KML document and returns its placemarks in document order. */
export function parseKmlPlacemarks(kml: string): KmlPlacemark[] {
  const valid = XMLValidator.validate(kml);
  if (valid !== true) {
    throw new ParseError(`Invalid KML: ${valid.err.msg}`, { line: valid.err.line, column: valid.err.col });
  }
  const doc: unknown = parser.parse(kml);
  if (!isNode(doc) || !('kml' in doc)) {
    throw new ParseError('Invalid KML: missing <kml> root element');
  }
  return collectNodes(doc.kml, 'Placemark').map(toPlacemark);
}
