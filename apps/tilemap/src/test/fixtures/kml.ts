/**
 * KML builders for tests
 */

import type { Position } from '../../types/geo';

export const square = (x: number, y: number, size = 1): Position[] => [
  [x, y], [x + size, y], [x + size, y + size], [x, y + size], [x, y],
];

export const polygon = (ring: Position[]): string =>
  `<Polygon><outerBoundaryIs><LinearRing><coordinates>
        ${ring.map(([lon, lat]) => `${lon},${lat},0`).join(' ')}
      </coordinates></LinearRing></outerBoundaryIs></Polygon>`;

export interface PlacemarkFixture {
  name?: string;
  rings?: Position[][];
  data?: Record<string, string>;
  point?: Position;
}

export function placemark({ name, rings = [], data, point }: PlacemarkFixture): string {
  const parts: string[] = [];
  if (name !== undefined) parts.push(`<name>${name}</name>`);
  if (data) {
    const fields = Object.entries(data).map(([k, v]) => `<SimpleData name="${k}">${v}</SimpleData>`).join('');
    parts.push(`<ExtendedData><SchemaData schemaUrl="#grid">${fields}</SchemaData></ExtendedData>`);
  }
  const geometries = rings.map(polygon);
  if (point) geometries.push(`<Point><coordinates>${point[0]},${point[1]},0</coordinates></Point>`);
  if (geometries.length === 1 && !point) parts.push(geometries[0]);
  else if (geometries.length > 0) parts.push(`<MultiGeometry>${geometries.join('')}</MultiGeometry>`);
  return `<Placemark>${parts.join('')}</Placemark>`;
}

export const kmlDocument = (...placemarks: string[]): string =>
  `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <name>grid</name>
    <Folder>
      <name>Features</name>
      ${placemarks.join('\n      ')}
    </Folder>
  </Document>
</kml>
`;
