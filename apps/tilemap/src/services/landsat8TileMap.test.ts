import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { ParseError } from '../errors';
import { kmlDocument, placemark, square } from '../test/fixtures/kml';
import { Landsat8TileMap, wrsTileId } from './landsat8TileMap';

const newMap = () => new Landsat8TileMap({ verbose: false, cornerConvention: 'literal' });

async function ingest(...placemarks: string[]): Promise<Landsat8TileMap> {
  const map = newMap();
  await map.ingestFromKml(Readable.from([kmlDocument(...placemarks)]));
  return map;
}

describe('wrsTileId', () => {
  it('zero-pads path and row to three digits', () => {
    expect(wrsTileId(187, 31)).toBe('187031');
    expect(wrsTileId(1, 2)).toBe('001002');
  });
});

describe('Landsat8TileMap.ingestFromKml', () => {
  it('names tiles from PATH and ROW data', async () => {
    const map = await ingest(placemark({ name: 'scene', rings: [square(24, 44)], data: { PATH: '187', ROW: '29' } }));
    expect(map.mission).toBe('landsat8');
    expect(map.tileNames()).toEqual(['187029']);
    expect(map.get('187029')).toEqual({ x: 24, y: 44, width: 1, height: 1 });
  });

  it('falls back to a path_row placemark name', async () => {
    const map = await ingest(placemark({ name: '1_2', rings: [square(0, 0)] }));
    expect(map.tileNames()).toEqual(['001002']);
  });

  it('prefers ExtendedData over the name', async () => {
    const map = await ingest(placemark({ name: '5_5', rings: [square(0, 0)], data: { path: '6', row: '7' } }));
    expect(map.tileNames()).toEqual(['006007']);
  });

  it('skips placemarks without path/row or without a polygon', async () => {
    const map = await ingest(
      placemark({ name: 'legend', rings: [square(0, 0)] }),
      placemark({ name: '10_20' }),
    );
    expect(map.count()).toBe(0);
  });

  it('rejects paths and rows outside the WRS-2 grid', async () => {
    await expect(ingest(placemark({ name: '0_10', rings: [square(0, 0)] })))
      .rejects.toMatchObject({ name: 'ParseError', field: 'PATH' });
    await expect(ingest(placemark({ name: '10_249', rings: [square(0, 0)] })))
      .rejects.toMatchObject({ name: 'ParseError', field: 'ROW' });
    await expect(ingest(placemark({ rings: [square(0, 0)], data: { PATH: 'x', ROW: '1' } })))
      .rejects.toThrow(ParseError);
  });

  it('finds tiles intersecting an area of interest', async () => {
    const map = await ingest(
      placemark({ name: '187_29', rings: [square(24, 44, 2)] }),
      placemark({ name: '187_30', rings: [square(23.5, 42.5, 2)] }),
      placemark({ name: '190_29', rings: [square(19, 44, 2)] }),
    );
    expect(map.intersectingTilesByCorners(24.5, 44.2, 25, 44, 'corrected')).toEqual(new Set(['187029', '187030']));
    expect(map.boundingBox(['187029', '187030'])).toEqual({ x: 23.5, y: 42.5, width: 2.5, height: 3.5 });
  });
});
