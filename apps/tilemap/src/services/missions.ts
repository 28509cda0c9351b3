import type { Mission } from '../types/geo';
import { Landsat8TileMap } from './landsat8TileMap';
import { Sentinel2TileMap } from './sentinel2TileMap';
import type { TileMap, TileMapOptions } from './tileMap';

export const MISSIONS: readonly Mission[] = ['sentinel2', 'landsat8'];

export const isMission = (value: string): value is Mission =>
  MISSIONS.some(m => m === value);

export function createTileMap(mission: Mission, options?: TileMapOptions): TileMap {
  switch (mission) {
    case 'sentinel2':
      return new Sentinel2TileMap(options);
    case 'landsat8':
      return new Landsat8TileMap(options);
  }
}

/** Creates an empty map for `mission` and reads a persisted tile map into it. */
export async function loadTileMap(mission: Mission, path: string, options?: TileMapOptions): Promise<TileMap> {
  const map = createTileMap(mission, options);
  await map.readFile(path);
  return map;
}
