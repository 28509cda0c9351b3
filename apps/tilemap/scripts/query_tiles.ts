/*
  Query a tile map: tiles covering an area of interest and/or the extent of a set of tiles

  Usage:
    npm run query -w apps/tilemap -- \
      --mission sentinel2 \
      --map ./sentinel2.tiles \
      --aoi 2.1 44.9 3.4 43.8 \
      [--corners corrected] \
      [--tiles 31TDJ 31TEJ]
*/

import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { MISSIONS, loadTileMap } from '../src/services/missions';
import { errorMessage } from '../src/errors';
import { CORNER_CONVENTIONS } from '../src/config';
import { formatTileLine } from '../src/services/tileMap';

const argv = yargs(hideBin(process.argv))
  .option('mission', { choices: MISSIONS, demandOption: true, desc: 'Mission grid of the tile map' })
  .option('map', { type: 'string', demandOption: true, desc: 'Tile map file' })
  .option('aoi', { type: 'array', desc: 'Area of interest corners: ulx uly lrx lry (degrees)' })
  .option('corners', { choices: CORNER_CONVENTIONS, desc: 'How --aoi corners become a rectangle' })
  .option('tiles', { type: 'array', desc: 'Tile ids to compute the bounding box of' })
  .parseSync();

async function run() {
  const map = await loadTileMap(argv.mission, path.resolve(argv.map), { cornerConvention: argv.corners });
  console.log(`[QUERY] Loaded ${map.count()} ${argv.mission} tiles`);

  if (argv.aoi) {
    const corners = argv.aoi.map(Number);
    if (corners.length !== 4 || corners.some(Number.isNaN)) {
      throw new Error('--aoi needs four numbers: ulx uly lrx lry');
    }
    const [ulx, uly, lrx, lry] = corners;
    const ids = [...map.intersectingTilesByCorners(ulx, uly, lrx, lry)].sort();
    console.log(`[QUERY] ${ids.length} tiles intersect the AOI (${map.cornerConvention} corners)`);
    for (const id of ids) console.log(id);
  }

  if (argv.tiles) {
    const box = map.boundingBox(argv.tiles.map(String));
    if (box) process.stdout.write(formatTileLine('bbox', box));
    else console.log('[QUERY] None of the requested tiles are in the map');
  }
}

run().catch(err => { console.error(`[QUERY] ${errorMessage(err)}`); process.exit(1); });
