/*
  Build a tile map (tile id -> extent) from mission KML files

  Usage:
    npm run build-map -w apps/tilemap -- \
      --mission sentinel2 \
      --in ./kml \
      --out ./sentinel2.tiles \
      [--base ./sentinel2.tiles]
*/

import fs from 'node:fs';
import path from 'node:path';
import { glob } from 'glob';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { MISSIONS, createTileMap } from '../src/services/missions';
import { errorMessage } from '../src/errors';

const argv = yargs(hideBin(process.argv))
  .option('mission', { choices: MISSIONS, demandOption: true, desc: 'Mission grid of the KML files' })
  .option('in', { type: 'string', demandOption: true, desc: 'KML file, or folder searched for *.kml' })
  .option('out', { type: 'string', demandOption: true, desc: 'Tile map file to write' })
  .option('base', { type: 'string', desc: 'Existing tile map to start from' })
  .parseSync();

const INPUT = path.resolve(argv.in);
const OUTPUT = path.resolve(argv.out);

async function kmlFiles(input: string): Promise<string[]> {
  if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
    return (await glob('**/*.kml', { cwd: input, absolute: true, nodir: true, nocase: true })).sort();
  }
  return [input];
}

async function run() {
  const map = createTileMap(argv.mission);
  if (argv.base) {
    await map.readFile(path.resolve(argv.base));
    console.log(`[BUILD] Loaded ${map.count()} tiles from ${argv.base}`);
  }

  const files = await kmlFiles(INPUT);
  console.log(`[BUILD] Found ${files.length} KML file(s) in ${INPUT}`);
  for (const f of files) {
    const before = map.count();
    await map.ingestFromFile(f);
    console.log(`[BUILD] ${path.basename(f)}: ${map.count() - before} new tiles`);
  }

  fs.mkdirSync(path.dirname(OUTPUT), { recursive: true });
  await map.write(OUTPUT);
  console.log(`\nDone! Wrote ${map.count()} ${argv.mission} tiles to ${OUTPUT}`);
}

run().catch(err => { console.error(`[BUILD] ${errorMessage(err)}`); process.exit(1); });
