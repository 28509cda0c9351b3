import fs from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import type { CornerConvention, Mission, Rectangle, TileEntry } from '../types/geo';
import { IOError, ParseError, errorMessage } from '../errors';
import { readCornerConvention, readVerbose } from '../config';
import { parseKmlPlacemarks, type KmlPlacemark } from './kml';
import { boundsToRect, emptyBounds, extend, formatDouble, fromCorners, intersects, parseDouble, rect } from '../utils/geometry';
import { readText, streamSource } from '../utils/streams';

export interface TileMapOptions {
  verbose?: boolean;
  cornerConvention?: CornerConvention;
}

const FIELDS = ['x', 'y', 'w', 'h'] as const;

/**
 * Parses one `<tileId> x=..,y=..,w=..,h=..` line. The identifier is everything before the
 * first space; the rest of the line is taken as-is, so an identifier that reappears inside
 * the numbers does not disturb them.
 */
export function parseTileLine(line: string, lineNo?: number): TileEntry {
  const space = line.indexOf(' ');
  if (space < 0) throw new ParseError('Missing space after tile identifier', { line: lineNo });
  if (space === 0) throw new ParseError('Empty tile identifier', { line: lineNo });

  const id = line.slice(0, space);
  const tokens = line.slice(space + 1).trim().split(',');
  if (tokens.length !== FIELDS.length) {
    throw new ParseError(`Expected ${FIELDS.length} fields for tile ${id}, found ${tokens.length}`, { line: lineNo });
  }
  const [x, y, w, h] = tokens.map((raw, i) => {
    const field = FIELDS[i];
    const token = raw.trim();
    if (!token.startsWith(`${field}=`)) {
      throw new ParseError(`Expected "${field}=" for tile ${id}, found "${token}"`, { line: lineNo, field });
    }
    const value = parseDouble(token.substring(2));
    if (value === undefined) {
      throw new ParseError(`Invalid number "${token.substring(2)}" for tile ${id}`, { line: lineNo, field });
    }
    return value;
  });
  return { id, rectangle: rect(x, y, w, h) };
}

export const formatTileLine = (id: string, r: Rectangle): string =>
  `${id} x=${formatDouble(r.x)},y=${formatDouble(r.y)},w=${formatDouble(r.width)},h=${formatDouble(r.height)}\n`;

const byKey = ([a]: [string, Rectangle], [b]: [string, Rectangle]): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Registry of tile extents for one mission grid.
 *
 * Only `read` and `ingestFromKml` add tiles. Both stage their entries and commit them once the
 * whole input has been consumed, so a failure leaves the registry as it was.
 */
export abstract class TileMap {
  abstract readonly mission: Mission;
  readonly cornerConvention: CornerConvention;
  protected readonly verbose: boolean;
  private tiles = new Map<string, Rectangle>(); // always sorted by key

  constructor(options: TileMapOptions = {}) {
    // Environment is only consulted for what the caller left out
    this.verbose = options.verbose ?? readVerbose();
    this.cornerConvention = options.cornerConvention ?? readCornerConvention();
  }

  /** Turns one placemark into a tile, or `undefined` to skip it. Throws ParseError on bad data. */
  protected abstract tileFromPlacemark(placemark: KmlPlacemark): TileEntry | undefined;

  async read(input: Readable): Promise<void> {
    const source = streamSource(input);
    const lines = (await readText(input, source)).split(/\r?\n/);
    const staged: TileEntry[] = [];
    lines.forEach((line, i) => {
      if (line.trim()) staged.push(parseTileLine(line, i + 1));
    });
    this.commit(staged);
    this.log(`Read ${staged.length} tiles${source ? ` from ${source}` : ''}, ${this.count()} total`);
  }

  async readFile(path: string): Promise<void> {
    if (!fs.existsSync(path)) throw new IOError('Tile map not found', path);
    await this.read(fs.createReadStream(path));
  }

  // Truncates or creates the file; one write per line.
  async write(path: string): Promise<void> {
    let handle: FileHandle | undefined;
    let failed = false;
    try {
      handle = await open(path, 'w');
      for (const [id, rectangle] of this.tiles) {
        await handle.write(formatTileLine(id, rectangle));
      }
    } catch (error) {
      failed = true;
      throw new IOError(`Failed to write tile map (${errorMessage(error)})`, path, { cause: error });
    } finally {
      if (handle) {
        try {
          await handle.close();
        } catch (error) {
          // an earlier write failure stays the reported one
          if (!failed) throw new IOError(`Failed to close tile map (${errorMessage(error)})`, path, { cause: error });
          console.error(`[TILEMAP] Failed to close ${path} after write error: ${errorMessage(error)}`);
        }
      }
    }
    this.log(`Wrote ${this.count()} tiles to ${path}`);
  }

  async ingestFromFile(path: string): Promise<void> {
    if (!fs.existsSync(path)) {
      this.log(`KML file ${path} does not exist, nothing to ingest`);
      return;
    }
    await this.ingestFromKml(fs.createReadStream(path));
  }

  async ingestFromKml(input: Readable): Promise<void> {
    const source = streamSource(input);
    const placemarks = parseKmlPlacemarks(await readText(input, source));
    const staged: TileEntry[] = [];
    for (const placemark of placemarks) {
      const entry = this.tileFromPlacemark(placemark);
      if (entry) staged.push(entry);
    }
    this.commit(staged);
    this.log(`Ingested ${staged.length} of ${placemarks.length} placemarks${source ? ` from ${source}` : ''}, ${this.count()} tiles total`);
  }

  tileNames(): string[] {
    return [...this.tiles.keys()];
  }

  count(): number {
    return this.tiles.size;
  }

  get(id: string): Rectangle | undefined {
    return this.tiles.get(id);
  }

  /**
   * Smallest rectangle covering every registered tile in `tileIds`; unknown ids are ignored.
   * A single match yields the stored rectangle itself.
   */
  boundingBox(tileIds?: ReadonlySet<string> | readonly string[] | null): Rectangle | undefined {
    if (!tileIds) return undefined;
    const matched = new Set<string>();
    let first: Rectangle | undefined;
    let bounds = emptyBounds();
    for (const id of tileIds) {
      const rectangle = this.tiles.get(id);
      if (!rectangle || matched.has(id)) continue;
      matched.add(id);
      first ??= rectangle;
      bounds = extend(bounds, rectangle);
    }
    if (matched.size <= 1) return first;
    return boundsToRect(bounds);
  }

  intersectingTiles(aoi: Rectangle): Set<string> {
    const ids = new Set<string>();
    for (const [id, rectangle] of this.tiles) {
      if (intersects(rectangle, aoi)) ids.add(id);
    }
    return ids;
  }

  /** Corner form of `intersectingTiles`; see CornerConvention for how the corners are read. */
  intersectingTilesByCorners(
    ulx: number,
    uly: number,
    lrx: number,
    lry: number,
    convention: CornerConvention = this.cornerConvention
  ): Set<string> {
    return this.intersectingTiles(fromCorners([ulx, uly], [lrx, lry], convention));
  }

  private commit(entries: TileEntry[]): void {
    if (entries.length === 0) return;
    const merged = new Map(this.tiles);
    for (const { id, rectangle } of entries) merged.set(id, rectangle);
    this.tiles = new Map([...merged].sort(byKey));
  }

  protected log(message: string): void {
    if (this.verbose) console.log(`[TILEMAP] ${message}`);
  }
}
